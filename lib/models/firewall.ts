import { ConfigurationError } from "../errors";

export type MatchStatement =
  | { kind: "geoMatch"; countryCodes: string[] }
  | { kind: "ipSet"; addresses: string[] }
  | { kind: "not"; statement: MatchStatement };

interface FirewallRuleBase {
  name: string;
  priority: number;
  metricName: string;
}

/** 一致した時点で評価を終了するルール */
export interface ActionRule extends FirewallRuleBase {
  action: "allow" | "block";
  statement: MatchStatement;
}

/** マネージドルールグループ。判定はグループ内のルールに委ねる（`overrideAction: none`） */
export interface ManagedRuleGroupRule extends FirewallRuleBase {
  overrideAction: "none";
  managedRuleGroup: {
    vendorName: string;
    name: string;
  };
}

export type FirewallRule = ActionRule | ManagedRuleGroupRule;

export const isManagedRuleGroupRule = (rule: FirewallRule): rule is ManagedRuleGroupRule =>
  "managedRuleGroup" in rule;

export interface FirewallPolicy {
  defaultAction: "allow" | "block";
  rules: FirewallRule[];
}

export interface InboundRequest {
  countryCode: string;
  sourceIp: string;
}

export interface FirewallVerdict {
  action: "allow" | "block";
  /** 判定を下したルール名。デフォルトアクションの場合は`undefined` */
  terminatingRule: string | undefined;
}

/** マネージドルールグループの判定。何も一致しなければ`undefined`を返す */
export type ManagedRuleGroupInspector = (
  group: ManagedRuleGroupRule["managedRuleGroup"],
  request: InboundRequest,
) => "allow" | "block" | undefined;

const COUNTRY_CODE = /^[A-Z]{2}$/;

export const validateCountryCodes = (countryCodes: string[], field = "allowedCountryCodes"): string[] => {
  countryCodes.forEach((code, index) => {
    if (!COUNTRY_CODE.test(code)) {
      throw new ConfigurationError(`${field}[${index}]`, `"${code}" is not an ISO 3166 alpha-2 country code`);
    }
  });
  return countryCodes;
};

/**
 * 優先度とルール名はWebACL内で一意であること
 */
export const validateFirewallRules = (rules: FirewallRule[]): FirewallRule[] => {
  const priorities = new Set<number>();
  const names = new Set<string>();
  rules.forEach((rule, index) => {
    if (!Number.isInteger(rule.priority) || rule.priority < 0) {
      throw new ConfigurationError(`firewallRules[${index}].priority`, `must be a non-negative integer`);
    }
    if (priorities.has(rule.priority)) {
      throw new ConfigurationError(`firewallRules[${index}].priority`, `priority ${rule.priority} is already used`);
    }
    if (names.has(rule.name)) {
      throw new ConfigurationError(`firewallRules[${index}].name`, `rule "${rule.name}" is already defined`);
    }
    priorities.add(rule.priority);
    names.add(rule.name);
  });
  return rules;
};

export const sortByPriority = (rules: FirewallRule[]): FirewallRule[] =>
  [...rules].sort((a, b) => a.priority - b.priority);

// IPv4 CIDR only
const ipv4ToNumber = (ip: string): number =>
  ip.split(".").reduce((acc, octet) => acc * 256 + Number.parseInt(octet, 10), 0);

const inCidr = (ip: string, cidr: string): boolean => {
  const [network, bits] = cidr.split("/");
  const prefixLength = bits === undefined ? 32 : Number.parseInt(bits, 10);
  const size = 2 ** (32 - prefixLength);
  const base = Math.floor(ipv4ToNumber(network) / size);
  return Math.floor(ipv4ToNumber(ip) / size) === base;
};

export const matches = (statement: MatchStatement, request: InboundRequest): boolean => {
  switch (statement.kind) {
    case "geoMatch":
      return statement.countryCodes.includes(request.countryCode);
    case "ipSet":
      return statement.addresses.some((cidr) => inCidr(request.sourceIp, cidr));
    case "not":
      return !matches(statement.statement, request);
  }
};

/**
 * 優先度の昇順に評価し、最初に allow/block が確定したルールで終了する
 */
export const evaluateRequest = (
  policy: FirewallPolicy,
  request: InboundRequest,
  inspectManagedGroup: ManagedRuleGroupInspector = () => undefined,
): FirewallVerdict => {
  for (const rule of sortByPriority(policy.rules)) {
    if (isManagedRuleGroupRule(rule)) {
      const action = inspectManagedGroup(rule.managedRuleGroup, request);
      if (action !== undefined) {
        return { action, terminatingRule: rule.name };
      }
      continue;
    }
    if (matches(rule.statement, request)) {
      return { action: rule.action, terminatingRule: rule.name };
    }
  }
  return { action: policy.defaultAction, terminatingRule: undefined };
};

const managedRule = (priority: number, name: string, ruleGroupName: string, metricName: string): FirewallRule => ({
  name,
  priority,
  metricName,
  overrideAction: "none",
  managedRuleGroup: { vendorName: "AWS", name: ruleGroupName },
});

/**
 * - 許可した国以外からのアクセスを遮断（国が指定されている場合のみ）
 * - AWSのマネージドルール: Common / SQLi / KnownBadInputs
 *
 * @see https://docs.aws.amazon.com/waf/latest/developerguide/aws-managed-rule-groups-list.html
 */
export const defaultFirewallRules = (allowedCountryCodes: string[], blockedIpAddresses: string[] = []): FirewallRule[] => {
  const rules: FirewallRule[] = [];
  if (allowedCountryCodes.length > 0) {
    rules.push({
      name: "BlockNonAllowedCountries",
      priority: rules.length,
      metricName: "BlockNonAllowedCountries",
      action: "block",
      statement: { kind: "not", statement: { kind: "geoMatch", countryCodes: allowedCountryCodes } },
    });
  }
  if (blockedIpAddresses.length > 0) {
    rules.push({
      name: "BlockIpLists",
      priority: rules.length,
      metricName: "BlockIpLists",
      action: "block",
      statement: { kind: "ipSet", addresses: blockedIpAddresses },
    });
  }
  rules.push(managedRule(rules.length, "CommonRuleSet", "AWSManagedRulesCommonRuleSet", "CommonRules"));
  rules.push(managedRule(rules.length, "SQLiRuleSet", "AWSManagedRulesSQLiRuleSet", "SQLiRules"));
  rules.push(managedRule(rules.length, "BadInputsRuleSet", "AWSManagedRulesKnownBadInputsRuleSet", "BadInputs"));
  return rules;
};
