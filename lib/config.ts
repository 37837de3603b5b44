import { App, Environment } from "aws-cdk-lib";
import { ConfigurationError } from "./errors";
import { environments, knowledgeBucketEnvName, type environment, type IChatUiEcsEc2 } from "./constructs/params";
import { validateHealthCheck } from "./models/healthCheck";
import { normalizeSteps, validateReplicaBounds } from "./models/scaling";
import { defaultFirewallRules, validateCountryCodes, validateFirewallRules } from "./models/firewall";

const CIDR_V4 = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})\/(\d{1,2})$/;

const requireInteger = (field: string, value: number, min: number, max = Number.MAX_SAFE_INTEGER) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigurationError(field, `must be an integer within ${min}-${max}, got ${value}`);
  }
};

/**
 * スタックを組み立てる前に設定値の整合性を確認する。
 * 不正な場合は何も作成せずに`ConfigurationError`を投げる
 */
export const validateTopologyConfig = (params: IChatUiEcsEc2): IChatUiEcsEc2 => {
  validateReplicaBounds({ minCapacity: params.minReplicas, maxCapacity: params.maxReplicas }, "replicas");
  if (params.desiredReplicas < params.minReplicas || params.desiredReplicas > params.maxReplicas) {
    throw new ConfigurationError(
      "desiredReplicas",
      `must be within ${params.minReplicas}-${params.maxReplicas}, got ${params.desiredReplicas}`,
    );
  }
  if (!(params.cpuTargetPercent > 0 && params.cpuTargetPercent <= 100) || !Number.isInteger(params.cpuTargetPercent)) {
    throw new ConfigurationError("cpuTargetPercent", `must be an integer in (0, 100], got ${params.cpuTargetPercent}`);
  }
  if (params.enableHttps && !params.domainName) {
    throw new ConfigurationError("domainName", "is required when enableHttps is true");
  }
  if (params.subdomain !== undefined && params.subdomain.trim().length === 0) {
    throw new ConfigurationError("subdomain", "must not be empty");
  }
  if (params.subdomain !== undefined && !params.domainName) {
    throw new ConfigurationError("subdomain", "requires domainName");
  }
  if (params.containerImage.trim().length === 0) {
    throw new ConfigurationError("containerImage", "must not be empty");
  }
  requireInteger("containerPort", params.containerPort, 1, 65535);
  requireInteger("taskMemoryLimitMiB", params.taskMemoryLimitMiB, 128);
  requireInteger("cpuScaleInCooldownSeconds", params.cpuScaleInCooldownSeconds, 0);
  requireInteger("cpuScaleOutCooldownSeconds", params.cpuScaleOutCooldownSeconds, 0);
  requireInteger("requestScaling.cooldownSeconds", params.requestScaling.cooldownSeconds, 0);

  const logicalNames = new Set<string>();
  params.secretRefs.forEach((ref, index) => {
    const field = `secretRefs[${index}]`;
    if (ref.logicalName.trim().length === 0) {
      throw new ConfigurationError(`${field}.logicalName`, "must not be empty");
    }
    if (ref.secretPath.trim().length === 0) {
      throw new ConfigurationError(`${field}.secretPath`, "must not be empty");
    }
    if (ref.field.trim().length === 0) {
      throw new ConfigurationError(`${field}.field`, "must not be empty");
    }
    if (logicalNames.has(ref.logicalName)) {
      throw new ConfigurationError(`${field}.logicalName`, `"${ref.logicalName}" is already defined`);
    }
    if (ref.logicalName in params.envVars) {
      throw new ConfigurationError(`${field}.logicalName`, `"${ref.logicalName}" is also set in envVars`);
    }
    if (params.enableKnowledgeBucket && ref.logicalName === knowledgeBucketEnvName) {
      throw new ConfigurationError(
        `${field}.logicalName`,
        `"${knowledgeBucketEnvName}" is reserved for the knowledge bucket`,
      );
    }
    logicalNames.add(ref.logicalName);
  });
  if (params.enableKnowledgeBucket && knowledgeBucketEnvName in params.envVars) {
    throw new ConfigurationError(
      `envVars.${knowledgeBucketEnvName}`,
      `"${knowledgeBucketEnvName}" is reserved for the knowledge bucket`,
    );
  }

  const { computePool } = params;
  validateReplicaBounds(
    { minCapacity: computePool.minCapacity, maxCapacity: computePool.maxCapacity },
    "computePool.capacity",
  );
  if (computePool.desiredCapacity < computePool.minCapacity || computePool.desiredCapacity > computePool.maxCapacity) {
    throw new ConfigurationError(
      "computePool.desiredCapacity",
      `must be within ${computePool.minCapacity}-${computePool.maxCapacity}, got ${computePool.desiredCapacity}`,
    );
  }
  requireInteger("computePool.targetCapacityPercent", computePool.targetCapacityPercent, 1, 100);

  validateHealthCheck(params.healthCheck);
  normalizeSteps(params.requestScaling.steps, "requestScaling.steps");

  validateCountryCodes(params.firewall.allowedCountryCodes, "firewall.allowedCountryCodes");
  params.firewall.blockedIpAddresses.forEach((cidr, index) => {
    const match = CIDR_V4.exec(cidr);
    const octets = match?.slice(1, 5).map((octet) => Number.parseInt(octet, 10)) ?? [];
    const prefixLength = match === null ? NaN : Number.parseInt(match[5], 10);
    if (octets.length !== 4 || octets.some((octet) => octet > 255) || !(prefixLength <= 32)) {
      throw new ConfigurationError(`firewall.blockedIpAddresses[${index}]`, `"${cidr}" is not an IPv4 CIDR`);
    }
  });
  validateFirewallRules(defaultFirewallRules(params.firewall.allowedCountryCodes, params.firewall.blockedIpAddresses));

  if (params.observability.enabled) {
    requireInteger("observability.accessLogRetentionDays", params.observability.accessLogRetentionDays, 1);
  }
  if (params.notifyEmail !== undefined && !/^[^@\s]+@[^@\s]+$/.test(params.notifyEmail)) {
    throw new ConfigurationError("notifyEmail", `"${params.notifyEmail}" is not an email address`);
  }
  return params;
};

const optionalContext = (app: App, key: string): string | undefined => {
  const value: unknown = app.node.tryGetContext(key);
  if (value === undefined || value === null) return undefined;
  const text = String(value).trim();
  return text.length > 0 ? text : undefined;
};

const contextNumber = (app: App, key: string, fallback: number): number => {
  const raw = optionalContext(app, key);
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(key, `"${raw}" is not a number`);
  }
  return parsed;
};

export const contextBoolean = (app: App, key: string, fallback: boolean): boolean => {
  const raw = optionalContext(app, key);
  if (raw === undefined) return fallback;
  const normalized = raw.toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  throw new ConfigurationError(key, `"${raw}" is not a boolean`);
};

const contextList = (app: App, key: string, fallback: string[]): string[] => {
  const raw = optionalContext(app, key);
  if (raw === undefined) return fallback;
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
};

const isEnvironment = (value: string): value is environment => environments.some((env) => env === value);

/**
 * `cdk deploy -c key=value` で渡された値でデフォルトを上書きする
 * 例: `cdk deploy -c domainName=example.com -c subdomain=app -c maxReplicas=10`
 */
export const resolveTopologyConfig = (app: App, defaults: IChatUiEcsEc2): IChatUiEcsEc2 => {
  const env = optionalContext(app, "environment") ?? defaults.environment;
  if (!isEnvironment(env)) {
    throw new ConfigurationError("environment", `must be one of ${environments.join(", ")}, got "${env}"`);
  }

  return validateTopologyConfig({
    ...defaults,
    environment: env,
    domainName: optionalContext(app, "domainName") ?? defaults.domainName,
    subdomain: optionalContext(app, "subdomain") ?? defaults.subdomain,
    enableHttps: contextBoolean(app, "enableHttps", defaults.enableHttps),
    containerImage: optionalContext(app, "containerImage") ?? defaults.containerImage,
    containerPort: contextNumber(app, "containerPort", defaults.containerPort),
    desiredReplicas: contextNumber(app, "desiredReplicas", defaults.desiredReplicas),
    minReplicas: contextNumber(app, "minReplicas", defaults.minReplicas),
    maxReplicas: contextNumber(app, "maxReplicas", defaults.maxReplicas),
    cpuTargetPercent: contextNumber(app, "cpuTargetPercent", defaults.cpuTargetPercent),
    notifyEmail: optionalContext(app, "notifyEmail") ?? defaults.notifyEmail,
    firewall: {
      ...defaults.firewall,
      allowedCountryCodes: contextList(app, "allowedCountryCodes", defaults.firewall.allowedCountryCodes),
    },
    observability: {
      ...defaults.observability,
      enabled: contextBoolean(app, "observability", defaults.observability.enabled),
    },
    enableKnowledgeBucket: contextBoolean(app, "knowledgeBucket", defaults.enableKnowledgeBucket),
  });
};

/** アカウントとリージョンは`CDK_DEFAULT_*`を優先する */
export const resolveEnvironment = (defaults: Environment): Environment => ({
  account: process.env.CDK_DEFAULT_ACCOUNT ?? defaults.account,
  region: process.env.CDK_DEFAULT_REGION ?? defaults.region,
});
