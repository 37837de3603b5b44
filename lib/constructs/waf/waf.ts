import { Annotations, aws_elasticloadbalancingv2, aws_wafv2 } from "aws-cdk-lib";
import { Construct } from "constructs";

import { environment, IFirewall, prefix } from "../params";
import {
  defaultFirewallRules,
  FirewallRule,
  isManagedRuleGroupRule,
  MatchStatement,
  sortByPriority,
  validateFirewallRules,
} from "../../models/firewall";

const visibilityConfig = (metricName: string): aws_wafv2.CfnWebACL.VisibilityConfigProperty => ({
  sampledRequestsEnabled: true,
  cloudWatchMetricsEnabled: true,
  metricName,
});

/**
 * Wafを作成する
 * この場合の料金は
 * Web ACL: 5 [USD/Month]
 * Rules: 1 [USD/Month] * ルール数
 *
 * AWSがデフォルトで提供するマネージドルールは追加料金はかからない。
 *
 * 国によるブロック(`BlockNonAllowedCountries`)は例外を持たない。
 * 許可した国以外からの運用者のアクセスや外形監視もブロックされる。
 *
 * AWSが提供しているマネージドルール
 * @see https://docs.aws.amazon.com/ja_jp/waf/latest/developerguide/aws-managed-rule-groups-list.html
 */
export class Waf extends Construct {
  public readonly webAcl: aws_wafv2.CfnWebACL;
  public readonly webAclName: string;

  constructor(
    scope: Construct,
    id: string,
    params: IFirewall & {
      environment: environment;
      loadBalancer: aws_elasticloadbalancingv2.IApplicationLoadBalancer;
    },
  ) {
    super(scope, id);
    const { environment, allowedCountryCodes, blockedIpAddresses } = params;

    const rules = sortByPriority(validateFirewallRules(defaultFirewallRules(allowedCountryCodes, blockedIpAddresses)));

    let ipSet: aws_wafv2.CfnIPSet | undefined;
    const toStatement = (statement: MatchStatement): aws_wafv2.CfnWebACL.StatementProperty => {
      switch (statement.kind) {
        case "geoMatch":
          return { geoMatchStatement: { countryCodes: statement.countryCodes } };
        case "not":
          return { notStatement: { statement: toStatement(statement.statement) } };
        case "ipSet": {
          const ipSets =
            ipSet ||
            new aws_wafv2.CfnIPSet(this, "IPSets", {
              addresses: statement.addresses,
              ipAddressVersion: "IPV4",
              scope: "REGIONAL",
              description: "blocked IP lists",
              name: `${prefix}-blocked-ip-lists-${environment}`,
            });
          ipSet = ipSets;
          return { ipSetReferenceStatement: { arn: ipSets.attrArn } };
        }
      }
    };

    const toRuleProperty = (rule: FirewallRule): aws_wafv2.CfnWebACL.RuleProperty =>
      isManagedRuleGroupRule(rule)
        ? {
            name: rule.name,
            priority: rule.priority,
            overrideAction: { none: {} },
            visibilityConfig: visibilityConfig(rule.metricName),
            statement: {
              managedRuleGroupStatement: {
                vendorName: rule.managedRuleGroup.vendorName,
                name: rule.managedRuleGroup.name,
              },
            },
          }
        : {
            name: rule.name,
            priority: rule.priority,
            action: rule.action === "block" ? { block: {} } : { allow: {} },
            visibilityConfig: visibilityConfig(rule.metricName),
            statement: toStatement(rule.statement),
          };

    // WebACLを作成
    const webAclName = `${prefix}-waf-web-acl-${environment}`;
    const webAcl = new aws_wafv2.CfnWebACL(this, "WebAcl", {
      defaultAction: { allow: {} },
      name: webAclName,
      scope: "REGIONAL",
      visibilityConfig: visibilityConfig("WebAcl"),
      rules: rules.map(toRuleProperty),
    });

    if (allowedCountryCodes.length > 0) {
      Annotations.of(this).addWarning(
        `WAF blocks every request not originating from ${allowedCountryCodes.join(", ")}, ` +
          "including operators and external health checkers outside those countries.",
      );
    }

    /** ALBにWAFの付与 */
    new aws_wafv2.CfnWebACLAssociation(this, "WebAclAssociation", {
      resourceArn: params.loadBalancer.loadBalancerArn,
      webAclArn: webAcl.attrArn,
    });

    this.webAcl = webAcl;
    this.webAclName = webAclName;
  }
}
