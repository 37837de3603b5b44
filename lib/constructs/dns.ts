import { aws_certificatemanager, aws_elasticloadbalancingv2, aws_route53, aws_route53_targets } from "aws-cdk-lib";
import { Construct } from "constructs";

export const recordFqdn = (domainName: string, subdomain?: string): string =>
  subdomain === undefined ? domainName : `${subdomain}.${domainName}`;

export interface IDomain {
  domainName: string;
  subdomain?: string;
  enableHttps: boolean;
}

/**
 * 既存のHosted Zoneを参照し、HTTPSの場合はDNS検証のACM証明書を発行する
 * Hosted Zoneが存在しない場合は`cdk synth`時のlookupで失敗する
 */
export class Domain extends Construct {
  public readonly hostedZone: aws_route53.IHostedZone;
  public readonly certificate: aws_certificatemanager.ICertificate | undefined;

  constructor(scope: Construct, id: string, params: IDomain) {
    super(scope, id);

    this.hostedZone = aws_route53.HostedZone.fromLookup(this, "HostedZone", {
      domainName: params.domainName,
    });
    this.certificate = params.enableHttps
      ? new aws_certificatemanager.Certificate(this, "AlbCert", {
          domainName: recordFqdn(params.domainName, params.subdomain),
          validation: aws_certificatemanager.CertificateValidation.fromDns(this.hostedZone),
        })
      : undefined;
  }
}

export interface IAliasRecord {
  hostedZone: aws_route53.IHostedZone;
  subdomain?: string;
  loadBalancer: aws_elasticloadbalancingv2.IApplicationLoadBalancer;
}

/** `subdomain` → ALB のAレコード。ALBの作成完了後に作成する */
export class AliasRecord extends Construct {
  public readonly record: aws_route53.ARecord;

  constructor(scope: Construct, id: string, params: IAliasRecord) {
    super(scope, id);

    this.record = new aws_route53.ARecord(this, "AlbARecord", {
      zone: params.hostedZone,
      recordName: params.subdomain,
      target: aws_route53.RecordTarget.fromAlias(new aws_route53_targets.LoadBalancerTarget(params.loadBalancer)),
    });
    this.record.node.addDependency(params.loadBalancer);
  }
}
