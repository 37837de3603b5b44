import { App, CfnOutput, Stack, StackProps } from "aws-cdk-lib";
import {
  AliasRecord,
  ComputeCapacity,
  Domain,
  EcsService,
  KnowledgeBucket,
  ObservabilityPack,
  SecurityGroups,
  ServiceAutoScaling,
  Vpc,
  Waf,
} from "./constructs";
import type { IChatUiEcsEc2 } from "./constructs";
import { validateTopologyConfig } from "./config";

/**
 * VPC → ECSクラスタ(EC2) → ALB + ECSサービス → WAF → 監視 → Route 53 の順に組み立てる
 */
export class ChatUiEcsEc2Stack extends Stack {
  constructor(scope: App, id: string, params: IChatUiEcsEc2, props?: StackProps) {
    // 不正な設定の場合はスタック自体を作らない
    validateTopologyConfig(params);
    super(scope, id, props);

    const { environment } = params;

    // vpc + security group
    const { vpc } = new Vpc(this, "Vpc", { environment });
    const { albSecurityGroup, computeSecurityGroup } = new SecurityGroups(this, "SecurityGroup", {
      vpc,
      environment,
      enableHttps: params.enableHttps,
    });

    // cluster + capacity provider
    const { cluster, capacityProvider } = new ComputeCapacity(this, "ComputeCapacity", {
      environment,
      vpc,
      computeSecurityGroup,
      computePool: params.computePool,
    });

    const knowledgeBucket = params.enableKnowledgeBucket
      ? new KnowledgeBucket(this, "KnowledgeBucket").bucket
      : undefined;

    // hosted zone + certificate
    const domain = params.domainName
      ? new Domain(this, "Domain", {
          domainName: params.domainName,
          subdomain: params.subdomain,
          enableHttps: params.enableHttps,
        })
      : undefined;

    // alb + ecs
    const { service, taskDefinition, loadBalancer, targetGroup } = new EcsService(this, "EcsService", {
      environment,
      vpc,
      cluster,
      capacityProvider,
      albSecurityGroup,
      certificate: domain?.certificate,
      knowledgeBucket,
      containerImage: params.containerImage,
      containerPort: params.containerPort,
      taskMemoryLimitMiB: params.taskMemoryLimitMiB,
      enableExecuteCommand: params.enableExecuteCommand,
      desiredReplicas: params.desiredReplicas,
      secretRefs: params.secretRefs,
      envVars: params.envVars,
      healthCheck: params.healthCheck,
    });
    knowledgeBucket?.grantRead(taskDefinition.taskRole);

    new ServiceAutoScaling(this, "ServiceAutoScaling", {
      service,
      targetGroup,
      minReplicas: params.minReplicas,
      maxReplicas: params.maxReplicas,
      cpuTargetPercent: params.cpuTargetPercent,
      cpuScaleInCooldownSeconds: params.cpuScaleInCooldownSeconds,
      cpuScaleOutCooldownSeconds: params.cpuScaleOutCooldownSeconds,
      requestScaling: params.requestScaling,
    });

    // waf
    const { webAclName } = new Waf(this, "Waf", { environment, loadBalancer, ...params.firewall });

    const observability = params.observability.enabled
      ? new ObservabilityPack(this, "Observability", {
          service,
          loadBalancer,
          targetGroup,
          webAclName,
          notifyEmail: params.notifyEmail,
          accessLogRetentionDays: params.observability.accessLogRetentionDays,
          dashboardName: params.observability.dashboardName,
        })
      : undefined;

    // Route 53 for alb
    if (domain) {
      new AliasRecord(this, "AliasRecord", {
        hostedZone: domain.hostedZone,
        subdomain: params.subdomain,
        loadBalancer,
      });
    }

    new CfnOutput(this, "LoadBalancerDNS", {
      value: loadBalancer.loadBalancerDnsName,
      description: "ALB DNS",
    });
    new CfnOutput(this, "ClusterName", {
      value: cluster.clusterName,
      description: "ECS cluster name",
    });
    if (knowledgeBucket) {
      new CfnOutput(this, "KnowledgeBucketName", {
        value: knowledgeBucket.bucketName,
        description: "S3 bucket name for knowledge base files",
      });
    }
    if (observability) {
      new CfnOutput(this, "AlertsSnsTopicArn", {
        value: observability.alertsTopic.topicArn,
        description: "Alerts SNS Topic",
      });
    }
  }
}
