import {
  Annotations,
  aws_certificatemanager,
  aws_ec2,
  aws_ecs,
  aws_elasticloadbalancingv2,
  aws_iam,
  aws_logs,
  aws_s3,
  aws_secretsmanager,
  Duration,
} from "aws-cdk-lib";
import { Construct } from "constructs";

import { environment, ISecretRef, knowledgeBucketEnvName, prefix } from "./params";
import { IHealthCheckPolicy, validateHealthCheck } from "../models/healthCheck";

export interface IEcsRoles {
  environment: environment;
}

export class EcsRoles extends Construct {
  public readonly taskRole: aws_iam.IRole;
  public readonly executionRole: aws_iam.IRole;

  constructor(scope: Construct, id: string, params: IEcsRoles) {
    super(scope, id);
    const { environment } = params;

    /** タスクを作成する際に必要な権限。シークレットの読み取り権限はCDKが付与する */
    this.executionRole = new aws_iam.Role(this, "ExecutionRole", {
      roleName: `${prefix}-ecs-execution-${environment}`,
      assumedBy: new aws_iam.ServicePrincipal("ecs-tasks.amazonaws.com"),
      managedPolicies: [
        aws_iam.ManagedPolicy.fromAwsManagedPolicyName("service-role/AmazonECSTaskExecutionRolePolicy"),
      ],
    });

    /** コンテナ上のアプリケーションの権限。S3の読み取りは`KnowledgeBucket`側で付与する */
    this.taskRole = new aws_iam.Role(this, "TaskRole", {
      roleName: `${prefix}-ecs-task-${environment}`,
      assumedBy: new aws_iam.ServicePrincipal("ecs-tasks.amazonaws.com"),
    });
  }
}

/**
 * タグがない・もしくは`latest`のイメージは内容が変わりうるため警告を出す
 * digest(`@sha256:`)で指定されていれば固定とみなす
 */
export const isMutableImageReference = (image: string): boolean => {
  if (image.includes("@sha256:")) {
    return false;
  }
  const lastSegment = image.substring(image.lastIndexOf("/") + 1);
  const separator = lastSegment.lastIndexOf(":");
  return separator === -1 || lastSegment.substring(separator + 1) === "latest";
};

export interface IEcsService {
  environment: environment;
  vpc: aws_ec2.IVpc;
  cluster: aws_ecs.ICluster;
  capacityProvider: aws_ecs.AsgCapacityProvider;
  albSecurityGroup: aws_ec2.ISecurityGroup;
  certificate?: aws_certificatemanager.ICertificate;
  knowledgeBucket?: aws_s3.IBucket;
  containerImage: string;
  containerPort: number;
  taskMemoryLimitMiB: number;
  enableExecuteCommand: boolean;
  desiredReplicas: number;
  secretRefs: ISecretRef[];
  envVars: Record<string, string>;
  healthCheck: IHealthCheckPolicy;
}

/**
 * ALB + ECS(EC2, bridgeモード)
 * 証明書が渡された場合はHTTPSで待ち受け、HTTPはHTTPSへリダイレクトする
 */
export class EcsService extends Construct {
  public readonly service: aws_ecs.Ec2Service;
  public readonly taskDefinition: aws_ecs.Ec2TaskDefinition;
  public readonly loadBalancer: aws_elasticloadbalancingv2.ApplicationLoadBalancer;
  public readonly targetGroup: aws_elasticloadbalancingv2.ApplicationTargetGroup;

  constructor(scope: Construct, id: string, params: IEcsService) {
    super(scope, id);

    const { environment, vpc, cluster, capacityProvider, albSecurityGroup, certificate } = params;
    const healthCheck = validateHealthCheck(params.healthCheck);

    if (isMutableImageReference(params.containerImage)) {
      Annotations.of(this).addWarning(
        `Container image "${params.containerImage}" is referenced by a mutable tag; pin a version or digest for reproducible deployments.`,
      );
    }

    // create a task definition with CloudWatch Logs
    const logging = aws_ecs.LogDrivers.awsLogs({
      streamPrefix: `${prefix}-${environment}`,
      logRetention: aws_logs.RetentionDays.ONE_MONTH,
    });

    const { taskRole, executionRole } = new EcsRoles(this, "EcsRoles", { environment });

    const taskDefinition = new aws_ecs.Ec2TaskDefinition(this, "TaskDefinition", {
      networkMode: aws_ecs.NetworkMode.BRIDGE,
      taskRole,
      executionRole,
    });

    const secrets = Object.fromEntries(
      params.secretRefs.map((ref) => {
        const secret = aws_secretsmanager.Secret.fromSecretNameV2(this, `${ref.logicalName}Secret`, ref.secretPath);
        return [ref.logicalName, aws_ecs.Secret.fromSecretsManager(secret, ref.field)];
      }),
    );

    taskDefinition.addContainer("ChatUiContainer", {
      image: aws_ecs.ContainerImage.fromRegistry(params.containerImage),
      memoryLimitMiB: params.taskMemoryLimitMiB,
      portMappings: [
        {
          containerPort: params.containerPort,
          // bridgeモードでは動的ポート
          hostPort: 0,
          protocol: aws_ecs.Protocol.TCP,
        },
      ],
      environment: {
        ...params.envVars,
        ...(params.knowledgeBucket ? { [knowledgeBucketEnvName]: params.knowledgeBucket.bucketName } : {}),
      },
      secrets,
      logging,
    });

    const service = new aws_ecs.Ec2Service(this, "ChatUiService", {
      cluster,
      taskDefinition,
      desiredCount: params.desiredReplicas,
      minHealthyPercent: 50,
      maxHealthyPercent: 200,
      capacityProviderStrategies: [{ capacityProvider: capacityProvider.capacityProviderName, weight: 1 }],
      healthCheckGracePeriod: Duration.seconds(120),
      enableExecuteCommand: params.enableExecuteCommand,
      circuitBreaker: { rollback: true },
    });

    const alb = new aws_elasticloadbalancingv2.ApplicationLoadBalancer(this, "ApplicationLoadBalancer", {
      loadBalancerName: `${prefix}-alb-${environment}`,
      vpc,
      idleTimeout: Duration.seconds(120),
      // scheme: true to access from external internet
      internetFacing: true,
      securityGroup: albSecurityGroup,
    });

    const listener = certificate
      ? alb.addListener("ListenerHttps", {
          protocol: aws_elasticloadbalancingv2.ApplicationProtocol.HTTPS,
          port: 443,
          certificates: [certificate],
          open: false,
        })
      : alb.addListener("ListenerHttp", {
          protocol: aws_elasticloadbalancingv2.ApplicationProtocol.HTTP,
          port: 80,
          open: false,
        });

    const targetGroup = listener.addTargets("ChatUiTarget", {
      targetGroupName: `${prefix}-tg-${environment}`,
      protocol: aws_elasticloadbalancingv2.ApplicationProtocol.HTTP,
      deregistrationDelay: Duration.seconds(30),
      targets: [
        service.loadBalancerTarget({
          containerName: "ChatUiContainer",
          containerPort: params.containerPort,
        }),
      ],
      healthCheck: {
        path: healthCheck.path,
        port: "traffic-port",
        healthyHttpCodes: healthCheck.healthyHttpCodes,
        interval: Duration.seconds(healthCheck.intervalSeconds),
        timeout: Duration.seconds(healthCheck.timeoutSeconds),
        healthyThresholdCount: healthCheck.healthyThresholdCount,
        unhealthyThresholdCount: healthCheck.unhealthyThresholdCount,
      },
    });

    if (certificate) {
      // redirect to https
      alb.addListener("ListenerRedirect", {
        protocol: aws_elasticloadbalancingv2.ApplicationProtocol.HTTP,
        port: 80,
        open: false,
        defaultAction: aws_elasticloadbalancingv2.ListenerAction.redirect({
          port: "443",
          protocol: aws_elasticloadbalancingv2.ApplicationProtocol.HTTPS,
          permanent: true,
        }),
      });
    } else {
      Annotations.of(this).addWarning("HTTPS is disabled; the load balancer serves plain HTTP on port 80.");
    }

    this.service = service;
    this.taskDefinition = taskDefinition;
    this.loadBalancer = alb;
    this.targetGroup = targetGroup;
  }
}
