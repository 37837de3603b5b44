import {
  aws_cloudwatch,
  aws_cloudwatch_actions,
  aws_ecs,
  aws_elasticloadbalancingv2,
  aws_s3,
  aws_sns,
  aws_sns_subscriptions,
  Duration,
  RemovalPolicy,
  Stack,
} from "aws-cdk-lib";
import { Construct } from "constructs";

import type { IObservability } from "./params";
import { AlarmMetricName, defaultAlarmDefinitions, validateAlarmDefinition } from "../models/alarm";

export interface IObservabilityPack extends Omit<IObservability, "enabled"> {
  service: aws_ecs.Ec2Service;
  loadBalancer: aws_elasticloadbalancingv2.ApplicationLoadBalancer;
  targetGroup: aws_elasticloadbalancingv2.ApplicationTargetGroup;
  /** ALBに関連付けたWebACLの名前 */
  webAclName: string;
  notifyEmail?: string;
}

const ONE_MINUTE = Duration.minutes(1);

/**
 * 監視一式
 * - ALBのアクセスログ → S3（保持期間の経過後に削除）
 * - アラーム → SNS（メールアドレスが指定された場合は購読を追加）
 * - ダッシュボード（WAFでブロックしたリクエスト数を含む）
 */
export class ObservabilityPack extends Construct {
  public readonly alertsTopic: aws_sns.ITopic;

  constructor(scope: Construct, id: string, params: IObservabilityPack) {
    super(scope, id);
    const { service, loadBalancer, targetGroup } = params;

    // ALBのログ配信にはACLが必要なため OBJECT_WRITER
    const accessLogsBucket = new aws_s3.Bucket(this, "AlbAccessLogs", {
      objectOwnership: aws_s3.ObjectOwnership.OBJECT_WRITER,
      encryption: aws_s3.BucketEncryption.S3_MANAGED,
      blockPublicAccess: aws_s3.BlockPublicAccess.BLOCK_ALL,
      enforceSSL: true,
      lifecycleRules: [{ enabled: true, expiration: Duration.days(params.accessLogRetentionDays) }],
      removalPolicy: RemovalPolicy.DESTROY,
      autoDeleteObjects: true,
    });
    // バケットポリシー(ELBのログ配信アカウントへの許可)とALBの依存関係もここで付与される
    loadBalancer.logAccessLogs(accessLogsBucket, "alb-logs");

    const alertsTopic = new aws_sns.Topic(this, "AlertsTopic", {
      displayName: "Chat UI alerts",
    });
    if (params.notifyEmail) {
      alertsTopic.addSubscription(new aws_sns_subscriptions.EmailSubscription(params.notifyEmail));
    }

    const p95Latency = targetGroup.metrics.targetResponseTime({ statistic: "p95", period: ONE_MINUTE });
    const unhealthyHosts = targetGroup.metrics.unhealthyHostCount({ statistic: "Average", period: ONE_MINUTE });
    const target5xx = targetGroup.metrics.httpCodeTarget(aws_elasticloadbalancingv2.HttpCodeTarget.TARGET_5XX_COUNT, {
      statistic: "Sum",
      period: ONE_MINUTE,
    });
    const elb5xx = loadBalancer.metrics.httpCodeElb(aws_elasticloadbalancingv2.HttpCodeElb.ELB_5XX_COUNT, {
      statistic: "Sum",
      period: ONE_MINUTE,
    });
    const metrics: Record<AlarmMetricName, aws_cloudwatch.IMetric> = {
      TargetResponseTimeP95: p95Latency,
      UnHealthyHostCount: unhealthyHosts,
      HTTPCodeTarget5XX: target5xx,
      HTTPCodeELB5XX: elb5xx,
    };

    const snsAction = new aws_cloudwatch_actions.SnsAction(alertsTopic);
    defaultAlarmDefinitions().forEach((definition) => {
      validateAlarmDefinition(definition);
      const alarm = new aws_cloudwatch.Alarm(this, definition.id, {
        metric: metrics[definition.metric],
        threshold: definition.threshold,
        evaluationPeriods: definition.evaluationPeriods,
        datapointsToAlarm: definition.datapointsToAlarm,
        comparisonOperator: definition.comparisonOperator,
        treatMissingData: aws_cloudwatch.TreatMissingData.NOT_BREACHING,
        alarmDescription: definition.description,
      });
      alarm.addAlarmAction(snsAction);
    });

    // REGIONALのWebACLは WebACL / Region / Rule のディメンションで集計される
    const wafBlocked = new aws_cloudwatch.Metric({
      namespace: "AWS/WAFV2",
      metricName: "BlockedRequests",
      dimensionsMap: {
        WebACL: params.webAclName,
        Region: Stack.of(this).region,
        Rule: "ALL",
      },
      statistic: "Sum",
      period: ONE_MINUTE,
    });

    const dashboard = new aws_cloudwatch.Dashboard(this, "Dashboard", {
      dashboardName: params.dashboardName,
    });
    dashboard.addWidgets(
      new aws_cloudwatch.GraphWidget({
        title: "ECS CPU Utilization (%)",
        left: [service.metricCpuUtilization({ statistic: "Average", period: ONE_MINUTE })],
      }),
      new aws_cloudwatch.GraphWidget({
        title: "ALB Request Count (Sum/min)",
        left: [loadBalancer.metrics.requestCount({ statistic: "Sum", period: ONE_MINUTE })],
      }),
      new aws_cloudwatch.GraphWidget({
        title: "ALB Healthy (L) vs Unhealthy (R)",
        left: [targetGroup.metrics.healthyHostCount({ statistic: "Average", period: ONE_MINUTE })],
        right: [unhealthyHosts],
      }),
      new aws_cloudwatch.GraphWidget({
        title: "Target Response Time (p50 & p95)",
        left: [targetGroup.metrics.targetResponseTime({ statistic: "p50", period: ONE_MINUTE }), p95Latency],
      }),
      new aws_cloudwatch.GraphWidget({
        title: "HTTP 5xx (Target vs ELB)",
        left: [target5xx],
        right: [elb5xx],
      }),
      new aws_cloudwatch.GraphWidget({
        title: "WAF Blocked Requests",
        left: [wafBlocked],
      }),
    );

    this.alertsTopic = alertsTopic;
  }
}
