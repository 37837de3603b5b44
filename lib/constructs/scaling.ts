import { aws_applicationautoscaling, aws_ecs, aws_elasticloadbalancingv2, Duration } from "aws-cdk-lib";
import { Construct } from "constructs";

import type { IRequestScaling } from "./params";
import { normalizeSteps, validateReplicaBounds } from "../models/scaling";

export interface IServiceAutoScaling {
  service: aws_ecs.Ec2Service;
  targetGroup: aws_elasticloadbalancingv2.ApplicationTargetGroup;
  minReplicas: number;
  maxReplicas: number;
  cpuTargetPercent: number;
  cpuScaleInCooldownSeconds: number;
  cpuScaleOutCooldownSeconds: number;
  requestScaling: IRequestScaling;
}

/**
 * タスク数のオートスケーリング
 * - CPU使用率のターゲット追跡
 * - ターゲットあたりのリクエスト数(1分)によるステップスケーリング
 *
 * 2つのポリシーはそれぞれ独立して発火し、タスク数は最後に発火したポリシーの値になる
 */
export class ServiceAutoScaling extends Construct {
  public readonly scalableTaskCount: aws_ecs.ScalableTaskCount;

  constructor(scope: Construct, id: string, params: IServiceAutoScaling) {
    super(scope, id);
    const { service, targetGroup, requestScaling } = params;

    validateReplicaBounds({ minCapacity: params.minReplicas, maxCapacity: params.maxReplicas }, "replicas");
    // 重なりや空の区間がないことを確認する
    normalizeSteps(requestScaling.steps, "requestScaling.steps");

    const scaling = service.autoScaleTaskCount({
      minCapacity: params.minReplicas,
      maxCapacity: params.maxReplicas,
    });

    scaling.scaleOnCpuUtilization("CpuScaling", {
      targetUtilizationPercent: params.cpuTargetPercent,
      scaleInCooldown: Duration.seconds(params.cpuScaleInCooldownSeconds),
      scaleOutCooldown: Duration.seconds(params.cpuScaleOutCooldownSeconds),
    });

    scaling.scaleOnMetric("RequestScaling", {
      metric: targetGroup.metrics.requestCountPerTarget({ period: Duration.minutes(1) }),
      scalingSteps: requestScaling.steps,
      adjustmentType: aws_applicationautoscaling.AdjustmentType.CHANGE_IN_CAPACITY,
      cooldown: Duration.seconds(requestScaling.cooldownSeconds),
    });

    this.scalableTaskCount = scaling;
  }
}
