import { aws_autoscaling, aws_ec2, aws_ecs } from "aws-cdk-lib";
import { Construct } from "constructs";
import { environment, IComputePool, prefix } from "./params";

export interface IComputeCapacity {
  environment: environment;
  vpc: aws_ec2.IVpc;
  computeSecurityGroup: aws_ec2.ISecurityGroup;
  computePool: IComputePool;
}

/**
 * ECSクラスタとEC2のキャパシティ
 * AutoScalingGroupはCapacity Provider経由でクラスタに紐づけ、
 * デフォルトのキャパシティプロバイダ戦略(weight: 1)として登録する
 */
export class ComputeCapacity extends Construct {
  public readonly cluster: aws_ecs.ICluster;
  public readonly capacityProvider: aws_ecs.AsgCapacityProvider;

  constructor(scope: Construct, id: string, params: IComputeCapacity) {
    super(scope, id);
    const { environment, vpc, computeSecurityGroup, computePool } = params;

    const cluster = new aws_ecs.Cluster(this, "EcsCluster", {
      vpc,
      clusterName: `${prefix}-cluster-${environment}`,
    });

    const autoScalingGroup = new aws_autoscaling.AutoScalingGroup(this, "Ec2Asg", {
      vpc,
      vpcSubnets: { subnetType: aws_ec2.SubnetType.PRIVATE_WITH_EGRESS },
      instanceType: new aws_ec2.InstanceType(computePool.instanceType),
      machineImage: aws_ecs.EcsOptimizedImage.amazonLinux2(),
      securityGroup: computeSecurityGroup,
      minCapacity: computePool.minCapacity,
      maxCapacity: computePool.maxCapacity,
      desiredCapacity: computePool.desiredCapacity,
    });

    const capacityProvider = new aws_ecs.AsgCapacityProvider(this, "AsgCapacityProvider", {
      autoScalingGroup,
      enableManagedScaling: true,
      targetCapacityPercent: computePool.targetCapacityPercent,
      enableManagedTerminationProtection: false,
    });
    cluster.addAsgCapacityProvider(capacityProvider);
    cluster.addDefaultCapacityProviderStrategy([{ capacityProvider: capacityProvider.capacityProviderName, weight: 1 }]);

    this.cluster = cluster;
    this.capacityProvider = capacityProvider;
  }
}
