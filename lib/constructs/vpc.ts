import { aws_ec2 } from "aws-cdk-lib";
import { Construct } from "constructs";
import { environment, prefix } from "./params";

/** bridgeモードでECSが割り当てる動的ホストポート */
export const EPHEMERAL_PORT_RANGE = aws_ec2.Port.tcpRange(32768, 65535);

/**
 * VPC環境
 * - public: ALB, NAT Gateway
 * - application: ECSのEC2インスタンス
 */
export class Vpc extends Construct {
  public readonly vpc: aws_ec2.IVpc;

  constructor(scope: Construct, id: string, props: { environment: environment }) {
    super(scope, id);

    this.vpc = new aws_ec2.Vpc(this, "Vpc", {
      vpcName: `${prefix}-vpc-${props.environment}`,
      ipAddresses: aws_ec2.IpAddresses.cidr("10.0.0.0/16"),
      maxAzs: 2,
      natGateways: 1,
      restrictDefaultSecurityGroup: false,
      subnetConfiguration: [
        {
          subnetType: aws_ec2.SubnetType.PUBLIC,
          name: "public",
          cidrMask: 24,
        },
        {
          subnetType: aws_ec2.SubnetType.PRIVATE_WITH_EGRESS,
          name: "application",
          cidrMask: 24,
        },
      ],
    });
  }
}

/**
 * VPC環境に作成するSecurityGroupを一括して作成する
 * - ALB
 * - ECS(EC2)
 *
 * bridgeモードのため、ALB→EC2の動的ポートはingress/egressを対で開ける
 */
export class SecurityGroups extends Construct {
  public readonly albSecurityGroup: aws_ec2.ISecurityGroup;
  public readonly computeSecurityGroup: aws_ec2.ISecurityGroup;

  constructor(
    scope: Construct,
    id: string,
    props: { vpc: aws_ec2.IVpc; environment: environment; enableHttps: boolean },
  ) {
    super(scope, id);
    const { vpc, environment, enableHttps } = props;

    // SecurityGroupsの定義
    const albSecurityGroup = new aws_ec2.SecurityGroup(this, "AlbForAppServiceSg", {
      vpc,
      securityGroupName: `${prefix}-alb-sg-${environment}`,
      description: "security group to ALB for application",
      allowAllOutbound: false,
    });
    albSecurityGroup.addIngressRule(aws_ec2.Peer.anyIpv4(), aws_ec2.Port.tcp(80), "allow HTTP");
    if (enableHttps) {
      albSecurityGroup.addIngressRule(aws_ec2.Peer.anyIpv4(), aws_ec2.Port.tcp(443), "allow HTTPS");
    }

    const computeSecurityGroup = new aws_ec2.SecurityGroup(this, "EcsForAppServiceSg", {
      vpc,
      securityGroupName: `${prefix}-ecs-sg-${environment}`,
      description: "security group to ECS container instances for application",
      allowAllOutbound: true,
    });
    computeSecurityGroup.addIngressRule(
      albSecurityGroup,
      EPHEMERAL_PORT_RANGE,
      "Allow ALB to reach ECS tasks on dynamic host ports (bridge mode)",
    );
    albSecurityGroup.addEgressRule(
      computeSecurityGroup,
      EPHEMERAL_PORT_RANGE,
      "Allow ALB egress to ECS instances on dynamic host ports",
    );

    this.albSecurityGroup = albSecurityGroup;
    this.computeSecurityGroup = computeSecurityGroup;
  }
}
