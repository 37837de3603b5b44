import * as cdk from "aws-cdk-lib";
import { Annotations, Match, Template } from "aws-cdk-lib/assertions";
import { ChatUiEcsEc2Stack } from "../lib/ChatUiEcsEc2Stack";
import { paramsChatUiEcsEc2 } from "../lib/constructs";
import type { IChatUiEcsEc2 } from "../lib/constructs";
import { ConfigurationError } from "../lib/errors";

const env = { account: "123456789012", region: "us-east-1" };

// Template.fromStack で合成済みのスタックは再度合成できないため、アノテーションは別のAppで確認する
const annotationsOf = (id: string, params: IChatUiEcsEc2): Annotations =>
  Annotations.fromStack(new ChatUiEcsEc2Stack(new cdk.App(), id, params, { env }));

const alertsTopic = { Properties: { DisplayName: "Chat UI alerts" } };

const httpsParams: IChatUiEcsEc2 = {
  ...paramsChatUiEcsEc2,
  domainName: "example.com",
  subdomain: "app",
  enableHttps: true,
  containerPort: 3000,
  minReplicas: 1,
  maxReplicas: 6,
  cpuTargetPercent: 30,
  notifyEmail: "ops@example.com",
};

const httpOnlyParams: IChatUiEcsEc2 = {
  ...paramsChatUiEcsEc2,
  domainName: undefined,
  subdomain: undefined,
  enableHttps: false,
  containerImage: "public.ecr.aws/example/chatbot-ui:1.4.2",
  containerPort: 3000,
  secretRefs: [{ logicalName: "OPENAI_API_KEY", secretPath: "chat-ui/openai-api-key", field: "OPENAI_API_KEY" }],
  firewall: { allowedCountryCodes: [], blockedIpAddresses: [] },
  observability: { ...paramsChatUiEcsEc2.observability, enabled: false },
  enableKnowledgeBucket: false,
};

describe("ChatUiEcsEc2Stack", () => {
  describe("HTTPS with DNS", () => {
    let template: Template;

    beforeAll(() => {
      const app = new cdk.App();
      template = Template.fromStack(new ChatUiEcsEc2Stack(app, "TestStack", httpsParams, { env }));
    });

    test("creates exactly one load balancer, one service and one DNS record", () => {
      template.resourceCountIs("AWS::ElasticLoadBalancingV2::LoadBalancer", 1);
      template.resourceCountIs("AWS::ECS::Service", 1);
      template.resourceCountIs("AWS::Route53::RecordSet", 1);
    });

    test("DNS record aliases the subdomain to the load balancer", () => {
      template.hasResourceProperties("AWS::Route53::RecordSet", {
        Name: "app.example.com.",
        Type: "A",
        AliasTarget: {
          DNSName: Match.anyValue(),
          HostedZoneId: {
            "Fn::GetAtt": [Match.stringLikeRegexp("ApplicationLoadBalancer"), "CanonicalHostedZoneID"],
          },
        },
      });
    });

    test("issues a DNS validated certificate for the subdomain", () => {
      template.hasResourceProperties("AWS::CertificateManager::Certificate", {
        DomainName: "app.example.com",
        ValidationMethod: "DNS",
      });
    });

    test("outputs the load balancer address, cluster, bucket and alerts topic", () => {
      const outputs = Object.keys(template.findOutputs("*")).sort();
      expect(outputs).toEqual(["AlertsSnsTopicArn", "ClusterName", "KnowledgeBucketName", "LoadBalancerDNS"]);
      template.hasOutput("LoadBalancerDNS", {
        Value: { "Fn::GetAtt": [Match.stringLikeRegexp("ApplicationLoadBalancer"), "DNSName"] },
      });
    });

    describe("VPC and security groups", () => {
      test("creates public and private subnets in 2 AZs with one NAT gateway", () => {
        template.resourceCountIs("AWS::EC2::Subnet", 4);
        template.resourceCountIs("AWS::EC2::NatGateway", 1);
      });

      test("opens HTTP and HTTPS on the ALB", () => {
        template.hasResourceProperties("AWS::EC2::SecurityGroup", {
          GroupDescription: "security group to ALB for application",
          SecurityGroupIngress: Match.arrayWith([
            Match.objectLike({ CidrIp: "0.0.0.0/0", FromPort: 80, ToPort: 80 }),
            Match.objectLike({ CidrIp: "0.0.0.0/0", FromPort: 443, ToPort: 443 }),
          ]),
        });
      });

      test("opens dynamic host ports symmetrically between ALB and container instances", () => {
        template.hasResourceProperties("AWS::EC2::SecurityGroupIngress", {
          IpProtocol: "tcp",
          FromPort: 32768,
          ToPort: 65535,
          Description: "Allow ALB to reach ECS tasks on dynamic host ports (bridge mode)",
        });
        template.hasResourceProperties("AWS::EC2::SecurityGroupEgress", {
          IpProtocol: "tcp",
          FromPort: 32768,
          ToPort: 65535,
          Description: "Allow ALB egress to ECS instances on dynamic host ports",
        });
      });
    });

    describe("Compute capacity", () => {
      test("creates the auto scaling group with the pool bounds", () => {
        template.hasResourceProperties("AWS::AutoScaling::AutoScalingGroup", {
          MinSize: "1",
          MaxSize: "4",
          DesiredCapacity: "2",
        });
      });

      test("registers the capacity provider as the cluster default with weight 1", () => {
        template.hasResourceProperties("AWS::ECS::CapacityProvider", {
          AutoScalingGroupProvider: Match.objectLike({
            ManagedScaling: Match.objectLike({ Status: "ENABLED", TargetCapacity: 80 }),
            ManagedTerminationProtection: "DISABLED",
          }),
        });
        template.hasResourceProperties("AWS::ECS::ClusterCapacityProviderAssociations", {
          DefaultCapacityProviderStrategy: [Match.objectLike({ Weight: 1 })],
        });
      });
    });

    describe("ECS service", () => {
      test("runs the registry image in bridge mode with a dynamic host port", () => {
        template.hasResourceProperties("AWS::ECS::TaskDefinition", {
          NetworkMode: "bridge",
          ContainerDefinitions: [
            Match.objectLike({
              Image: "lobehub/lobe-chat:latest",
              Memory: 1024,
              PortMappings: [{ ContainerPort: 3000, HostPort: 0, Protocol: "tcp" }],
            }),
          ],
        });
      });

      test("passes environment variables and secret references, not secret values", () => {
        template.hasResourceProperties("AWS::ECS::TaskDefinition", {
          ContainerDefinitions: [
            Match.objectLike({
              Environment: Match.arrayWith([{ Name: "NEXT_PUBLIC_ENABLE_AUTH", Value: "false" }]),
              Secrets: [
                { Name: "OPENAI_API_KEY", ValueFrom: Match.anyValue() },
                { Name: "GOOGLE_API_KEY", ValueFrom: Match.anyValue() },
              ],
            }),
          ],
        });
      });

      test("places tasks through the capacity provider with ECS Exec enabled", () => {
        template.hasResourceProperties("AWS::ECS::Service", {
          DesiredCount: 2,
          EnableExecuteCommand: true,
          CapacityProviderStrategy: [Match.objectLike({ Weight: 1 })],
          HealthCheckGracePeriodSeconds: 120,
        });
      });

      test("grants the task role read access to the knowledge bucket", () => {
        template.hasResourceProperties("AWS::IAM::Policy", {
          PolicyDocument: {
            Statement: Match.arrayWith([
              Match.objectLike({
                Action: Match.arrayWith(["s3:GetObject*", "s3:GetBucket*", "s3:List*"]),
                Effect: "Allow",
              }),
            ]),
          },
        });
      });
    });

    describe("Load balancer", () => {
      test("listens on HTTPS and redirects HTTP", () => {
        template.hasResourceProperties("AWS::ElasticLoadBalancingV2::Listener", {
          Port: 443,
          Protocol: "HTTPS",
        });
        template.hasResourceProperties("AWS::ElasticLoadBalancingV2::Listener", {
          Port: 80,
          Protocol: "HTTP",
          DefaultActions: [
            {
              Type: "redirect",
              RedirectConfig: { Port: "443", Protocol: "HTTPS", StatusCode: "HTTP_301" },
            },
          ],
        });
      });

      test("configures the target group health check", () => {
        template.hasResourceProperties("AWS::ElasticLoadBalancingV2::TargetGroup", {
          HealthCheckPath: "/",
          HealthCheckPort: "traffic-port",
          HealthCheckIntervalSeconds: 30,
          HealthCheckTimeoutSeconds: 20,
          HealthyThresholdCount: 2,
          UnhealthyThresholdCount: 5,
          Matcher: { HttpCode: "200-399" },
          TargetGroupAttributes: Match.arrayWith([{ Key: "deregistration_delay.timeout_seconds", Value: "30" }]),
        });
      });

      test("sets the idle timeout and access logs", () => {
        template.hasResourceProperties("AWS::ElasticLoadBalancingV2::LoadBalancer", {
          Scheme: "internet-facing",
          LoadBalancerAttributes: Match.arrayWith([
            { Key: "idle_timeout.timeout_seconds", Value: "120" },
            { Key: "access_logs.s3.enabled", Value: "true" },
            { Key: "access_logs.s3.prefix", Value: "alb-logs" },
          ]),
        });
      });
    });

    describe("Autoscaling", () => {
      test("bounds the task count to [1, 6]", () => {
        template.hasResourceProperties("AWS::ApplicationAutoScaling::ScalableTarget", {
          MinCapacity: 1,
          MaxCapacity: 6,
          ScalableDimension: "ecs:service:DesiredCount",
        });
      });

      test("tracks 30% CPU with 60 second cooldowns", () => {
        template.hasResourceProperties("AWS::ApplicationAutoScaling::ScalingPolicy", {
          PolicyType: "TargetTrackingScaling",
          TargetTrackingScalingPolicyConfiguration: {
            PredefinedMetricSpecification: { PredefinedMetricType: "ECSServiceAverageCPUUtilization" },
            TargetValue: 30,
            ScaleInCooldown: 60,
            ScaleOutCooldown: 60,
          },
        });
      });

      test("steps on the request count per target", () => {
        template.hasResourceProperties("AWS::ApplicationAutoScaling::ScalingPolicy", {
          PolicyType: "StepScaling",
          StepScalingPolicyConfiguration: Match.objectLike({
            AdjustmentType: "ChangeInCapacity",
            Cooldown: 60,
            StepAdjustments: Match.arrayWith([Match.objectLike({ ScalingAdjustment: 2 })]),
          }),
        });
        template.hasResourceProperties("AWS::ApplicationAutoScaling::ScalingPolicy", {
          PolicyType: "StepScaling",
          StepScalingPolicyConfiguration: Match.objectLike({
            StepAdjustments: [Match.objectLike({ ScalingAdjustment: -1 })],
          }),
        });
        template.hasResourceProperties("AWS::CloudWatch::Alarm", {
          MetricName: "RequestCountPerTarget",
          Threshold: 100,
        });
      });
    });

    describe("WAF", () => {
      test("orders rules by unique ascending priority", () => {
        const webAcls = Object.values(template.findResources("AWS::WAFv2::WebACL"));
        expect(webAcls).toHaveLength(1);
        const rules: { Name: string; Priority: number }[] = webAcls[0].Properties.Rules;
        expect(rules.map((rule) => [rule.Name, rule.Priority])).toEqual([
          ["BlockNonAllowedCountries", 0],
          ["CommonRuleSet", 1],
          ["SQLiRuleSet", 2],
          ["BadInputsRuleSet", 3],
        ]);
      });

      test("blocks requests from outside the allowed countries", () => {
        template.hasResourceProperties("AWS::WAFv2::WebACL", {
          Scope: "REGIONAL",
          DefaultAction: { Allow: {} },
          Rules: Match.arrayWith([
            Match.objectLike({
              Name: "BlockNonAllowedCountries",
              Action: { Block: {} },
              Statement: { NotStatement: { Statement: { GeoMatchStatement: { CountryCodes: ["US"] } } } },
            }),
            Match.objectLike({
              Name: "CommonRuleSet",
              OverrideAction: { None: {} },
              Statement: {
                ManagedRuleGroupStatement: { VendorName: "AWS", Name: "AWSManagedRulesCommonRuleSet" },
              },
            }),
          ]),
        });
      });

      test("associates the web ACL with the load balancer", () => {
        template.hasResourceProperties("AWS::WAFv2::WebACLAssociation", {
          ResourceArn: { Ref: Match.stringLikeRegexp("ApplicationLoadBalancer") },
        });
      });
    });

    describe("Observability", () => {
      test("expires access logs after 30 days", () => {
        template.hasResourceProperties("AWS::S3::Bucket", {
          OwnershipControls: { Rules: [{ ObjectOwnership: "ObjectWriter" }] },
          LifecycleConfiguration: {
            Rules: [Match.objectLike({ ExpirationInDays: 30, Status: "Enabled" })],
          },
        });
      });

      test("subscribes the notification email to the alerts topic", () => {
        expect(Object.keys(template.findResources("AWS::SNS::Topic", alertsTopic))).toEqual([
          expect.stringMatching(/^ObservabilityAlertsTopic/),
        ]);
        template.hasResourceProperties("AWS::SNS::Subscription", {
          Protocol: "email",
          Endpoint: "ops@example.com",
        });
      });

      test("alarms on p95 latency with 2 of 3 datapoints", () => {
        template.hasResourceProperties("AWS::CloudWatch::Alarm", {
          AlarmDescription: "p95 target response time > 1s",
          MetricName: "TargetResponseTime",
          ExtendedStatistic: "p95",
          Threshold: 1,
          EvaluationPeriods: 3,
          DatapointsToAlarm: 2,
          ComparisonOperator: "GreaterThanThreshold",
          AlarmActions: [{ Ref: Match.stringLikeRegexp("AlertsTopic") }],
        });
      });

      test("alarms on unhealthy hosts and 5xx responses", () => {
        for (const description of [
          "Any target becomes unhealthy",
          "Target group returning 5xx errors",
          "ALB (frontend) returning 5xx errors",
        ]) {
          template.hasResourceProperties("AWS::CloudWatch::Alarm", {
            AlarmDescription: description,
            AlarmActions: [{ Ref: Match.stringLikeRegexp("AlertsTopic") }],
          });
        }
      });

      test("creates the dashboard", () => {
        template.hasResourceProperties("AWS::CloudWatch::Dashboard", {
          DashboardName: "chat-ui-dashboard",
        });
      });

      test("graphs the requests blocked by the web ACL", () => {
        const dashboards = Object.values(template.findResources("AWS::CloudWatch::Dashboard"));
        expect(dashboards).toHaveLength(1);
        const body = JSON.stringify(dashboards[0].Properties.DashboardBody);
        expect(body).toContain("WAF Blocked Requests");
        expect(body).toContain("AWS/WAFV2");
        expect(body).toContain("BlockedRequests");
        expect(body).toContain("chat-ui-waf-web-acl-dev");
      });
    });

    describe("Annotations", () => {
      let annotations: Annotations;

      beforeAll(() => {
        annotations = annotationsOf("AnnotatedStack", httpsParams);
      });

      test("warns about the mutable image tag", () => {
        annotations.hasWarning(
          "*",
          Match.stringLikeRegexp('"lobehub/lobe-chat:latest" is referenced by a mutable tag'),
        );
      });

      test("documents that the geo rule has no exceptions", () => {
        annotations.hasWarning("*", Match.stringLikeRegexp("including operators and external health checkers"));
      });
    });
  });

  describe("HTTP only", () => {
    let template: Template;

    beforeAll(() => {
      const app = new cdk.App();
      template = Template.fromStack(new ChatUiEcsEc2Stack(app, "HttpStack", httpOnlyParams, { env }));
    });

    test("serves HTTP without a certificate, DNS record or redirect", () => {
      template.resourceCountIs("AWS::ElasticLoadBalancingV2::Listener", 1);
      template.hasResourceProperties("AWS::ElasticLoadBalancingV2::Listener", { Port: 80, Protocol: "HTTP" });
      template.resourceCountIs("AWS::CertificateManager::Certificate", 0);
      template.resourceCountIs("AWS::Route53::RecordSet", 0);
    });

    test("skips the optional bucket and observability pack", () => {
      template.resourceCountIs("AWS::S3::Bucket", 0);
      expect(template.findResources("AWS::SNS::Topic", alertsTopic)).toEqual({});
      template.resourceCountIs("AWS::CloudWatch::Dashboard", 0);
      expect(Object.keys(template.findOutputs("*")).sort()).toEqual(["ClusterName", "LoadBalancerDNS"]);
    });

    test("keeps only the managed rule groups", () => {
      const webAcl = Object.values(template.findResources("AWS::WAFv2::WebACL"))[0];
      const names: string[] = webAcl.Properties.Rules.map((rule: { Name: string }) => rule.Name);
      expect(names).toEqual(["CommonRuleSet", "SQLiRuleSet", "BadInputsRuleSet"]);
    });

    test("warns that HTTPS is disabled and does not flag a pinned image", () => {
      const annotations = annotationsOf("AnnotatedHttpStack", httpOnlyParams);
      annotations.hasWarning("*", "HTTPS is disabled; the load balancer serves plain HTTP on port 80.");
      annotations.hasNoWarning("*", Match.stringLikeRegexp("mutable tag"));
    });
  });

  describe("Configuration errors", () => {
    test("rejects HTTPS without a domain before creating the stack", () => {
      const app = new cdk.App();
      const params: IChatUiEcsEc2 = { ...httpsParams, domainName: undefined, subdomain: undefined };
      expect(() => new ChatUiEcsEc2Stack(app, "Invalid", params, { env })).toThrow(ConfigurationError);
      expect(app.node.children).toHaveLength(0);
    });

    test("rejects inverted replica bounds", () => {
      const app = new cdk.App();
      const params: IChatUiEcsEc2 = { ...httpsParams, minReplicas: 4, maxReplicas: 2, desiredReplicas: 3 };
      expect(() => new ChatUiEcsEc2Stack(app, "Invalid", params, { env })).toThrow(
        "replicas.max: must be an integer >= 4, got 2",
      );
      expect(app.node.children).toHaveLength(0);
    });

    test("rejects a single request scaling step before creating the stack", () => {
      const app = new cdk.App();
      const params: IChatUiEcsEc2 = {
        ...httpsParams,
        requestScaling: { steps: [{ lower: 100, change: 1 }], cooldownSeconds: 60 },
      };
      expect(() => new ChatUiEcsEc2Stack(app, "Invalid", params, { env })).toThrow(
        "requestScaling.steps: at least 2 steps are required, got 1",
      );
      expect(app.node.children).toHaveLength(0);
    });

    test("rejects an environment variable that the knowledge bucket would overwrite", () => {
      const app = new cdk.App();
      const params: IChatUiEcsEc2 = { ...httpsParams, envVars: { KNOWLEDGE_BUCKET: "my-own-bucket" } };
      expect(() => new ChatUiEcsEc2Stack(app, "Invalid", params, { env })).toThrow(
        'envVars.KNOWLEDGE_BUCKET: "KNOWLEDGE_BUCKET" is reserved for the knowledge bucket',
      );
      expect(app.node.children).toHaveLength(0);
    });
  });
});
