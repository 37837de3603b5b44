import type { Environment } from "aws-cdk-lib";
import type { IHealthCheckPolicy } from "../models/healthCheck";
import type { IScalingStep } from "../models/scaling";

export const envUsEast1: Environment = {
  account: "111122223333",
  region: "us-east-1",
};

// AWS上に展開している環境の識別子
export type environment = "dev" | "stg" | "prod";
export const environments: readonly environment[] = ["dev", "stg", "prod"];
// サービスの名前など
export const prefix = "chat-ui";
// ナレッジ用バケット名をコンテナに渡す環境変数
export const knowledgeBucketEnvName = "KNOWLEDGE_BUCKET";

/** Secrets Managerのシークレット参照。値そのものはテンプレートに埋め込まれない */
export interface ISecretRef {
  /** コンテナに渡す環境変数名 */
  logicalName: string;
  secretPath: string;
  /** JSON形式のシークレットから取り出すキー */
  field: string;
}

export interface IComputePool {
  instanceType: string;
  minCapacity: number;
  maxCapacity: number;
  desiredCapacity: number;
  /** ECSのマネージドスケーリングが目標とするキャパシティ使用率 */
  targetCapacityPercent: number;
}

export interface IRequestScaling {
  /** 1分あたりのターゲット毎リクエスト数に対するステップ */
  steps: IScalingStep[];
  cooldownSeconds: number;
}

export interface IFirewall {
  /** 空の場合は国によるブロックを行わない */
  allowedCountryCodes: string[];
  blockedIpAddresses: string[];
}

export interface IObservability {
  enabled: boolean;
  accessLogRetentionDays: number;
  dashboardName: string;
}

export interface IChatUiEcsEc2 {
  environment: environment;
  domainName?: string;
  /** 例: `app` → `app.example.com` */
  subdomain?: string;
  enableHttps: boolean;
  /** `repository:tag` もしくは `repository@sha256:...` */
  containerImage: string;
  containerPort: number;
  taskMemoryLimitMiB: number;
  enableExecuteCommand: boolean;
  secretRefs: ISecretRef[];
  envVars: Record<string, string>;
  desiredReplicas: number;
  minReplicas: number;
  maxReplicas: number;
  cpuTargetPercent: number;
  /** アラームの通知先。未指定の場合はSNSトピックのみ作成する */
  notifyEmail?: string;
  cpuScaleInCooldownSeconds: number;
  cpuScaleOutCooldownSeconds: number;
  requestScaling: IRequestScaling;
  computePool: IComputePool;
  healthCheck: IHealthCheckPolicy;
  firewall: IFirewall;
  observability: IObservability;
  enableKnowledgeBucket: boolean;
}

export const paramsChatUiEcsEc2: IChatUiEcsEc2 = {
  environment: "dev",
  domainName: "your.domain.com",
  subdomain: "chat",
  enableHttps: true,
  containerImage: "lobehub/lobe-chat:latest",
  containerPort: 3210,
  taskMemoryLimitMiB: 1024,
  enableExecuteCommand: true,
  secretRefs: [
    { logicalName: "OPENAI_API_KEY", secretPath: "chat-ui/openai-api-key", field: "OPENAI_API_KEY" },
    { logicalName: "GOOGLE_API_KEY", secretPath: "chat-ui/google-api-key", field: "GOOGLE_API_KEY" },
  ],
  envVars: {
    NEXT_PUBLIC_ENABLE_AUTH: "false",
  },
  desiredReplicas: 2,
  minReplicas: 1,
  maxReplicas: 6,
  cpuTargetPercent: 30,
  cpuScaleInCooldownSeconds: 60,
  cpuScaleOutCooldownSeconds: 60,
  requestScaling: {
    steps: [
      { upper: 50, change: -1 },
      { lower: 100, change: +1 },
      { lower: 200, change: +2 },
    ],
    cooldownSeconds: 60,
  },
  computePool: {
    instanceType: "t3.small",
    minCapacity: 1,
    maxCapacity: 4,
    desiredCapacity: 2,
    targetCapacityPercent: 80,
  },
  healthCheck: {
    path: "/",
    healthyHttpCodes: "200-399",
    intervalSeconds: 30,
    timeoutSeconds: 20,
    healthyThresholdCount: 2,
    unhealthyThresholdCount: 5,
  },
  firewall: {
    allowedCountryCodes: ["US"],
    blockedIpAddresses: [],
  },
  observability: {
    enabled: true,
    accessLogRetentionDays: 30,
    dashboardName: `${prefix}-dashboard`,
  },
  enableKnowledgeBucket: true,
};
