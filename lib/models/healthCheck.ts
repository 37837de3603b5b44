import { ConfigurationError } from "../errors";

export interface IHealthCheckPolicy {
  path: string;
  /** `200`, `200-399`, `200,302` の形式 */
  healthyHttpCodes: string;
  intervalSeconds: number;
  timeoutSeconds: number;
  healthyThresholdCount: number;
  unhealthyThresholdCount: number;
}

export interface HttpCodeRange {
  from: number;
  to: number;
}

const HTTP_CODE_MIN = 200;
const HTTP_CODE_MAX = 499;

const parseCode = (raw: string, field: string): number => {
  if (!/^\d{3}$/.test(raw)) {
    throw new ConfigurationError(field, `invalid HTTP code "${raw}"`);
  }
  const code = Number.parseInt(raw, 10);
  if (code < HTTP_CODE_MIN || code > HTTP_CODE_MAX) {
    throw new ConfigurationError(field, `HTTP code ${code} must be within ${HTTP_CODE_MIN}-${HTTP_CODE_MAX}`);
  }
  return code;
};

/**
 * ALBのターゲットグループが受け付ける`Matcher`の書式をパースする
 * 範囲は両端を含む
 */
export const parseHttpCodes = (codes: string, field = "healthCheck.healthyHttpCodes"): HttpCodeRange[] => {
  const parts = codes.split(",").map((part) => part.trim());
  if (parts.some((part) => part.length === 0)) {
    throw new ConfigurationError(field, `empty entry in "${codes}"`);
  }
  return parts.map((part) => {
    const [lower, upper, ...rest] = part.split("-");
    if (rest.length > 0) {
      throw new ConfigurationError(field, `invalid range "${part}"`);
    }
    const from = parseCode(lower, field);
    const to = upper === undefined ? from : parseCode(upper, field);
    if (to < from) {
      throw new ConfigurationError(field, `range "${part}" is inverted`);
    }
    return { from, to };
  });
};

export const matchesHttpCodes = (ranges: HttpCodeRange[], statusCode: number): boolean =>
  ranges.some(({ from, to }) => statusCode >= from && statusCode <= to);

const requireWithin = (field: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigurationError(field, `must be an integer within ${min}-${max}, got ${value}`);
  }
};

/**
 * ALBのヘルスチェック制約
 * - interval: 5-300秒
 * - timeout: 2-120秒、かつ interval 未満
 * - threshold: 2-10回
 */
export const validateHealthCheck = (policy: IHealthCheckPolicy): IHealthCheckPolicy => {
  if (!policy.path.startsWith("/")) {
    throw new ConfigurationError("healthCheck.path", `must start with "/", got "${policy.path}"`);
  }
  parseHttpCodes(policy.healthyHttpCodes);
  requireWithin("healthCheck.intervalSeconds", policy.intervalSeconds, 5, 300);
  requireWithin("healthCheck.timeoutSeconds", policy.timeoutSeconds, 2, 120);
  requireWithin("healthCheck.healthyThresholdCount", policy.healthyThresholdCount, 2, 10);
  requireWithin("healthCheck.unhealthyThresholdCount", policy.unhealthyThresholdCount, 2, 10);
  if (policy.timeoutSeconds >= policy.intervalSeconds) {
    throw new ConfigurationError(
      "healthCheck.timeoutSeconds",
      `timeout (${policy.timeoutSeconds}s) must be less than interval (${policy.intervalSeconds}s)`,
    );
  }
  return policy;
};

export type TargetHealthState = "initial" | "healthy" | "unhealthy";

/**
 * 1ターゲット分のヘルス状態
 * 連続成功が healthyThresholdCount に達すると healthy、
 * 連続失敗が unhealthyThresholdCount に達すると unhealthy になる
 */
export class TargetHealthTracker {
  private readonly ranges: HttpCodeRange[];
  private consecutiveSuccesses = 0;
  private consecutiveFailures = 0;
  private current: TargetHealthState = "initial";

  constructor(private readonly policy: IHealthCheckPolicy) {
    validateHealthCheck(policy);
    this.ranges = parseHttpCodes(policy.healthyHttpCodes);
  }

  get state(): TargetHealthState {
    return this.current;
  }

  /**
   * @param statusCode プローブの応答コード。タイムアウトした場合は`undefined`
   * @param elapsedSeconds 応答までの秒数
   */
  observe(statusCode: number | undefined, elapsedSeconds = 0): TargetHealthState {
    const success =
      statusCode !== undefined &&
      elapsedSeconds < this.policy.timeoutSeconds &&
      matchesHttpCodes(this.ranges, statusCode);

    if (success) {
      this.consecutiveSuccesses += 1;
      this.consecutiveFailures = 0;
      if (this.consecutiveSuccesses >= this.policy.healthyThresholdCount) {
        this.current = "healthy";
      }
    } else {
      this.consecutiveFailures += 1;
      this.consecutiveSuccesses = 0;
      if (this.consecutiveFailures >= this.policy.unhealthyThresholdCount) {
        this.current = "unhealthy";
      }
    }
    return this.current;
  }
}
