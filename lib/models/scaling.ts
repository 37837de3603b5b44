import { ConfigurationError } from "../errors";

/** `aws_applicationautoscaling.ScalingInterval` と同じ形 */
export interface IScalingStep {
  lower?: number;
  upper?: number;
  change: number;
}

/** 正規化後の区間。lower を含み upper を含まない */
export interface ScalingInterval {
  lower: number;
  upper: number;
  change: number;
}

export interface IReplicaBounds {
  minCapacity: number;
  maxCapacity: number;
}

export interface ScalingActivity {
  policyName: string;
  /** epoch seconds */
  firedAt: number;
  fromCapacity: number;
  desiredCapacity: number;
}

export const validateReplicaBounds = (bounds: IReplicaBounds, field = "replicas"): IReplicaBounds => {
  const { minCapacity, maxCapacity } = bounds;
  if (!Number.isInteger(minCapacity) || minCapacity < 1) {
    throw new ConfigurationError(`${field}.min`, `must be an integer >= 1, got ${minCapacity}`);
  }
  if (!Number.isInteger(maxCapacity) || maxCapacity < minCapacity) {
    throw new ConfigurationError(`${field}.max`, `must be an integer >= ${minCapacity}, got ${maxCapacity}`);
  }
  return bounds;
};

export const clampCapacity = (capacity: number, bounds: IReplicaBounds): number =>
  Math.min(bounds.maxCapacity, Math.max(bounds.minCapacity, capacity));

const sortKey = (step: IScalingStep): number => step.lower ?? step.upper ?? Number.NEGATIVE_INFINITY;

/**
 * ステップを実数全体を隙間なく覆う区間列に変換する。
 * 隙間は change 0 の区間で埋める（Application Auto Scaling のステップポリシーと同じ扱い）。
 *
 * 例: `[{upper: 50, change: -1}, {lower: 100, change: 1}, {lower: 200, change: 2}]`
 * は `(-∞,50)=-1, [50,100)=0, [100,200)=+1, [200,∞)=+2` になる
 */
export const normalizeSteps = (steps: IScalingStep[], field = "scalingSteps"): ScalingInterval[] => {
  // ステップスケーリングのポリシーは2区間以上を要求する
  if (steps.length < 2) {
    throw new ConfigurationError(field, `at least 2 steps are required, got ${steps.length}`);
  }
  steps.forEach((step, index) => {
    if (step.lower === undefined && step.upper === undefined) {
      throw new ConfigurationError(`${field}[${index}]`, "either lower or upper must be set");
    }
    if (!Number.isInteger(step.change)) {
      throw new ConfigurationError(`${field}[${index}].change`, `must be an integer, got ${step.change}`);
    }
  });

  const sorted = [...steps].sort((a, b) => sortKey(a) - sortKey(b));
  const bounded: ScalingInterval[] = [];
  sorted.forEach((step, index) => {
    const previous = bounded[bounded.length - 1];
    const next = sorted[index + 1];
    const lower = step.lower ?? (previous === undefined ? Number.NEGATIVE_INFINITY : previous.upper);
    let upper = step.upper;
    if (upper === undefined) {
      if (next === undefined) {
        upper = Number.POSITIVE_INFINITY;
      } else if (next.lower !== undefined) {
        upper = next.lower;
      } else {
        throw new ConfigurationError(`${field}[${index}]`, "upper bound is ambiguous, set it explicitly");
      }
    }
    if (lower >= upper) {
      throw new ConfigurationError(`${field}[${index}]`, `empty interval [${lower}, ${upper})`);
    }
    bounded.push({ lower, upper, change: step.change });
  });

  const intervals: ScalingInterval[] = [];
  let cursor = Number.NEGATIVE_INFINITY;
  for (const interval of bounded) {
    if (interval.lower < cursor) {
      throw new ConfigurationError(field, `interval starting at ${interval.lower} overlaps the one ending at ${cursor}`);
    }
    if (interval.lower > cursor) {
      intervals.push({ lower: cursor, upper: interval.lower, change: 0 });
    }
    intervals.push(interval);
    cursor = interval.upper;
  }
  if (cursor < Number.POSITIVE_INFINITY) {
    intervals.push({ lower: cursor, upper: Number.POSITIVE_INFINITY, change: 0 });
  }
  if (intervals.every(({ change }) => change === 0)) {
    throw new ConfigurationError(field, "at least one step must change the capacity");
  }
  return intervals;
};

export const selectStep = (intervals: ScalingInterval[], value: number): ScalingInterval => {
  const matched = intervals.filter(({ lower, upper }) => value >= lower && value < upper);
  if (matched.length !== 1) {
    throw new RangeError(`expected exactly one interval to contain ${value}, found ${matched.length}`);
  }
  return matched[0];
};

export interface ScalingPolicyModel {
  readonly name: string;
  evaluate(metric: number, currentCapacity: number, now: number): ScalingActivity | undefined;
}

export interface IStepScalingPolicy {
  name: string;
  steps: IScalingStep[];
  cooldownSeconds: number;
  bounds: IReplicaBounds;
}

/** メトリクス値の属する区間の change を現在のタスク数に加える */
export class StepScalingPolicyModel implements ScalingPolicyModel {
  public readonly name: string;
  public readonly intervals: ScalingInterval[];
  private lastFiredAt: number | undefined;

  constructor(private readonly props: IStepScalingPolicy) {
    this.name = props.name;
    this.intervals = normalizeSteps(props.steps);
    validateReplicaBounds(props.bounds);
  }

  evaluate(metric: number, currentCapacity: number, now: number): ScalingActivity | undefined {
    if (this.lastFiredAt !== undefined && now - this.lastFiredAt < this.props.cooldownSeconds) {
      return undefined;
    }
    const { change } = selectStep(this.intervals, metric);
    const desiredCapacity = clampCapacity(currentCapacity + change, this.props.bounds);
    if (desiredCapacity === currentCapacity) {
      return undefined;
    }
    this.lastFiredAt = now;
    return { policyName: this.name, firedAt: now, fromCapacity: currentCapacity, desiredCapacity };
  }
}

export interface ITargetTrackingPolicy {
  name: string;
  targetValue: number;
  scaleInCooldownSeconds: number;
  scaleOutCooldownSeconds: number;
  bounds: IReplicaBounds;
}

/** タスク数をメトリクスに比例させ、目標値に近づける */
export class TargetTrackingPolicyModel implements ScalingPolicyModel {
  public readonly name: string;
  private lastFiredAt: number | undefined;

  constructor(private readonly props: ITargetTrackingPolicy) {
    if (!(props.targetValue > 0)) {
      throw new ConfigurationError(`${props.name}.targetValue`, `must be positive, got ${props.targetValue}`);
    }
    this.name = props.name;
    validateReplicaBounds(props.bounds);
  }

  evaluate(metric: number, currentCapacity: number, now: number): ScalingActivity | undefined {
    const proportional = Math.ceil((Math.max(currentCapacity, 1) * metric) / this.props.targetValue);
    const desiredCapacity = clampCapacity(proportional, this.props.bounds);
    if (desiredCapacity === currentCapacity) {
      return undefined;
    }
    const cooldown =
      desiredCapacity < currentCapacity ? this.props.scaleInCooldownSeconds : this.props.scaleOutCooldownSeconds;
    if (this.lastFiredAt !== undefined && now - this.lastFiredAt < cooldown) {
      return undefined;
    }
    this.lastFiredAt = now;
    return { policyName: this.name, firedAt: now, fromCapacity: currentCapacity, desiredCapacity };
  }
}

/**
 * 複数ポリシーの結果は合算しない。最後に発火したポリシーの desiredCapacity が採用される
 */
export const reconcile = (currentCapacity: number, activities: ScalingActivity[]): number => {
  const latest = activities.reduce<ScalingActivity | undefined>(
    (winner, activity) => (winner === undefined || activity.firedAt >= winner.firedAt ? activity : winner),
    undefined,
  );
  return latest === undefined ? currentCapacity : latest.desiredCapacity;
};
