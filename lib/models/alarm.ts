import { aws_cloudwatch } from "aws-cdk-lib";
import { ConfigurationError } from "../errors";

export type AlarmMetricName = "TargetResponseTimeP95" | "UnHealthyHostCount" | "HTTPCodeTarget5XX" | "HTTPCodeELB5XX";

export interface IAlarmDefinition {
  id: string;
  metric: AlarmMetricName;
  threshold: number;
  evaluationPeriods: number;
  datapointsToAlarm: number;
  comparisonOperator: aws_cloudwatch.ComparisonOperator;
  description: string;
}

export type AlarmState = "OK" | "ALARM";

export const validateAlarmDefinition = (definition: IAlarmDefinition): IAlarmDefinition => {
  const field = `alarms.${definition.id}`;
  if (!Number.isInteger(definition.evaluationPeriods) || definition.evaluationPeriods < 1) {
    throw new ConfigurationError(`${field}.evaluationPeriods`, `must be an integer >= 1`);
  }
  if (
    !Number.isInteger(definition.datapointsToAlarm) ||
    definition.datapointsToAlarm < 1 ||
    definition.datapointsToAlarm > definition.evaluationPeriods
  ) {
    throw new ConfigurationError(
      `${field}.datapointsToAlarm`,
      `must be within 1-${definition.evaluationPeriods}, got ${definition.datapointsToAlarm}`,
    );
  }
  return definition;
};

export const breaches = (
  comparisonOperator: aws_cloudwatch.ComparisonOperator,
  value: number,
  threshold: number,
): boolean => {
  switch (comparisonOperator) {
    case aws_cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD:
      return value > threshold;
    case aws_cloudwatch.ComparisonOperator.GREATER_THAN_OR_EQUAL_TO_THRESHOLD:
      return value >= threshold;
    case aws_cloudwatch.ComparisonOperator.LESS_THAN_THRESHOLD:
      return value < threshold;
    case aws_cloudwatch.ComparisonOperator.LESS_THAN_OR_EQUAL_TO_THRESHOLD:
      return value <= threshold;
    default:
      // anomaly detection bands are not modeled
      throw new ConfigurationError("comparisonOperator", `unsupported operator ${comparisonOperator}`);
  }
};

/**
 * 直近 evaluationPeriods 個のデータポイントのうち datapointsToAlarm 個以上が閾値を超えていれば ALARM
 */
export const evaluateAlarm = (definition: IAlarmDefinition, samples: number[]): AlarmState => {
  const window = samples.slice(-definition.evaluationPeriods);
  const breaching = window.filter((value) =>
    breaches(definition.comparisonOperator, value, definition.threshold),
  ).length;
  return breaching >= definition.datapointsToAlarm ? "ALARM" : "OK";
};

/**
 * 通知は ALARM への遷移時のみ。ALARM のまま続いている間は再通知しない
 */
export class AlarmStateMachine {
  private readonly samples: number[] = [];
  private current: AlarmState = "OK";

  constructor(
    private readonly definition: IAlarmDefinition,
    private readonly notify: (definition: IAlarmDefinition) => void,
  ) {
    validateAlarmDefinition(definition);
  }

  get state(): AlarmState {
    return this.current;
  }

  push(value: number): AlarmState {
    this.samples.push(value);
    if (this.samples.length > this.definition.evaluationPeriods) {
      this.samples.shift();
    }
    const next = evaluateAlarm(this.definition, this.samples);
    if (next === "ALARM" && this.current !== "ALARM") {
      this.notify(this.definition);
    }
    this.current = next;
    return next;
  }
}

export const defaultAlarmDefinitions = (): IAlarmDefinition[] => [
  {
    id: "HighP95Latency",
    metric: "TargetResponseTimeP95",
    threshold: 1.0,
    evaluationPeriods: 3,
    datapointsToAlarm: 2,
    comparisonOperator: aws_cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
    description: "p95 target response time > 1s",
  },
  {
    id: "UnhealthyHostsAlarm",
    metric: "UnHealthyHostCount",
    threshold: 0.5,
    evaluationPeriods: 2,
    datapointsToAlarm: 1,
    comparisonOperator: aws_cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
    description: "Any target becomes unhealthy",
  },
  {
    id: "Target5XXAlarm",
    metric: "HTTPCodeTarget5XX",
    threshold: 5,
    evaluationPeriods: 3,
    datapointsToAlarm: 2,
    comparisonOperator: aws_cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
    description: "Target group returning 5xx errors",
  },
  {
    id: "Elb5XXAlarm",
    metric: "HTTPCodeELB5XX",
    threshold: 5,
    evaluationPeriods: 3,
    datapointsToAlarm: 2,
    comparisonOperator: aws_cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
    description: "ALB (frontend) returning 5xx errors",
  },
];
