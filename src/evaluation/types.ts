import type { DatasetItemRecord } from '../dataset';

/** Dataset item fields merged with the task output, as seen by metrics */
export type ScoringInput = Record<string, unknown>;

export interface ScoreResult {
  name: string;
  value: number;
  reason?: string;
  /** Set when the metric threw. Failed scores are reported but not logged as feedback. */
  scoringFailed?: boolean;
}

export type TaskOutput = Record<string, unknown>;

export type EvaluationTask = (item: DatasetItemRecord) => TaskOutput | Promise<TaskOutput>;

export interface TestResult {
  datasetItemId: string;
  traceId: string;
  /** Undefined when the task threw */
  taskOutput?: TaskOutput;
  scoreResults: ScoreResult[];
  /** Message of the error the task threw, if any */
  error?: string;
}

export interface EvaluationResult {
  experimentId: string;
  experimentName: string;
  testResults: TestResult[];
}
