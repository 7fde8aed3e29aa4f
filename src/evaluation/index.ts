export { evaluate, averageScores, buildScoringInput, scoreWithMetrics } from './evaluate';
export type { EvaluateOptions } from './evaluate';
export { BaseMetric, ExactMatch, Contains, RegexMatch, IsJson } from './metrics';
export type {
  EvaluationResult,
  EvaluationTask,
  ScoreResult,
  ScoringInput,
  TaskOutput,
  TestResult,
} from './types';
