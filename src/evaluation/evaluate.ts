/**
 * Run a task over a dataset and score every output.
 *
 * Each dataset item gets its own `evaluation_task` trace. The task runs inside
 * that trace, so functions wrapped with `track` nest under it. Scores are
 * logged as feedback scores on the trace and the trace is linked to its
 * dataset item through an experiment.
 *
 * @example
 * ```typescript
 * const client = new Tracelet();
 * const dataset = await client.getDataset('capitals');
 *
 * const result = await evaluate({
 *   client,
 *   dataset,
 *   task: async (item) => ({ output: await answer(String(item.input)) }),
 *   scoringMetrics: [new ExactMatch(), new Contains()],
 *   experimentName: 'baseline',
 * });
 * ```
 */

import { getTrackClient, type Tracelet } from '../client';
import type { Dataset, DatasetItemRecord } from '../dataset';
import { errorMessage } from '../errors';
import { FeedbackScoreSchema } from '../feedback';
import type { Logger } from '../logger';
import { runInContext, type Trace } from '../tracing';
import type { BaseMetric } from './metrics';
import type { EvaluationResult, EvaluationTask, ScoreResult, ScoringInput, TaskOutput, TestResult } from './types';

const DEFAULT_TASK_CONCURRENCY = 4;

const ScoreResultSchema = FeedbackScoreSchema.pick({ name: true, value: true });

export interface EvaluateOptions {
  dataset: Dataset;
  task: EvaluationTask;
  scoringMetrics?: BaseMetric[];
  experimentName?: string;
  /** Project for the evaluation traces. Defaults to the client's project. */
  projectName?: string;
  /** Stored with the experiment */
  experimentConfig?: Record<string, unknown>;
  /** Evaluate only the first N items */
  nbSamples?: number;
  taskConcurrency?: number;
  /** Expose a value to metrics under another key: `{ metricKey: sourceKey }` */
  scoringKeyMapping?: Record<string, string>;
  client?: Tracelet;
}

/**
 * Merge dataset item fields with the task output, then apply the key mapping
 */
export function buildScoringInput(
  item: DatasetItemRecord,
  taskOutput: TaskOutput,
  scoringKeyMapping: Record<string, string> = {}
): ScoringInput {
  const merged: ScoringInput = {
    input: item.input,
    expectedOutput: item.expectedOutput,
    metadata: item.metadata,
    ...taskOutput,
  };
  for (const [metricKey, sourceKey] of Object.entries(scoringKeyMapping)) {
    if (sourceKey in merged) {
      merged[metricKey] = merged[sourceKey];
    }
  }
  return merged;
}

/**
 * Mark a score that could not be logged as feedback as failed
 */
function checkScore(metric: BaseMetric, result: ScoreResult): ScoreResult {
  if (result.scoringFailed) return result;

  const parsed = ScoreResultSchema.safeParse(result);
  if (parsed.success) return result;

  const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
  return {
    name: result.name || metric.name,
    value: 0,
    reason: `Invalid score: ${issues.join('; ')}`,
    scoringFailed: true,
  };
}

/**
 * Score one input with every metric. A metric that throws produces a failed result instead of an error.
 */
export async function scoreWithMetrics(
  trace: Trace,
  metrics: BaseMetric[],
  input: ScoringInput,
  logger?: Logger
): Promise<ScoreResult[]> {
  if (metrics.length === 0) return [];

  const calculation = trace.span({ name: 'metrics_calculation', input });
  const results: ScoreResult[] = [];

  for (const metric of metrics) {
    const metricSpan = metric.trackMetric ? calculation.span({ name: metric.name, input }) : null;
    try {
      const scored = await runInContext(trace, metricSpan ?? calculation, () => metric.score(input));
      const list = (Array.isArray(scored) ? scored : [scored]).map((result) => checkScore(metric, result));
      for (const result of list) {
        if (result.scoringFailed) {
          logger?.warn({ metric: metric.name, reason: result.reason }, 'Metric returned an invalid score');
        }
      }
      results.push(...list);
      metricSpan?.end({ output: { scores: list } });
    } catch (error) {
      const message = errorMessage(error);
      logger?.warn({ metric: metric.name, err: error }, 'Metric failed');
      results.push({ name: metric.name, value: 0, reason: message, scoringFailed: true });
      metricSpan?.setError(error).end();
    }
  }

  calculation.end({ output: { scores: results } });
  return results;
}

/**
 * Map over items with at most `limit` calls in flight. Results keep input order.
 */
async function mapWithConcurrency<T, R>(items: T[], limit: number, fn: (item: T) => Promise<R>): Promise<R[]> {
  const results: R[] = [];
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index]);
    }
  };

  await Promise.all(Array.from({ length: Math.min(Math.max(1, limit), items.length) }, worker));
  return results;
}

export async function evaluate(options: EvaluateOptions): Promise<EvaluationResult> {
  const client = options.client ?? getTrackClient();
  const logger = client.logger.child({ component: 'evaluate' });
  const metrics = options.scoringMetrics ?? [];

  const experiment = await client.createExperiment({
    name: options.experimentName,
    datasetName: options.dataset.name,
    metadata: options.experimentConfig,
  });
  const items = await options.dataset.getItems(options.nbSamples);
  logger.info({ experiment: experiment.name, items: items.length }, 'Starting evaluation');

  const runItem = async (item: DatasetItemRecord): Promise<TestResult> => {
    const trace = client.trace({
      name: 'evaluation_task',
      input: { ...item },
      projectName: options.projectName,
      metadata: { datasetItemId: item.id, experimentId: experiment.id },
    });

    let taskOutput: TaskOutput;
    try {
      taskOutput = await runInContext(trace, null, () => options.task(item));
    } catch (error) {
      logger.warn({ datasetItemId: item.id, err: error }, 'Evaluation task failed');
      trace.setError(error).end();
      return { datasetItemId: item.id, traceId: trace.id, scoreResults: [], error: errorMessage(error) };
    }

    trace.setOutput(taskOutput);
    const scoringInput = buildScoringInput(item, taskOutput, options.scoringKeyMapping);
    const scoreResults = await scoreWithMetrics(trace, metrics, scoringInput, logger);

    const logged = scoreResults.filter((result) => !result.scoringFailed);
    try {
      if (logged.length > 0) {
        client.logTracesFeedbackScores(
          logged.map((result) => ({
            id: trace.id,
            name: result.name,
            value: result.value,
            reason: result.reason,
            projectName: trace.projectName,
          }))
        );
      }
    } finally {
      trace.end();
    }

    return { datasetItemId: item.id, traceId: trace.id, taskOutput, scoreResults };
  };

  const testResults = await mapWithConcurrency(
    items,
    options.taskConcurrency ?? DEFAULT_TASK_CONCURRENCY,
    runItem
  );

  await client.flush();
  await experiment.insert(testResults.map(({ datasetItemId, traceId }) => ({ datasetItemId, traceId })));

  return { experimentId: experiment.id, experimentName: experiment.name, testResults };
}

/**
 * Mean of every successful score, by metric name
 */
export function averageScores(result: EvaluationResult): Record<string, number> {
  const totals = new Map<string, { sum: number; count: number }>();
  for (const test of result.testResults) {
    for (const score of test.scoreResults) {
      if (score.scoringFailed) continue;
      const total = totals.get(score.name) ?? { sum: 0, count: 0 };
      total.sum += score.value;
      total.count += 1;
      totals.set(score.name, total);
    }
  }

  const averages: Record<string, number> = {};
  for (const [name, { sum, count }] of totals) {
    averages[name] = sum / count;
  }
  return averages;
}
