import { BatchQueue } from './batch-queue';
import { loadConfig } from './config';
import { Dataset, DatasetRecordSchema, type DatasetRecord } from './dataset';
import { ApiError, NotFoundError } from './errors';
import { Experiment } from './experiment';
import { normalizeFeedbackScores, type FeedbackScore, type FeedbackScoreRecord } from './feedback';
import { createLogger, type Logger } from './logger';
import { RestClient } from './rest';
import { generateId, Trace, type TraceSink } from './tracing';
import type { SpanRecord, SpanUpdate, TraceOptions, TraceRecord, TraceUpdate } from './tracing-types';
import type { ResolvedConfig, TraceletConfig } from './types';

export interface TraceletOptions extends TraceletConfig {
  /** Base delay for retry backoff. Mostly useful in tests. */
  retryBackoffMs?: number;
}

export class Tracelet implements TraceSink {
  readonly config: ResolvedConfig;
  readonly logger: Logger;
  readonly rest: RestClient;

  private traceQueue: BatchQueue<TraceRecord, TraceUpdate>;
  private spanQueue: BatchQueue<SpanRecord, SpanUpdate>;
  private traceFeedbackQueue: BatchQueue<FeedbackScoreRecord>;
  private spanFeedbackQueue: BatchQueue<FeedbackScoreRecord>;

  constructor(options: TraceletOptions = {}) {
    const { retryBackoffMs, ...config } = options;

    this.config = loadConfig(config);
    this.logger = createLogger(this.config.logLevel);
    this.rest = new RestClient(this.config, this.logger.child({ component: 'rest' }), {
      backoffBaseMs: retryBackoffMs,
    });

    const queueOptions = {
      batchSize: this.config.batchSize,
      flushIntervalMs: this.config.flushIntervalMs,
      logger: this.logger.child({ component: 'batch-queue' }),
    };

    this.traceQueue = new BatchQueue<TraceRecord, TraceUpdate>({
      ...queueOptions,
      name: 'traces',
      getId: (record) => record.id,
      sendCreates: async (traces) => {
        await this.rest.request('POST', '/v1/private/traces/batch', { traces });
      },
      sendUpdate: async (id, patch) => {
        await this.rest.request('PATCH', `/v1/private/traces/${encodeURIComponent(id)}`, patch);
      },
    });

    this.spanQueue = new BatchQueue<SpanRecord, SpanUpdate>({
      ...queueOptions,
      name: 'spans',
      getId: (record) => record.id,
      sendCreates: async (spans) => {
        await this.rest.request('POST', '/v1/private/spans/batch', { spans });
      },
      sendUpdate: async (id, patch) => {
        await this.rest.request('PATCH', `/v1/private/spans/${encodeURIComponent(id)}`, patch);
      },
    });

    this.traceFeedbackQueue = new BatchQueue<FeedbackScoreRecord>({
      ...queueOptions,
      name: 'trace-feedback-scores',
      sendCreates: async (scores) => {
        await this.rest.request('PUT', '/v1/private/traces/feedback-scores', { scores });
      },
    });

    this.spanFeedbackQueue = new BatchQueue<FeedbackScoreRecord>({
      ...queueOptions,
      name: 'span-feedback-scores',
      sendCreates: async (scores) => {
        await this.rest.request('PUT', '/v1/private/spans/feedback-scores', { scores });
      },
    });

    if (this.config.disabled) {
      this.logger.info('Tracking disabled, nothing will be sent');
    }
  }

  /**
   * Create a new trace. The record is queued right away and sent in the background.
   */
  trace(options: TraceOptions = {}): Trace {
    return new Trace(this, {
      ...options,
      projectName: options.projectName ?? this.config.projectName,
    });
  }

  /**
   * Attach feedback scores to traces by id
   */
  logTracesFeedbackScores(scores: FeedbackScore[]): void {
    if (this.config.disabled) return;
    for (const score of normalizeFeedbackScores(scores, this.config.projectName)) {
      this.traceFeedbackQueue.create(score);
    }
  }

  /**
   * Attach feedback scores to spans by id
   */
  logSpansFeedbackScores(scores: FeedbackScore[]): void {
    if (this.config.disabled) return;
    for (const score of normalizeFeedbackScores(scores, this.config.projectName)) {
      this.spanFeedbackQueue.create(score);
    }
  }

  /**
   * Wait until every record queued so far has been sent.
   * Call before the process exits to avoid losing data.
   */
  async flush(): Promise<void> {
    await this.traceQueue.flush();
    await this.spanQueue.flush();
    await this.traceFeedbackQueue.flush();
    await this.spanFeedbackQueue.flush();
  }

  /**
   * Stop background flushing and send what is left
   */
  async close(): Promise<void> {
    await this.traceQueue.close();
    await this.spanQueue.close();
    await this.traceFeedbackQueue.close();
    await this.spanFeedbackQueue.close();
  }

  /**
   * Number of records waiting to be sent
   */
  get bufferSize(): number {
    return this.traceQueue.size + this.spanQueue.size + this.traceFeedbackQueue.size + this.spanFeedbackQueue.size;
  }

  async createDataset(name: string, description?: string): Promise<Dataset> {
    const record: DatasetRecord = { id: generateId(), name, description };
    await this.rest.request('POST', '/v1/private/datasets', record);
    return new Dataset(record, this.rest, this.logger.child({ component: 'dataset' }), { synced: true });
  }

  /**
   * Look up a dataset by name. Throws NotFoundError when it does not exist.
   */
  async getDataset(name: string): Promise<Dataset> {
    let record: DatasetRecord | undefined;
    try {
      record = await this.rest.requestJson('POST', '/v1/private/datasets/retrieve', DatasetRecordSchema, {
        datasetName: name,
      });
    } catch (error) {
      if (error instanceof ApiError && error.status === 404) {
        throw new NotFoundError(`Dataset not found: ${name}`);
      }
      throw error;
    }
    if (!record) {
      throw new NotFoundError(`Dataset not found: ${name}`);
    }
    return new Dataset(record, this.rest, this.logger.child({ component: 'dataset' }));
  }

  async getOrCreateDataset(name: string, description?: string): Promise<Dataset> {
    try {
      return await this.getDataset(name);
    } catch (error) {
      if (error instanceof NotFoundError) {
        return this.createDataset(name, description);
      }
      throw error;
    }
  }

  async deleteDataset(name: string): Promise<void> {
    const dataset = await this.getDataset(name);
    await this.rest.request('DELETE', `/v1/private/datasets/${encodeURIComponent(dataset.id)}`);
  }

  async createExperiment(options: {
    name?: string;
    datasetName: string;
    metadata?: Record<string, unknown>;
  }): Promise<Experiment> {
    const id = generateId();
    const record = {
      id,
      name: options.name ?? `experiment-${id.slice(0, 8)}`,
      datasetName: options.datasetName,
      metadata: options.metadata,
    };
    await this.rest.request('POST', '/v1/private/experiments', record);
    return new Experiment(record, this.rest);
  }

  /** @internal */
  _createTrace(record: TraceRecord): void {
    if (this.config.disabled) return;
    this.traceQueue.create(record);
  }

  /** @internal */
  _updateTrace(id: string, patch: TraceUpdate): void {
    if (this.config.disabled) return;
    this.traceQueue.update(id, patch);
  }

  /** @internal */
  _createSpan(record: SpanRecord): void {
    if (this.config.disabled) return;
    this.spanQueue.create(record);
  }

  /** @internal */
  _updateSpan(id: string, patch: SpanUpdate): void {
    if (this.config.disabled) return;
    this.spanQueue.update(id, patch);
  }
}

let trackClient: Tracelet | null = null;

/**
 * Process-wide client used by `track` and the integrations. Created from config on first use.
 */
export function getTrackClient(): Tracelet {
  if (!trackClient) {
    trackClient = new Tracelet();
  }
  return trackClient;
}

export function setTrackClient(client: Tracelet | null): void {
  trackClient = client;
}
