/**
 * Trace and span records with async-context propagation
 */

import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';
import type { FeedbackScore } from './feedback';
import type {
  ErrorInfo,
  Payload,
  SpanOptions,
  SpanRecord,
  SpanType,
  SpanUpdate,
  SpanUpdateOptions,
  TraceOptions,
  TraceRecord,
  TraceUpdate,
  TraceUpdateOptions,
  Usage,
} from './tracing-types';

/**
 * Where traces and spans send their records. Implemented by the client.
 */
export interface TraceSink {
  _createTrace(record: TraceRecord): void;
  _updateTrace(id: string, patch: TraceUpdate): void;
  _createSpan(record: SpanRecord): void;
  _updateSpan(id: string, patch: SpanUpdate): void;
  logTracesFeedbackScores(scores: FeedbackScore[]): void;
  logSpansFeedbackScores(scores: FeedbackScore[]): void;
}

// Context storage for traces and spans
const traceStorage = new AsyncLocalStorage<Trace>();
const spanStorage = new AsyncLocalStorage<Span>();

export function generateId(): string {
  return randomUUID();
}

function toIso(date?: Date): string {
  return (date ?? new Date()).toISOString();
}

/**
 * Payloads are JSON objects on the wire. Anything else is wrapped under `key`.
 */
export function toPayload(value: unknown, key: string): Payload | undefined {
  if (value === undefined) return undefined;
  if (isPlainObject(value)) return value;
  return { [key]: value };
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function toErrorInfo(error: unknown, exceptionType?: string): ErrorInfo {
  if (error instanceof Error) {
    return {
      exceptionType: exceptionType ?? error.name,
      message: error.message,
      traceback: error.stack,
    };
  }
  return { exceptionType: exceptionType ?? 'Error', message: String(error) };
}

/**
 * Drop undefined fields so a patch never clears a value by accident
 */
function compact<T extends object>(patch: T): T {
  const result = { ...patch };
  for (const key in result) {
    if (result[key] === undefined) delete result[key];
  }
  return result;
}

/**
 * A span represents a single operation within a trace
 */
export class Span {
  readonly trace: Trace;
  readonly id: string;
  readonly name: string;
  readonly type: SpanType;
  readonly parentSpanId: string | null;
  readonly startTime: string;

  private _endTime: string | null = null;
  private _input: Payload | undefined;
  private _output: Payload | undefined;
  private _metadata: Record<string, unknown>;
  private _tags: string[];
  private _errorInfo: ErrorInfo | undefined;
  private _model: string | undefined;
  private _provider: string | undefined;
  private _usage: Usage | undefined;
  private _totalCost: number | undefined;
  private _ended = false;

  constructor(trace: Trace, options: SpanOptions, parentSpanId: string | null) {
    this.trace = trace;
    this.id = options.id ?? generateId();
    this.name = options.name;
    this.type = options.type ?? 'general';
    this.parentSpanId = parentSpanId;
    this.startTime = toIso(options.startTime);
    this._input = toPayload(options.input, 'input');
    this._output = toPayload(options.output, 'output');
    this._metadata = { ...(options.metadata ?? {}) };
    this._tags = [...new Set(options.tags ?? [])];
    this._model = options.model;
    this._provider = options.provider;
    this._usage = options.usage ? withTotalTokens(options.usage) : undefined;

    trace.client._createSpan(this.toData());
  }

  get ended(): boolean {
    return this._ended;
  }

  /**
   * Create a child span of this span
   */
  span(nameOrOptions: string | SpanOptions): Span {
    const options = typeof nameOrOptions === 'string' ? { name: nameOrOptions } : nameOrOptions;
    return new Span(this.trace, options, options.parentSpanId ?? this.id);
  }

  setInput(input: unknown): this {
    this._input = toPayload(input, 'input');
    return this.send({ input: this._input });
  }

  setOutput(output: unknown): this {
    this._output = toPayload(output, 'output');
    return this.send({ output: this._output });
  }

  setMetadata(key: string, value: unknown): this {
    this._metadata[key] = value;
    return this.send({ metadata: { ...this._metadata } });
  }

  addTag(tag: string): this {
    if (this._tags.includes(tag)) return this;
    this._tags.push(tag);
    return this.send({ tags: [...this._tags] });
  }

  /**
   * Set LLM-specific information for this span
   */
  setLlmInfo(options: { model?: string; provider?: string; usage?: Usage; totalCost?: number }): this {
    return this.update(options);
  }

  setError(error: unknown, exceptionType?: string): this {
    this._errorInfo = toErrorInfo(error, exceptionType);
    return this.send({ errorInfo: this._errorInfo });
  }

  /**
   * Apply several changes at once
   */
  update(options: SpanUpdateOptions): this {
    if (options.input !== undefined) this._input = toPayload(options.input, 'input');
    if (options.output !== undefined) this._output = toPayload(options.output, 'output');
    if (options.metadata) this._metadata = { ...this._metadata, ...options.metadata };
    if (options.tags) this._tags = [...new Set([...this._tags, ...options.tags])];
    if (options.errorInfo) this._errorInfo = options.errorInfo;
    if (options.model !== undefined) this._model = options.model;
    if (options.provider !== undefined) this._provider = options.provider;
    if (options.usage) this._usage = withTotalTokens(options.usage);
    if (options.totalCost !== undefined) this._totalCost = options.totalCost;

    return this.send({
      input: options.input !== undefined ? this._input : undefined,
      output: options.output !== undefined ? this._output : undefined,
      metadata: options.metadata ? { ...this._metadata } : undefined,
      tags: options.tags ? [...this._tags] : undefined,
      errorInfo: options.errorInfo,
      model: options.model,
      provider: options.provider,
      usage: options.usage ? this._usage : undefined,
      totalCost: options.totalCost,
    });
  }

  /**
   * Log a feedback score against this span
   */
  score(name: string, value: number, reason?: string): this {
    this.trace.client.logSpansFeedbackScores([
      { id: this.id, name, value, reason, projectName: this.trace.projectName },
    ]);
    return this;
  }

  /**
   * End this span. Only the first call records an end time.
   */
  end(options: SpanUpdateOptions = {}): this {
    if (this._ended) return this;

    if (Object.keys(options).length > 0) {
      this.update(options);
    }

    this._ended = true;
    this._endTime = toIso();
    return this.send({ endTime: this._endTime });
  }

  toData(): SpanRecord {
    return compact({
      id: this.id,
      traceId: this.trace.id,
      parentSpanId: this.parentSpanId ?? undefined,
      projectName: this.trace.projectName,
      name: this.name,
      type: this.type,
      startTime: this.startTime,
      endTime: this._endTime ?? undefined,
      input: this._input,
      output: this._output,
      metadata: Object.keys(this._metadata).length > 0 ? { ...this._metadata } : undefined,
      tags: this._tags.length > 0 ? [...this._tags] : undefined,
      errorInfo: this._errorInfo,
      model: this._model,
      provider: this._provider,
      usage: this._usage,
      totalCost: this._totalCost,
    });
  }

  /**
   * Run a function with this span as the active span, ending it afterwards
   */
  async run<T>(fn: () => T | Promise<T>): Promise<T> {
    return traceStorage.run(this.trace, () =>
      spanStorage.run(this, async () => {
        try {
          const result = await fn();
          this.end();
          return result;
        } catch (error) {
          this.setError(error);
          this.end();
          throw error;
        }
      })
    );
  }

  private send(patch: Omit<SpanUpdate, 'traceId' | 'projectName'>): this {
    this.trace.client._updateSpan(
      this.id,
      compact({ ...patch, traceId: this.trace.id, projectName: this.trace.projectName })
    );
    return this;
  }
}

function withTotalTokens(usage: Usage): Usage {
  if (usage.totalTokens == null && usage.promptTokens != null && usage.completionTokens != null) {
    return { ...usage, totalTokens: usage.promptTokens + usage.completionTokens };
  }
  return { ...usage };
}

/**
 * A trace represents one end-to-end operation made of spans
 */
export class Trace {
  readonly client: TraceSink;
  readonly id: string;
  readonly name: string | null;
  readonly projectName: string;
  readonly startTime: string;

  private _endTime: string | null = null;
  private _input: Payload | undefined;
  private _output: Payload | undefined;
  private _metadata: Record<string, unknown>;
  private _tags: string[];
  private _errorInfo: ErrorInfo | undefined;
  private _threadId: string | undefined;
  private _ended = false;

  constructor(client: TraceSink, options: TraceOptions & { projectName: string }) {
    this.client = client;
    this.id = options.id ?? generateId();
    this.name = options.name ?? null;
    this.projectName = options.projectName;
    this.startTime = toIso(options.startTime);
    this._input = toPayload(options.input, 'input');
    this._output = toPayload(options.output, 'output');
    this._metadata = { ...(options.metadata ?? {}) };
    this._tags = [...new Set(options.tags ?? [])];
    this._threadId = options.threadId;

    client._createTrace(this.toData());
  }

  get ended(): boolean {
    return this._ended;
  }

  /**
   * Create a new span within this trace. Nests under the active span when it belongs to this trace.
   */
  span(nameOrOptions: string | SpanOptions): Span {
    const options = typeof nameOrOptions === 'string' ? { name: nameOrOptions } : nameOrOptions;
    const active = spanStorage.getStore();
    const parentSpanId = options.parentSpanId ?? (active && active.trace === this ? active.id : null);
    return new Span(this, options, parentSpanId);
  }

  setInput(input: unknown): this {
    this._input = toPayload(input, 'input');
    return this.send({ input: this._input });
  }

  setOutput(output: unknown): this {
    this._output = toPayload(output, 'output');
    return this.send({ output: this._output });
  }

  setMetadata(key: string, value: unknown): this {
    this._metadata[key] = value;
    return this.send({ metadata: { ...this._metadata } });
  }

  addTag(tag: string): this {
    if (this._tags.includes(tag)) return this;
    this._tags.push(tag);
    return this.send({ tags: [...this._tags] });
  }

  setError(error: unknown, exceptionType?: string): this {
    this._errorInfo = toErrorInfo(error, exceptionType);
    return this.send({ errorInfo: this._errorInfo });
  }

  update(options: TraceUpdateOptions): this {
    if (options.input !== undefined) this._input = toPayload(options.input, 'input');
    if (options.output !== undefined) this._output = toPayload(options.output, 'output');
    if (options.metadata) this._metadata = { ...this._metadata, ...options.metadata };
    if (options.tags) this._tags = [...new Set([...this._tags, ...options.tags])];
    if (options.errorInfo) this._errorInfo = options.errorInfo;

    return this.send({
      input: options.input !== undefined ? this._input : undefined,
      output: options.output !== undefined ? this._output : undefined,
      metadata: options.metadata ? { ...this._metadata } : undefined,
      tags: options.tags ? [...this._tags] : undefined,
      errorInfo: options.errorInfo,
    });
  }

  /**
   * Log a feedback score against this trace
   */
  score(name: string, value: number, reason?: string): this {
    this.client.logTracesFeedbackScores([{ id: this.id, name, value, reason, projectName: this.projectName }]);
    return this;
  }

  /**
   * End this trace. Only the first call records an end time.
   */
  end(options: TraceUpdateOptions = {}): this {
    if (this._ended) return this;

    if (Object.keys(options).length > 0) {
      this.update(options);
    }

    this._ended = true;
    this._endTime = toIso();
    return this.send({ endTime: this._endTime });
  }

  toData(): TraceRecord {
    return compact({
      id: this.id,
      projectName: this.projectName,
      name: this.name ?? undefined,
      startTime: this.startTime,
      endTime: this._endTime ?? undefined,
      input: this._input,
      output: this._output,
      metadata: Object.keys(this._metadata).length > 0 ? { ...this._metadata } : undefined,
      tags: this._tags.length > 0 ? [...this._tags] : undefined,
      errorInfo: this._errorInfo,
      threadId: this._threadId,
    });
  }

  /**
   * Run a function within this trace's context, ending the trace afterwards
   */
  async run<T>(fn: () => T | Promise<T>): Promise<T> {
    return traceStorage.run(this, async () => {
      try {
        const result = await fn();
        this.end();
        return result;
      } catch (error) {
        this.setError(error);
        this.end();
        throw error;
      }
    });
  }

  private send(patch: TraceUpdate): this {
    this.client._updateTrace(this.id, compact(patch));
    return this;
  }
}

/**
 * Run `fn` with the given trace and span active, without ending either
 */
export function runInContext<T>(trace: Trace, span: Span | null, fn: () => T): T {
  return traceStorage.run(trace, () => (span ? spanStorage.run(span, fn) : fn()));
}

/**
 * Get the current trace from context
 */
export function getCurrentTrace(): Trace | undefined {
  return traceStorage.getStore();
}

/**
 * Get the current span from context
 */
export function getCurrentSpan(): Span | undefined {
  return spanStorage.getStore();
}
