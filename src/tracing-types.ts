/**
 * Type definitions for tracelet tracing
 */

export type SpanType =
  | 'general'
  | 'llm'
  | 'tool'
  | 'retrieval'
  | 'embedding'
  | 'agent'
  | 'chain'
  | 'guardrail';

export type Payload = Record<string, unknown>;

export interface ErrorInfo {
  exceptionType: string;
  message: string;
  traceback?: string;
}

export interface Usage {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
}

export interface TraceRecord {
  id: string;
  projectName: string;
  name?: string;
  startTime: string;
  endTime?: string;
  input?: Payload;
  output?: Payload;
  metadata?: Record<string, unknown>;
  tags?: string[];
  errorInfo?: ErrorInfo;
  threadId?: string;
}

export interface SpanRecord {
  id: string;
  traceId: string;
  parentSpanId?: string;
  projectName: string;
  name?: string;
  type: SpanType;
  startTime: string;
  endTime?: string;
  input?: Payload;
  output?: Payload;
  metadata?: Record<string, unknown>;
  tags?: string[];
  errorInfo?: ErrorInfo;
  model?: string;
  provider?: string;
  usage?: Usage;
  totalCost?: number;
}

export type TraceUpdate = Partial<Omit<TraceRecord, 'id'>>;

/** Span patches always carry the owning trace and project, the backend needs both to locate the span */
export type SpanUpdate = Partial<Omit<SpanRecord, 'id'>> & Pick<SpanRecord, 'traceId' | 'projectName'>;

export interface TraceOptions {
  id?: string;
  name?: string;
  projectName?: string;
  startTime?: Date;
  input?: unknown;
  output?: unknown;
  metadata?: Record<string, unknown>;
  tags?: string[];
  threadId?: string;
}

export interface SpanOptions {
  id?: string;
  name: string;
  type?: SpanType;
  startTime?: Date;
  /** Attach under this span instead of the one active in the current context */
  parentSpanId?: string;
  input?: unknown;
  output?: unknown;
  metadata?: Record<string, unknown>;
  tags?: string[];
  model?: string;
  provider?: string;
  usage?: Usage;
}

export interface TraceUpdateOptions {
  input?: unknown;
  output?: unknown;
  metadata?: Record<string, unknown>;
  tags?: string[];
  errorInfo?: ErrorInfo;
}

export interface SpanUpdateOptions extends TraceUpdateOptions {
  model?: string;
  provider?: string;
  usage?: Usage;
  totalCost?: number;
}
