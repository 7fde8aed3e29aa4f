// Client
export { Tracelet, getTrackClient, setTrackClient } from './client';
export type { TraceletOptions } from './client';
export { loadConfig, defaultConfigPath } from './config';
export type { TraceletConfig, ResolvedConfig, LogLevel } from './types';

// Tracing
export { Trace, Span, getCurrentTrace, getCurrentSpan } from './tracing';
export type * from './tracing-types';
export { track } from './track';
export type { TrackOptions, TrackDecorator } from './track';

// Feedback
export type { FeedbackScore, FeedbackSource } from './feedback';

// Datasets and experiments
export { Dataset } from './dataset';
export type { DatasetItem, DatasetItemRecord, DatasetRecord } from './dataset';
export { Experiment } from './experiment';
export type { ExperimentItem, ExperimentRecord } from './experiment';

// Evaluation
export * from './evaluation';

// Integrations
export { trackOpenAI } from './providers/openai';
export type { TrackOpenAIOptions, OpenAIClientLike } from './providers/openai';

// Errors
export { TraceletError, ApiError, NotFoundError, ConfigError, ValidationError } from './errors';
export type { ErrorKind } from './errors';
