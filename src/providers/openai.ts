import { getTrackClient, type Tracelet } from '../client';
import { getCurrentTrace, isPlainObject, type Span, type Trace } from '../tracing';
import type { Payload, Usage } from '../tracing-types';

/**
 * Structural shape of an OpenAI client. Anything with `chat.completions.create` can be wrapped.
 */
interface ChatCompletionParams {
  model: string;
  messages?: unknown[];
  stream?: boolean | null;
  [key: string]: unknown;
}

interface ChatCompletions {
  create(params: ChatCompletionParams, ...rest: unknown[]): Promise<unknown>;
}

export interface OpenAIClientLike {
  chat: {
    completions: ChatCompletions;
  };
}

export interface TrackOpenAIOptions {
  client?: Tracelet;
  /** Project for traces opened by calls made outside any trace */
  projectName?: string;
  tags?: string[];
  metadata?: Record<string, unknown>;
}

const SPAN_NAME = 'chat_completion_create';

function readUsage(value: unknown): Usage | undefined {
  if (!isPlainObject(value) || !isPlainObject(value.usage)) return undefined;
  const { prompt_tokens, completion_tokens, total_tokens } = value.usage;
  return {
    promptTokens: typeof prompt_tokens === 'number' ? prompt_tokens : undefined,
    completionTokens: typeof completion_tokens === 'number' ? completion_tokens : undefined,
    totalTokens: typeof total_tokens === 'number' ? total_tokens : undefined,
  };
}

function readModel(value: unknown): string | undefined {
  return isPlainObject(value) && typeof value.model === 'string' ? value.model : undefined;
}

function readDeltaContent(chunk: unknown): string {
  if (!isPlainObject(chunk) || !Array.isArray(chunk.choices)) return '';
  const first: unknown = chunk.choices[0];
  if (!isPlainObject(first) || !isPlainObject(first.delta)) return '';
  return typeof first.delta.content === 'string' ? first.delta.content : '';
}

function isAsyncIterable(value: unknown): value is AsyncIterable<unknown> {
  return typeof value === 'object' && value !== null && Symbol.asyncIterator in value;
}

/**
 * Wrap an OpenAI client so chat completions are logged as `llm` spans.
 *
 * Calls made inside a trace (for example from a `track`ed function) nest under
 * the active span. Calls made outside open a trace of their own.
 *
 * @example
 * ```typescript
 * import OpenAI from 'openai';
 * import { trackOpenAI } from 'tracelet';
 *
 * const openai = trackOpenAI(new OpenAI());
 * const response = await openai.chat.completions.create({
 *   model: 'gpt-4o-mini',
 *   messages: [{ role: 'user', content: 'Hello!' }],
 * });
 * ```
 */
export function trackOpenAI<T extends OpenAIClientLike>(openai: T, options: TrackOpenAIOptions = {}): T {
  return new Proxy(openai, {
    get(target, prop, receiver) {
      if (prop === 'chat') {
        return wrapChat(target.chat, options);
      }
      return Reflect.get(target, prop, receiver);
    },
  });
}

function wrapChat<C extends OpenAIClientLike['chat']>(chat: C, options: TrackOpenAIOptions): C {
  return new Proxy(chat, {
    get(target, prop, receiver) {
      if (prop === 'completions') {
        return wrapCompletions(target.completions, options);
      }
      return Reflect.get(target, prop, receiver);
    },
  });
}

function wrapCompletions<C extends ChatCompletions>(completions: C, options: TrackOpenAIOptions): C {
  return new Proxy(completions, {
    get(target, prop, receiver) {
      if (prop === 'create') {
        return (params: ChatCompletionParams, ...rest: unknown[]) =>
          tracedCreate(options, params, () => target.create(params, ...rest));
      }
      return Reflect.get(target, prop, receiver);
    },
  });
}

async function tracedCreate(
  options: TrackOpenAIOptions,
  params: ChatCompletionParams,
  call: () => Promise<unknown>
): Promise<unknown> {
  const client = options.client ?? getTrackClient();
  const { messages, ...modelParams } = params;
  const input: Payload = { messages: messages ?? [] };

  const parent = getCurrentTrace();
  const trace =
    parent ??
    client.trace({
      name: SPAN_NAME,
      input,
      projectName: options.projectName,
      tags: options.tags,
      metadata: options.metadata,
    });
  const ownsTrace = parent === undefined;

  const span = trace.span({
    name: SPAN_NAME,
    type: 'llm',
    input,
    model: params.model,
    provider: 'openai',
    tags: options.tags,
    metadata: { ...options.metadata, ...modelParams },
  });

  const fail = (error: unknown): void => {
    span.setError(error).end();
    if (ownsTrace) trace.setError(error).end();
  };

  let result: unknown;
  try {
    result = await call();
  } catch (error) {
    fail(error);
    throw error;
  }

  if (params.stream && isAsyncIterable(result)) {
    return wrapStream(result, params.model, trace, ownsTrace, span, fail);
  }

  const output: Payload = isPlainObject(result) && Array.isArray(result.choices) ? { choices: result.choices } : { output: result };
  span.end({ output, usage: readUsage(result), model: readModel(result) });
  if (ownsTrace) trace.end({ output });
  return result;
}

/**
 * Pass chunks through, ending the span once the stream is exhausted or the consumer stops reading
 */
async function* wrapStream(
  stream: AsyncIterable<unknown>,
  model: string,
  trace: Trace,
  ownsTrace: boolean,
  span: Span,
  fail: (error: unknown) => void
): AsyncGenerator<unknown, void, unknown> {
  let content = '';
  let usage: Usage | undefined;
  let responseModel = model;
  let failed = false;

  try {
    for await (const chunk of stream) {
      content += readDeltaContent(chunk);
      // Last chunk carries usage when stream_options.include_usage is set
      usage = readUsage(chunk) ?? usage;
      responseModel = readModel(chunk) ?? responseModel;
      yield chunk;
    }
  } catch (error) {
    failed = true;
    fail(error);
    throw error;
  } finally {
    if (!failed) {
      const output: Payload = { choices: [{ index: 0, message: { role: 'assistant', content } }] };
      span.end({ output, usage, model: responseModel });
      if (ownsTrace) trace.end({ output });
    }
  }
}
