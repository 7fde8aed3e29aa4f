/**
 * Function instrumentation.
 *
 * `track` wraps a function so every call is logged as a span. A call made
 * outside any trace opens a new trace, calls made inside one nest under the
 * active span.
 *
 * @example
 * ```typescript
 * import { track } from 'tracelet';
 *
 * const retrieve = track({ name: 'retrieve', type: 'retrieval' }, async (query: string) => {
 *   return searchIndex(query);
 * });
 *
 * const answer = track(async function answer(question: string) {
 *   const docs = await retrieve(question);
 *   return generate(question, docs);
 * });
 *
 * class Agent {
 *   @track({ type: 'agent' })
 *   async step(state: AgentState) { ... }
 * }
 * ```
 */

import { getTrackClient, type Tracelet } from './client';
import { getCurrentTrace, isPlainObject, runInContext, toPayload, type Trace } from './tracing';
import type { Payload, SpanType } from './tracing-types';

export interface TrackOptions {
  /** Span name. Defaults to the function or method name. */
  name?: string;
  type?: SpanType;
  /** Project for traces opened by this function. Overrides TRACELET_PROJECT_NAME. */
  projectName?: string;
  /** Log the call arguments. Default: true */
  captureInput?: boolean;
  /** Log the return value. Default: true */
  captureOutput?: boolean;
  tags?: string[];
  metadata?: Record<string, unknown>;
  /** Client to log to. Defaults to the process-wide track client. */
  client?: Tracelet;
}

type Tracked<This, A extends unknown[], R> = (this: This, ...args: A) => R;

export type TrackDecorator = <This, A extends unknown[], R>(
  target: Tracked<This, A, R>,
  context: { kind: 'method'; name: string | symbol }
) => Tracked<This, A, R>;

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

function captureArgs(args: unknown[]): Payload {
  if (args.length === 1 && isPlainObject(args[0])) return args[0];
  return { arguments: args };
}

function wrap<This, A extends unknown[], R>(
  fn: Tracked<This, A, R>,
  options: TrackOptions,
  fallbackName: string
): Tracked<This, A, R> {
  return function tracked(this: This, ...args: A): R {
    const client = options.client ?? getTrackClient();
    if (client.config.disabled) {
      return fn.apply(this, args);
    }

    const name = options.name ?? fallbackName;
    const input = options.captureInput === false ? undefined : captureArgs(args);

    let trace: Trace | undefined = getCurrentTrace();
    const ownsTrace = trace === undefined;
    if (!trace) {
      trace = client.trace({
        name,
        input,
        projectName: options.projectName,
        tags: options.tags,
        metadata: options.metadata,
      });
    }
    const activeTrace = trace;

    const span = activeTrace.span({
      name,
      type: options.type,
      input,
      tags: options.tags,
      metadata: options.metadata,
    });

    const finish = (value: unknown): void => {
      const output = options.captureOutput === false ? undefined : toPayload(value, 'output');
      span.end({ output });
      if (ownsTrace) activeTrace.end({ output });
    };

    const fail = (error: unknown): void => {
      span.setError(error).end();
      if (ownsTrace) activeTrace.setError(error).end();
    };

    let result: R;
    try {
      result = runInContext(activeTrace, span, () => fn.apply(this, args));
    } catch (error) {
      fail(error);
      throw error;
    }

    if (isPromiseLike(result)) {
      // Registered before the caller's own handlers, so the span is closed by the time they run
      void result.then(finish, fail);
    } else {
      finish(result);
    }
    return result;
  };
}

export function track<This, A extends unknown[], R>(fn: Tracked<This, A, R>): Tracked<This, A, R>;
export function track<This, A extends unknown[], R>(options: TrackOptions, fn: Tracked<This, A, R>): Tracked<This, A, R>;
export function track(options?: TrackOptions): TrackDecorator;
export function track<This, A extends unknown[], R>(
  optionsOrFn?: TrackOptions | Tracked<This, A, R>,
  maybeFn?: Tracked<This, A, R>
): Tracked<This, A, R> | TrackDecorator {
  if (typeof optionsOrFn === 'function') {
    return wrap(optionsOrFn, {}, optionsOrFn.name || 'anonymous');
  }

  const options = optionsOrFn ?? {};
  if (maybeFn) {
    return wrap(maybeFn, options, maybeFn.name || 'anonymous');
  }

  const decorator: TrackDecorator = (target, context) => wrap(target, options, String(context.name));
  return decorator;
}
