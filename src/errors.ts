/**
 * Error types for the tracelet SDK
 */

export type ErrorKind = 'transient' | 'permanent';

export class TraceletError extends Error {
  readonly kind: ErrorKind;

  constructor(message: string, kind: ErrorKind = 'permanent', options?: ErrorOptions) {
    super(message, options);
    this.name = 'TraceletError';
    this.kind = kind;
  }
}

/**
 * Non-2xx response from the tracing backend
 */
export class ApiError extends TraceletError {
  readonly status: number;
  readonly url: string;
  readonly bodyText?: string;

  constructor(
    message: string,
    options: { status: number; url: string; bodyText?: string; cause?: unknown }
  ) {
    super(message, classifyHttpError(options.status), { cause: options.cause });
    this.name = 'ApiError';
    this.status = options.status;
    this.url = options.url;
    this.bodyText = options.bodyText;
  }
}

export class NotFoundError extends TraceletError {
  constructor(message: string) {
    super(message, 'permanent');
    this.name = 'NotFoundError';
  }
}

export class ConfigError extends TraceletError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'permanent', options);
    this.name = 'ConfigError';
  }
}

export class ValidationError extends TraceletError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 'permanent');
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export function classifyHttpError(status: number): ErrorKind {
  if (status === 408 || status === 429 || status >= 500) return 'transient';
  return 'permanent';
}

/**
 * Whether a failed request is worth retrying. fetch rejects with a TypeError on network failure.
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof TraceletError) return error.kind === 'transient';
  return error instanceof TypeError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
