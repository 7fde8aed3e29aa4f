import type { z } from 'zod';
import { ApiError, ValidationError, errorMessage, isRetryable } from './errors';
import type { Logger } from './logger';
import type { ResolvedConfig } from './types';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export const WORKSPACE_HEADER = 'X-Tracelet-Workspace';

export interface RestClientOptions {
  backoffBaseMs?: number;
}

/**
 * JSON-over-fetch client for the tracing backend
 */
export class RestClient {
  private apiUrl: string;
  private apiKey?: string;
  private workspaceName: string;
  private maxRetries: number;
  private backoffBaseMs: number;
  private logger: Logger;

  constructor(
    config: Pick<ResolvedConfig, 'apiUrl' | 'apiKey' | 'workspaceName' | 'maxRetries'>,
    logger: Logger,
    options: RestClientOptions = {}
  ) {
    this.apiUrl = config.apiUrl;
    this.apiKey = config.apiKey;
    this.workspaceName = config.workspaceName;
    this.maxRetries = config.maxRetries;
    this.backoffBaseMs = options.backoffBaseMs ?? 500;
    this.logger = logger;
  }

  /**
   * Send a request, retrying transient failures with exponential backoff.
   * Resolves to undefined for empty responses.
   */
  async request(method: HttpMethod, path: string, body?: unknown): Promise<unknown> {
    const url = `${this.apiUrl}${path}`;
    let lastError: unknown = null;

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      try {
        const response = await fetch(url, {
          method,
          headers: this.headers(),
          body: body === undefined ? undefined : JSON.stringify(body),
        });

        if (!response.ok) {
          const bodyText = await response.text();
          throw new ApiError(`HTTP ${response.status}: ${bodyText}`, {
            status: response.status,
            url,
            bodyText,
          });
        }

        const text = await response.text();
        if (!text) return undefined;
        const parsed: unknown = JSON.parse(text);
        return parsed;
      } catch (error) {
        lastError = error;
        this.logger.debug({ method, path, attempt: attempt + 1 }, `Request failed: ${errorMessage(error)}`);

        if (!isRetryable(error)) break;
        if (attempt < this.maxRetries - 1) {
          await this.sleep(Math.pow(2, attempt) * this.backoffBaseMs);
        }
      }
    }

    throw lastError;
  }

  /**
   * Send a request and check the response body against `schema`
   */
  async requestJson<T>(
    method: HttpMethod,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body?: unknown
  ): Promise<T | undefined> {
    const data = await this.request(method, path, body);
    if (data === undefined) return undefined;

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
      throw new ValidationError(`Unexpected response from ${method} ${path}: ${issues.join('; ')}`, issues);
    }
    return parsed.data;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      [WORKSPACE_HEADER]: this.workspaceName,
    };
    if (this.apiKey) {
      headers.Authorization = this.apiKey;
    }
    return headers;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
