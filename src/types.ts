export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export interface TraceletConfig {
  apiKey?: string;
  /** Base URL of the tracing backend, including the `/api` prefix */
  apiUrl?: string;
  workspaceName?: string;
  /** Project that new traces are logged to unless they name one */
  projectName?: string;
  batchSize?: number;
  flushIntervalMs?: number;
  maxRetries?: number;
  logLevel?: LogLevel;
  /** Turn logging into a no-op. Traces and spans are still created locally. */
  disabled?: boolean;
  /** Path to a JSON config file. Defaults to ~/.tracelet/config.json */
  configPath?: string;
}

export interface ResolvedConfig {
  apiKey?: string;
  apiUrl: string;
  workspaceName: string;
  projectName: string;
  batchSize: number;
  flushIntervalMs: number;
  maxRetries: number;
  logLevel: LogLevel;
  disabled: boolean;
}
