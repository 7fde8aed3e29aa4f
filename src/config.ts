import fs from 'fs';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';
import type { ResolvedConfig, TraceletConfig } from './types';

export const DEFAULT_API_URL = 'http://localhost:5173/api';
export const DEFAULT_PROJECT_NAME = 'Default Project';
export const DEFAULT_WORKSPACE = 'default';

const DEFAULT_CONFIG: ResolvedConfig = {
  apiUrl: DEFAULT_API_URL,
  workspaceName: DEFAULT_WORKSPACE,
  projectName: DEFAULT_PROJECT_NAME,
  batchSize: 100,
  flushIntervalMs: 1000,
  maxRetries: 3,
  logLevel: 'warn',
  disabled: false,
};

export const ConfigSchema = z
  .object({
    apiKey: z.string().min(1).optional(),
    apiUrl: z.string().url().optional(),
    workspaceName: z.string().min(1).optional(),
    projectName: z.string().min(1).optional(),
    batchSize: z.number().int().positive().optional(),
    flushIntervalMs: z.number().int().positive().optional(),
    maxRetries: z.number().int().min(1).optional(),
    logLevel: z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace']).optional(),
    disabled: z.boolean().optional(),
  })
  .strict();

type FileConfig = z.infer<typeof ConfigSchema>;

const booleanFromEnv = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .refine((value) => ['true', 'false', '1', '0'].includes(value), { message: 'expected true/false/1/0' })
  .transform((value) => value === 'true' || value === '1');

const ENV_VARS: Record<keyof FileConfig, { name: string; schema: z.ZodTypeAny }> = {
  apiKey: { name: 'TRACELET_API_KEY', schema: z.string().min(1) },
  apiUrl: { name: 'TRACELET_URL_OVERRIDE', schema: z.string().url() },
  workspaceName: { name: 'TRACELET_WORKSPACE', schema: z.string().min(1) },
  projectName: { name: 'TRACELET_PROJECT_NAME', schema: z.string().min(1) },
  batchSize: { name: 'TRACELET_BATCH_SIZE', schema: z.coerce.number().int().positive() },
  flushIntervalMs: { name: 'TRACELET_FLUSH_INTERVAL_MS', schema: z.coerce.number().int().positive() },
  maxRetries: { name: 'TRACELET_MAX_RETRIES', schema: z.coerce.number().int().min(1) },
  logLevel: { name: 'TRACELET_LOG_LEVEL', schema: ConfigSchema.shape.logLevel.unwrap() },
  disabled: { name: 'TRACELET_TRACK_DISABLE', schema: booleanFromEnv },
};

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.TRACELET_CONFIG_PATH ?? path.join(os.homedir(), '.tracelet', 'config.json');
}

function readConfigFile(filePath: string): FileConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return {};
    throw new ConfigError(`Cannot read config file ${filePath}`, { cause: error });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file ${filePath} is not valid JSON`, { cause: error });
  }

  const parsed = ConfigSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Invalid config file ${filePath}: ${issues.join('; ')}`);
  }
  return parsed.data;
}

function readEnv(env: NodeJS.ProcessEnv): FileConfig {
  const config: Record<string, unknown> = {};
  for (const [key, spec] of Object.entries(ENV_VARS)) {
    const value = env[spec.name];
    if (value === undefined || value === '') continue;
    const parsed = spec.schema.safeParse(value);
    if (!parsed.success) {
      throw new ConfigError(`Invalid value for ${spec.name}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    config[key] = parsed.data;
  }
  return ConfigSchema.parse(config);
}

/**
 * Resolve the SDK configuration.
 *
 * Priority: explicit options > environment variables > config file > defaults
 */
export function loadConfig(options: TraceletConfig = {}, env: NodeJS.ProcessEnv = process.env): ResolvedConfig {
  const { configPath, ...explicit } = options;

  const parsedExplicit = ConfigSchema.safeParse(explicit);
  if (!parsedExplicit.success) {
    const issues = parsedExplicit.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid tracelet options: ${issues.join('; ')}`);
  }

  const layers: FileConfig[] = [
    parsedExplicit.data,
    readEnv(env),
    readConfigFile(configPath ?? defaultConfigPath(env)),
  ];
  const resolve = <K extends keyof FileConfig>(key: K): FileConfig[K] | undefined => {
    for (const layer of layers) {
      const value = layer[key];
      if (value !== undefined) return value;
    }
    return undefined;
  };

  return {
    apiKey: resolve('apiKey'),
    apiUrl: (resolve('apiUrl') ?? DEFAULT_CONFIG.apiUrl).replace(/\/+$/, ''),
    workspaceName: resolve('workspaceName') ?? DEFAULT_CONFIG.workspaceName,
    projectName: resolve('projectName') ?? DEFAULT_CONFIG.projectName,
    batchSize: resolve('batchSize') ?? DEFAULT_CONFIG.batchSize,
    flushIntervalMs: resolve('flushIntervalMs') ?? DEFAULT_CONFIG.flushIntervalMs,
    maxRetries: resolve('maxRetries') ?? DEFAULT_CONFIG.maxRetries,
    logLevel: resolve('logLevel') ?? DEFAULT_CONFIG.logLevel,
    disabled: resolve('disabled') ?? DEFAULT_CONFIG.disabled,
  };
}
