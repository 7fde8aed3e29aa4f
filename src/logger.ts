import pino from 'pino';
import type { LogLevel } from './types';

export type Logger = pino.Logger;

export function createLogger(level: LogLevel): Logger {
  return pino({ name: 'tracelet', level });
}
