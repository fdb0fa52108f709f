import { LogLevel } from '@nestjs/common';
import { LogLevelName, logLevelSchema } from './env.schema';

const NEST_LEVELS: Record<LogLevelName, LogLevel[]> = {
  fatal: ['fatal'],
  error: ['fatal', 'error'],
  warn: ['fatal', 'error', 'warn'],
  info: ['fatal', 'error', 'warn', 'log'],
  debug: ['fatal', 'error', 'warn', 'log', 'debug'],
  trace: ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'],
};

/** Nest logger levels enabled by `LOG_LEVEL`; unknown values fall back to `info`. */
export const nestLogLevels = (level: string | undefined): LogLevel[] => {
  const parsed = logLevelSchema.safeParse(level?.trim().toLowerCase());
  return [...NEST_LEVELS[parsed.success ? parsed.data : 'info']];
};
