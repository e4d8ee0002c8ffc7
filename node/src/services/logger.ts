// src/services/logger.ts: structured logging for the search core
import { Logger, type ILogObj } from 'tslog';

const LOG_TYPES = ['pretty', 'json', 'hidden'] as const;
type LogType = (typeof LOG_TYPES)[number];

function logTypeFromEnv(): LogType {
  const raw = process.env.LOG_TYPE;
  return LOG_TYPES.find((t) => t === raw) ?? 'pretty';
}

function minLevelFromEnv(): number {
  const level = Number.parseInt(process.env.LOG_LEVEL ?? '', 10);
  return Number.isFinite(level) ? level : 3;
}

export type AppLogger = Logger<ILogObj>;

export const logger: AppLogger = new Logger<ILogObj>({
  name: 'flight-freshness',
  minLevel: minLevelFromEnv(),
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ',
  type: logTypeFromEnv(),
});

export function componentLogger(name: string): AppLogger {
  return logger.getSubLogger({ name });
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
