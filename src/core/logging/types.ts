import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type is pino's own; no wrapper.
 *
 * Data-first calls:
 *   logger.warn({ name: 'uploads' }, 'Stored blob could not be decoded');
 *   logger.error({ err }, 'Blob write failed');
 */
export type Logger = PinoLogger;

/**
 * Logger factory interface for DI.
 */
export interface ILoggerFactory {
  /** Child logger bound to `{ component }` */
  create(component: string): Logger;

  readonly root: Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export function parseLogLevel(raw: string | undefined): LogLevel {
  const level = raw?.toLowerCase();
  return LOG_LEVELS.find((l) => l === level) ?? 'silent';
}
