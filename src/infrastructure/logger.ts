import { pino, type Logger } from 'pino';

export interface LoggerOptions {
  readonly level?: string | undefined;
  readonly name?: string | undefined;
}

/**
 * Root logger for the SDK. Components receive children of it.
 *
 * Level precedence: explicit option, then `ANALYTICS_LOG_LEVEL`, then
 * `LOG_LEVEL`, then `info`.
 */
export function createLogger(options: LoggerOptions = {}, env: NodeJS.ProcessEnv = process.env): Logger {
  return pino({
    name: options.name ?? 'analytics',
    level: options.level ?? env['ANALYTICS_LOG_LEVEL'] ?? env['LOG_LEVEL'] ?? 'info',
  });
}
