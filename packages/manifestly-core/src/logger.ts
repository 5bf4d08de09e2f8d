import { pino, destination } from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export type { Logger } from 'pino';

export interface LoggerOptions {
  /** Minimum level to emit (default: warn) */
  level?: LevelWithSilent;
  /** Human-readable output through pino-pretty instead of JSON lines */
  pretty?: boolean;
  /** Logger name attached to every line */
  name?: string;
}

export const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export function isLogLevel(value: string): value is LevelWithSilent {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Create the process logger. Logs go to stderr so command output on
 * stdout stays machine-readable.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'warn';
  const name = options.name ?? 'manifestly';

  if (options.pretty) {
    return pino({
      name,
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: 2,
        },
      },
    });
  }

  return pino({ name, level }, destination(2));
}

/** A logger that discards everything. */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
