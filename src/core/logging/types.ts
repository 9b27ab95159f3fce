/**
 * Structured logger used across the builders. `error` and `fatal` take the
 * thrown error separately so it is serialized under an `error` key.
 */
export interface SpawnerLogger {
  trace(msg: string, meta?: Record<string, unknown>): void;
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, error?: Error, meta?: Record<string, unknown>): void;
  fatal(msg: string, error?: Error, meta?: Record<string, unknown>): void;
  /** Derive a logger whose lines all carry `bindings` */
  child(bindings: Record<string, unknown>): SpawnerLogger;
}

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerConfig {
  level: LogLevel;
  /** Render through pino-pretty */
  pretty?: boolean;
  /** File path written through `pino/file`; stdout when unset */
  destination?: string;
  options?: {
    /** Defaults to true */
    timestamp?: boolean;
  };
}
