import type { AppConfig } from '../../shared/config';

export type LogLevel = AppConfig['observability']['logLevel'];

const levelWeights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
}

export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  /** Fields stamped on every line, e.g. the service name. */
  bindings?: Record<string, unknown>;
  sink?: LogSink;
}

const consoleSink: LogSink = (level, line) => {
  /* eslint-disable no-console */
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
  /* eslint-enable no-console */
};

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

// Error instances stringify to {} otherwise
const serializeMeta = (meta: Record<string, unknown>): Record<string, unknown> =>
  Object.fromEntries(
    Object.entries(meta).map(([key, value]) => [key, value instanceof Error ? describeError(value) : value]),
  );

export const createLogger = (config: Pick<AppConfig, 'observability'>, options: LoggerOptions = {}): Logger => {
  const { bindings = {}, sink = consoleSink } = options;
  const threshold = levelWeights[config.observability.logLevel];

  const log = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
    if (levelWeights[level] < threshold) return;
    const line = JSON.stringify({
      level,
      message,
      ts: new Date().toISOString(),
      ...bindings,
      ...(meta ? serializeMeta(meta) : {}),
    });
    sink(level, line);
  };

  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
  };
};
