import type { Logger, LogLevel } from './types';

const logLevelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(logLevelOrder, value);
}

export function logWithLevel(
  logger: Logger,
  level: LogLevel,
  threshold: LogLevel,
  message: string,
  fields?: Record<string, unknown>,
): void {
  if (logLevelOrder[level] < logLevelOrder[threshold]) {
    return;
  }

  const fn = logger[level] ?? logger.warn ?? logger.info ?? logger.debug ?? logger.error;
  if (typeof fn !== 'function') {
    return;
  }

  try {
    fn.call(logger, message, fields);
  } catch {
    // A broken logger must not fail the test that is being mocked.
  }
}
