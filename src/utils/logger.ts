/**
 * Stderr logger.
 *
 * Stdout stays clean for callers that pipe generated output, so every
 * log line goes to stderr. The threshold comes from HWPX_LOG_LEVEL.
 */

export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warning: 30,
  error: 40,
};

const PREFIX = '[hwpx-writer]';

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function currentThreshold(): number {
  const raw = (process.env.HWPX_LOG_LEVEL ?? 'warning').toLowerCase();
  return LEVEL_ORDER[isLogLevel(raw) ? raw : 'warning'];
}

function formatData(data: unknown): string {
  if (data === undefined) return '';
  if (data instanceof Error) return ` ${data.message}`;
  try {
    return ` ${JSON.stringify(data)}`;
  } catch {
    return ` ${String(data)}`;
  }
}

/**
 * Write a single log line to stderr if `level` passes the configured threshold.
 */
export function logToStderr(level: LogLevel, message: string, data?: unknown): void {
  if (LEVEL_ORDER[level] < currentThreshold()) return;
  process.stderr.write(`${PREFIX} ${level.toUpperCase()} ${message}${formatData(data)}\n`);
}

export const logger = {
  debug: (message: string, data?: unknown) => logToStderr('debug', message, data),
  info: (message: string, data?: unknown) => logToStderr('info', message, data),
  warning: (message: string, data?: unknown) => logToStderr('warning', message, data),
  error: (message: string, data?: unknown) => logToStderr('error', message, data),
};
