/**
 * Structured JSON logging: one record per line with timestamp, level and message.
 * Placement of the injector's own pod comes from the downward API when available.
 * LOG_LEVEL (debug | info | warn | error | silent) filters records; default info.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogRecord {
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Pod/namespace/node of the injector itself when running in Kubernetes. */
  placement?: { pod?: string; namespace?: string; node?: string };
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLevelName(value: string): value is keyof typeof LEVEL_ORDER {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function threshold(): number {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  if (configured && isLevelName(configured)) {
    return LEVEL_ORDER[configured];
  }
  return LEVEL_ORDER.info;
}

function getPlacement(): LogRecord['placement'] {
  const pod = process.env.POD_NAME;
  const namespace = process.env.POD_NAMESPACE;
  const node = process.env.NODE_NAME;
  if (pod ?? namespace ?? node) {
    return { pod, namespace, node };
  }
  return undefined;
}

/** Builds the record written for a message; exported for tests. */
export function buildRecord(level: LogLevel, message: string, extra?: Record<string, unknown>): LogRecord {
  const placement = getPlacement();
  return {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...(placement && { placement }),
    ...extra,
  };
}

function write(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < threshold()) return;
  const line = JSON.stringify(buildRecord(level, message, extra)) + '\n';
  const out = level === 'error' ? process.stderr : process.stdout;
  out.write(line);
}

export function logDebug(message: string, extra?: Record<string, unknown>): void {
  write('debug', message, extra);
}

export function logInfo(message: string, extra?: Record<string, unknown>): void {
  write('info', message, extra);
}

export function logWarn(message: string, extra?: Record<string, unknown>): void {
  write('warn', message, extra);
}

export function logError(message: string, extra?: Record<string, unknown>): void {
  write('error', message, extra);
}

/** Message of an unknown thrown value, for log context. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
