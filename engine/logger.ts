// engine/logger.ts
// Structured single-line JSON logs (one object per line, picked up by the platform log drain).

export const LOG_SERVICE = 'bom-etl';

export type LogContext = Record<string, unknown>;

export function logInfo(event: string, ctx: LogContext = {}): void {
  console.info(JSON.stringify({ level: 'info', service: LOG_SERVICE, event, ...ctx }));
}

export function logWarn(event: string, ctx: LogContext = {}): void {
  console.warn(JSON.stringify({ level: 'warn', service: LOG_SERVICE, event, ...ctx }));
}

export function logError(event: string, ctx: LogContext = {}): void {
  console.error(JSON.stringify({ level: 'error', service: LOG_SERVICE, event, ...ctx }));
}

/** Loggable view of a thrown value. */
export function describeError(err: unknown): LogContext {
  if (err instanceof Error) {
    return { error_name: err.name, error_message: err.message };
  }
  return { error_message: String(err) };
}
