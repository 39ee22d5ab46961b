/**
 * Structured JSON logging.
 *
 * Each line is a single JSON object on stdout with `timestamp`, `level`,
 * `component` and `event`, followed by caller context (job id, stage, decision,
 * error). Lines are meant for CloudWatch-style log search, so field names stay
 * flat and stable. `debug` lines are written only when LOG_LEVEL=debug.
 */

import { serializeError } from './errors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(event: string, fields?: LogFields): void;
  info(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
  error(event: string, fields?: LogFields): void;
  /** Logger that adds `fields` to every line. */
  child(fields: LogFields): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function thresholdFromEnv(): number {
  const configured = process.env['LOG_LEVEL']?.trim().toLowerCase();
  if (configured === 'debug' || configured === 'info' || configured === 'warn' || configured === 'error') {
    return LEVEL_ORDER[configured];
  }
  return LEVEL_ORDER.info;
}

function normalize(fields: LogFields): LogFields {
  const out: LogFields = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    out[key] = value instanceof Error ? serializeError(value) : value;
  }
  return out;
}

function write(line: LogFields): void {
  let text: string;
  try {
    text = JSON.stringify(line);
  } catch (err) {
    text = JSON.stringify({
      timestamp: line['timestamp'],
      level: line['level'],
      component: line['component'],
      event: line['event'],
      serializationError: err instanceof Error ? err.message : String(err)
    });
  }
  console.log(text);
}

export function createLogger(component: string, base: LogFields = {}): Logger {
  const emit = (level: LogLevel, event: string, fields?: LogFields) => {
    if (LEVEL_ORDER[level] < thresholdFromEnv()) return;
    write({
      timestamp: new Date().toISOString(),
      level,
      component,
      event,
      ...normalize(base),
      ...normalize(fields ?? {})
    });
  };

  return {
    debug: (event, fields) => emit('debug', event, fields),
    info: (event, fields) => emit('info', event, fields),
    warn: (event, fields) => emit('warn', event, fields),
    error: (event, fields) => emit('error', event, fields),
    child: (fields) => createLogger(component, { ...base, ...fields })
  };
}

/** Logger that drops everything; handy for wiring tests that assert on state only. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger
};
