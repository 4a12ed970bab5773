import pino, { type Logger } from 'pino';

export type { Logger };

/**
 * Unknown levels fall back to `info`; config validation reports them
 * once the entry point runs.
 */
export function resolveLogLevel(value: string | undefined): string {
  if (value === 'silent') return value;
  return value && Object.hasOwn(pino.levels.values, value) ? value : 'info';
}

// stdout is reserved for the report itself
export function createLogger(name: string): Logger {
  return pino({ name: `@sector-report/${name}`, level: resolveLogLevel(process.env.LOG_LEVEL) }, pino.destination(2));
}
