import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
export type LogMeta = Record<string, unknown>;

const LOG_LEVELS: readonly string[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

// The validated level is applied later through setLogLevel; an unknown value must not stop the import
function initialLevel(value: string | undefined): string {
  return value !== undefined && LOG_LEVELS.includes(value) ? value : 'info';
}

// stdout is reserved for reports and the console summary
const base = pino(
  {
    level: initialLevel(process.env.LOG_LEVEL),
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination({ dest: 2, sync: true })
);

function write(level: 'debug' | 'info' | 'warn' | 'error', message: string, meta?: LogMeta): void {
  if (meta) {
    base[level](meta, message);
  } else {
    base[level](message);
  }
}

export const logger = {
  debug: (message: string, meta?: LogMeta): void => write('debug', message, meta),
  info: (message: string, meta?: LogMeta): void => write('info', message, meta),
  warn: (message: string, meta?: LogMeta): void => write('warn', message, meta),
  error: (message: string, meta?: LogMeta): void => write('error', message, meta),
};

export function setLogLevel(level: LogLevel): void {
  base.level = level;
}
