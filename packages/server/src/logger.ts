export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
}

const ORDER: LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/**
 * JSON-lines logger on top of the console. `warn` and `error` go to stderr.
 */
export function createLogger(level: LogLevel = 'info'): Logger {
  const minIdx = ORDER.indexOf(level);
  function log(lvl: Exclude<LogLevel, 'silent'>, msg: string, meta?: LogMeta): void {
    if (ORDER.indexOf(lvl) < minIdx) return;
    const entry = { level: lvl, msg, time: new Date().toISOString(), ...meta };
    if (lvl === 'warn' || lvl === 'error') {
      console.error(JSON.stringify(entry));
    } else {
      console.log(JSON.stringify(entry));
    }
  }
  return {
    debug: (msg, meta) => log('debug', msg, meta),
    info: (msg, meta) => log('info', msg, meta),
    warn: (msg, meta) => log('warn', msg, meta),
    error: (msg, meta) => log('error', msg, meta),
  };
}

export function describeError(error: unknown): LogMeta {
  if (error instanceof Error) {
    return { error: error.name, message: error.message };
  }
  return { error: String(error) };
}
