export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type EmitLevel = Exclude<LogLevel, 'silent'>;

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

/**
 * Startup level: WAKELINE_LOG_LEVEL wins, then DEBUG matching our namespace
 * (or '*') selects 'debug', otherwise 'info'.
 */
function detectLevel(): LogLevel {
  if (typeof process === 'undefined') return 'info';
  const explicit = process.env?.WAKELINE_LOG_LEVEL?.trim().toLowerCase();
  if (explicit && isLogLevel(explicit)) return explicit;
  const debug = process.env?.DEBUG;
  if (debug && (debug === '*' || debug.includes('wakeline'))) {
    return 'debug';
  }
  return 'info';
}

let globalLevel: LogLevel = detectLevel();

export function setLogLevel(level: LogLevel): void {
  globalLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLevel;
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

function timestamp(): string {
  const d = new Date();
  const h = String(d.getHours()).padStart(2, '0');
  const m = String(d.getMinutes()).padStart(2, '0');
  const s = String(d.getSeconds()).padStart(2, '0');
  const ms = String(d.getMilliseconds()).padStart(3, '0');
  return `${h}:${m}:${s}.${ms}`;
}

const SINKS: Record<EmitLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

function write(level: EmitLevel, prefix: string, args: unknown[]): void {
  if (LEVELS[globalLevel] > LEVELS[level]) return;
  SINKS[level](timestamp(), prefix, ...args);
}

/** Tagged logger; every line reads `HH:MM:SS.mmm [wakeline:Tag] ...`. */
export function createLogger(tag: string): Logger {
  const prefix = `[wakeline:${tag}]`;
  return {
    debug: (...args: unknown[]) => write('debug', prefix, args),
    info: (...args: unknown[]) => write('info', prefix, args),
    warn: (...args: unknown[]) => write('warn', prefix, args),
    error: (...args: unknown[]) => write('error', prefix, args),
  };
}
