export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const NAMESPACE = 'playback-interrupt';

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

/**
 * PLAYBACK_LOG_LEVEL wins when it names a level; otherwise 'debug' if the
 * DEBUG env var matches our namespace, else 'info'.
 */
function detectLevel(): LogLevel {
  const env = typeof process !== 'undefined' ? process.env : undefined;
  const explicit = env?.PLAYBACK_LOG_LEVEL?.toLowerCase();
  if (explicit && isLogLevel(explicit)) return explicit;

  const debug = env?.DEBUG;
  if (debug && (debug === '*' || debug.includes(NAMESPACE))) {
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
  /** Logger with the same tag plus a suffix, e.g. a session id. */
  child(suffix: string): Logger;
}

function timestamp(): string {
  const d = new Date();
  const h = String(d.getHours()).padStart(2, '0');
  const m = String(d.getMinutes()).padStart(2, '0');
  const s = String(d.getSeconds()).padStart(2, '0');
  const ms = String(d.getMilliseconds()).padStart(3, '0');
  return `${h}:${m}:${s}.${ms}`;
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVELS[globalLevel] <= LEVELS[level];
}

export function createLogger(tag: string): Logger {
  const prefix = `[${NAMESPACE}:${tag}]`;
  return {
    debug(...args: unknown[]) {
      if (enabled('debug')) console.debug(timestamp(), prefix, ...args);
    },
    info(...args: unknown[]) {
      if (enabled('info')) console.info(timestamp(), prefix, ...args);
    },
    warn(...args: unknown[]) {
      if (enabled('warn')) console.warn(timestamp(), prefix, ...args);
    },
    error(...args: unknown[]) {
      if (enabled('error')) console.error(timestamp(), prefix, ...args);
    },
    child(suffix: string) {
      return createLogger(`${tag}${suffix}`);
    },
  };
}
