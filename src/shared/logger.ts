/**
 * Leveled logger for the key server and its client tools.
 *
 * `LOG_LEVEL` (error | warn | info | debug, default info) is read from the
 * environment on first use, after `dotenv/config` has loaded `.env`.
 *
 *   const log = createLogger('store');
 *   log.info('Opened keys.sqlite');   // [2026-10-18 12:00:00] [INFO ] [store] Opened keys.sqlite
 *   log.debug('Row', row);            // only with LOG_LEVEL=debug
 */

// ── Log levels (lower = more severe) ─────────────────────────────────────

const LEVELS = { error: 0, warn: 1, info: 2, debug: 3 } as const;
export type LevelName = keyof typeof LEVELS;

const COLORS: Record<LevelName, string> = {
  error: '\x1b[31m',
  warn: '\x1b[33m',
  info: '\x1b[32m',
  debug: '\x1b[34m',
};
const RESET = '\x1b[0m';

// ── Resolve effective level lazily ───────────────────────────────────────

let resolvedThreshold: number | null = null;

function isLevelName(value: string): value is LevelName {
  return value in LEVELS;
}

function threshold(): number {
  if (resolvedThreshold === null) {
    const env = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
    resolvedThreshold = isLevelName(env) ? LEVELS[env] : LEVELS.info;
  }
  return resolvedThreshold;
}

/** Forget the cached level so the next log call re-reads `LOG_LEVEL`. */
export function resetLogLevel(): void {
  resolvedThreshold = null;
}

// ── Formatting ───────────────────────────────────────────────────────────

function timestamp(): string {
  const d = new Date();
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

export function formatMessage(level: LevelName, mod: string, msg: string): string {
  const tag = level.toUpperCase().padEnd(5);
  return `[${timestamp()}] [${COLORS[level]}${tag}${RESET}] [${mod}] ${msg}`;
}

// ── Logger interface ─────────────────────────────────────────────────────

export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

/**
 * Create a logger with a fixed module label.
 *
 * @param module - Short identifier such as 'server', 'store' or 'client'.
 */
export function createLogger(module: string): Logger {
  const emit = (level: LevelName, message: string, args: unknown[]) => {
    if (LEVELS[level] > threshold()) return;
    const formatted = formatMessage(level, module, message);
    if (level === 'error') {
      console.error(formatted, ...args);
    } else if (level === 'warn') {
      console.warn(formatted, ...args);
    } else {
      console.log(formatted, ...args);
    }
  };

  return {
    error: (message: string, ...args: unknown[]) => emit('error', message, args),
    warn: (message: string, ...args: unknown[]) => emit('warn', message, args),
    info: (message: string, ...args: unknown[]) => emit('info', message, args),
    debug: (message: string, ...args: unknown[]) => emit('debug', message, args),
  };
}
