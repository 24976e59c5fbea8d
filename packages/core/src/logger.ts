/**
 * Leveled console logger shared by every pipeline.
 *
 * Call sites tag their messages with the component name, e.g.
 * `logger.info('[History] Loaded 12 items')`.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const levels: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in levels;
}

const envLevel = process.env.LOG_LEVEL ?? '';
let currentLevel = isLogLevel(envLevel) ? levels[envLevel] : levels.info;

export function setLogLevel(level: LogLevel): void {
  currentLevel = levels[level];
}

function formatTime(): string {
  return new Date().toISOString().slice(11, 23);
}

export const logger = {
  error: (msg: string, ...args: unknown[]): void => {
    if (currentLevel >= 0) {
      console.error(`[${formatTime()}] ❌ ${msg}`, ...args);
    }
  },
  warn: (msg: string, ...args: unknown[]): void => {
    if (currentLevel >= 1) {
      console.warn(`[${formatTime()}] ⚠️ ${msg}`, ...args);
    }
  },
  info: (msg: string, ...args: unknown[]): void => {
    if (currentLevel >= 2) {
      console.log(`[${formatTime()}] ℹ️ ${msg}`, ...args);
    }
  },
  debug: (msg: string, ...args: unknown[]): void => {
    if (currentLevel >= 3) {
      console.log(`[${formatTime()}] 🔍 ${msg}`, ...args);
    }
  },
};

export type Logger = typeof logger;

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
