import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

type Level = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const rank: Record<Level, number> = { DEBUG: 10, INFO: 20, WARN: 30, ERROR: 40 };

const silent = process.env.NODE_ENV === 'test';
const consoleEnabled = silent ? false : process.env.LOG_CONSOLE !== '0';
const fileEnabled = silent ? false : process.env.LOG_TO_FILE === '1';
const logFile = process.env.LOG_FILE ?? 'logs/slidesmith.log';
const minLevel = resolveLevel(process.env.LOG_LEVEL);
let fileReady = false;

function resolveLevel(raw: string | undefined): Level {
  switch ((raw ?? '').toUpperCase()) {
    case 'DEBUG':
      return 'DEBUG';
    case 'WARN':
      return 'WARN';
    case 'ERROR':
      return 'ERROR';
    default:
      return 'INFO';
  }
}

function pad(num: number, size = 2) {
  return num.toString().padStart(size, '0');
}

function localTs() {
  const d = new Date();
  const date = `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
  const time = `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}.${pad(d.getMilliseconds(), 3)}`;
  return `${date} ${time}`;
}

function color(level: Level) {
  const reset = '\x1b[0m';
  const colors: Record<Level, string> = {
    INFO: '\x1b[34m', // blue
    DEBUG: '\x1b[95m', // bright magenta
    WARN: '\x1b[33m', // yellow
    ERROR: '\x1b[31m' // red
  };
  return `${colors[level]}[${level}]${reset}`;
}

function stringify(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value instanceof Error) return value.stack ?? value.message;
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

function write(level: Level, scope: string | undefined, args: unknown[]) {
  if (rank[level] < rank[minLevel]) return;
  const prefix = scope ? `[${localTs()}] ${color(level)} (${scope})` : `[${localTs()}] ${color(level)}`;
  if (consoleEnabled) {
    const sink = level === 'ERROR' ? console.error : level === 'WARN' ? console.warn : console.log;
    sink(prefix, ...args);
  }
  if (!fileEnabled) return;
  if (!fileReady) {
    mkdirSync(dirname(logFile), { recursive: true });
    fileReady = true;
  }
  appendFileSync(logFile, `${prefix} ${args.map(stringify).join(' ')}\n`, 'utf8');
}

export type Logger = {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  child: (scope: string) => Logger;
};

function createLogger(scope?: string): Logger {
  return {
    debug: (...args) => write('DEBUG', scope, args),
    info: (...args) => write('INFO', scope, args),
    warn: (...args) => write('WARN', scope, args),
    error: (...args) => write('ERROR', scope, args),
    child: (next) => createLogger(scope ? `${scope}:${next}` : next)
  };
}

export const logger = createLogger();

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
