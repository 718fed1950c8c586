import fs from 'fs';
import path from 'path';

type Fields = Record<string, unknown>;

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

const SEVERITY: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LoggerOptions {
  level?: LogLevel;
  /** Append every line to this file as well (directory is created on first write). */
  file?: string;
  /** Replaces the console writer; used by tests to capture output. */
  sink?: (level: LogLevel, line: string) => void;
}

export interface Logger {
  debug(arg1?: string | Fields, arg2?: string): void;
  info(arg1?: string | Fields, arg2?: string): void;
  warn(arg1?: string | Fields, arg2?: string): void;
  error(arg1?: string | Fields, arg2?: string): void;
}

function toErrorPayload(err: unknown): unknown {
  if (!err) return undefined;
  if (err instanceof Error) {
    return { name: err.name, message: err.message, stack: err.stack };
  }
  if (typeof err === 'object') return err;
  return { message: String(err) };
}

function consoleSink(level: LogLevel, line: string) {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(l => l === value);
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const threshold = SEVERITY[opts.level ?? 'info'];
  const sink = opts.sink ?? consoleSink;
  let fileReady = false;

  function emit(level: LogLevel, msg?: string, fields?: Fields) {
    if (SEVERITY[level] < threshold) return;
    const fallbackMsg = typeof fields?.msg === 'string' ? fields.msg : '';
    const payload: Fields = {
      level,
      time: new Date().toISOString(),
      ...(fields || {}),
      msg: msg || fallbackMsg,
    };
    // Normalize embedded error if present
    if (fields && 'err' in fields) {
      payload.err = toErrorPayload(fields.err);
    }
    const line = JSON.stringify(payload);
    sink(level, line);
    if (opts.file) {
      if (!fileReady) {
        fs.mkdirSync(path.dirname(opts.file), { recursive: true });
        fileReady = true;
      }
      fs.appendFileSync(opts.file, line + '\n', 'utf8');
    }
  }

  function bind(level: LogLevel) {
    return (arg1?: string | Fields, arg2?: string) => {
      if (typeof arg1 === 'string') return emit(level, arg1);
      emit(level, arg2, arg1 || {});
    };
  }

  return {
    debug: bind('debug'),
    info: bind('info'),
    warn: bind('warn'),
    error: bind('error'),
  };
}

/** Logger that drops everything; handy default for tests. */
export const silentLogger: Logger = createLogger({ sink: () => undefined, level: 'error' });

const envLevel = String(process.env.LOG_LEVEL || 'info').toLowerCase();

export const logger: Logger = createLogger({
  level: isLogLevel(envLevel) ? envLevel : 'info',
  file: process.env.LOG_FILE || undefined,
});

export type { Fields };
