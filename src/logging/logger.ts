import { getConfig, type LogLevel } from '../config/index.js';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

type EmitLevel = Exclude<LogLevel, 'silent'>;

const LEVEL_WEIGHTS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let levelOverride: LogLevel | null = null;

/**
 * Override the configured level (tests silence output with 'silent')
 */
export function setLogLevel(level: LogLevel | null): void {
  levelOverride = level;
}

function activeLevel(): LogLevel {
  return levelOverride ?? getConfig().logging.level;
}

function serializeField(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return value;
}

function emit(name: string, level: EmitLevel, message: string, fields: LogFields | undefined): void {
  if (LEVEL_WEIGHTS[level] < LEVEL_WEIGHTS[activeLevel()]) {
    return;
  }

  const entry: LogFields = {
    timestamp: new Date().toISOString(),
    level,
    logger: name,
    message,
  };
  for (const [key, value] of Object.entries(fields ?? {})) {
    entry[key] = serializeField(value);
  }

  const line = JSON.stringify(entry);
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.log(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
}

/**
 * Create a named JSON-line logger
 */
export function createLogger(name: string): Logger {
  return {
    debug: (message, fields) => emit(name, 'debug', message, fields),
    info: (message, fields) => emit(name, 'info', message, fields),
    warn: (message, fields) => emit(name, 'warn', message, fields),
    error: (message, fields) => emit(name, 'error', message, fields),
  };
}
