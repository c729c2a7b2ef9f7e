export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];
export type LogFields = Record<string, unknown>;

export interface LoggerConfig {
  level: LogLevel;
  timestamps: boolean;
  /** One JSON object per line instead of `[level] message k=v`. */
  json: boolean;
}

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  /** Logger whose lines always carry `bindings`. */
  child(bindings: LogFields): Logger;
}

type WritableLevel = Exclude<LogLevel, 'silent'>;

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

const DEFAULT_CONFIG: LoggerConfig = { level: 'warn', timestamps: false, json: false };

let config: LoggerConfig = { ...DEFAULT_CONFIG };

/** Process-wide; every logger reads it at write time. */
export function configure_logger(patch: Partial<LoggerConfig>): void {
  config = { ...config, ...patch };
}

export function reset_logger(): void {
  config = { ...DEFAULT_CONFIG };
}

export function get_logger_config(): LoggerConfig {
  return { ...config };
}

export function is_log_level(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function format_value(v: unknown): string {
  return typeof v === 'string' ? v : JSON.stringify(v);
}

export function format_log_line(level: WritableLevel, message: string, fields: LogFields, at: Date = new Date()): string {
  if (config.json) {
    return JSON.stringify({ ...(config.timestamps ? { ts: at.toISOString() } : {}), level, msg: message, ...fields });
  }
  const pairs = Object.entries(fields)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${format_value(v)}`);
  const head = `${config.timestamps ? `${at.toISOString()} ` : ''}[${level}] ${message}`;
  return pairs.length > 0 ? `${head} ${pairs.join(' ')}` : head;
}

export function create_logger(bindings: LogFields = {}): Logger {
  const write = (level: WritableLevel, message: string, fields?: LogFields): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[config.level]) return;
    console[level](format_log_line(level, message, { ...bindings, ...fields }));
  };
  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
    child: (extra) => create_logger({ ...bindings, ...extra }),
  };
}

export const logger = create_logger();
