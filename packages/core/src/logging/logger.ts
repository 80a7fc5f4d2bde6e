export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogFields = Record<string, unknown>;

/**
 * Minimal structured logger.
 *
 * Run-scoped fields (run id, url) are attached with `child()` and passed down
 * the call chain explicitly.
 */
export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(bindings: LogFields): Logger;
}

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface ConsoleLoggerOptions {
  /** Minimum level written. Defaults to `info`. */
  level?: LogLevel;

  /** Fields attached to every line. */
  bindings?: LogFields;

  /** Line sink. Defaults to stderr so stdout stays free for reports. */
  write?: (line: string) => void;

  /** Clock used for timestamps. */
  now?: () => Date;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return (
    value === 'debug' ||
    value === 'info' ||
    value === 'warn' ||
    value === 'error' ||
    value === 'silent'
  );
}

/**
 * Create a logger that writes `ISO LEVEL [k=v ...] message k=v ...` lines.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LOG_LEVEL_VALUES[options.level ?? 'info'];
  const bindings = options.bindings ?? {};
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  const now = options.now ?? (() => new Date());

  const log = (level: Exclude<LogLevel, 'silent'>, message: string, fields?: LogFields): void => {
    if (LOG_LEVEL_VALUES[level] < threshold) return;

    const scope = formatFields(bindings);
    const extra = fields ? formatFields(fields) : '';

    let line = `${now().toISOString()} ${level.toUpperCase()}`;
    if (scope) line += ` [${scope}]`;
    line += ` ${message}`;
    if (extra) line += ` ${extra}`;

    write(line);
  };

  return {
    debug: (message, fields) => log('debug', message, fields),
    info: (message, fields) => log('info', message, fields),
    warn: (message, fields) => log('warn', message, fields),
    error: (message, fields) => log('error', message, fields),
    child: (extra) =>
      createConsoleLogger({ ...options, bindings: { ...bindings, ...extra } }),
  };
}

/**
 * Logger that drops everything. Library default.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};

function formatFields(fields: LogFields): string {
  return Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`)
    .join(' ');
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return /\s/.test(value) ? JSON.stringify(value) : value;
  if (value instanceof Error) return JSON.stringify(value.message);
  if (typeof value === 'object' && value !== null) return JSON.stringify(value);
  return String(value);
}
