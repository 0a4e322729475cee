export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

type LoggerFn = (event: string, context?: LogContext) => void;

export interface Logger {
  debug: LoggerFn;
  info: LoggerFn;
  warn: LoggerFn;
  error: LoggerFn;
  child(bindings: LogContext): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface LoggerOptions {
  level?: LogLevel;
  bindings?: LogContext;
}

/**
 * Structured logger that writes to stderr only.
 *
 * Event names are dotted identifiers (`clustering.complete`); everything else
 * goes in the context object. stdout stays free for callers that emit JSON.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const bindings = options.bindings ?? {};

  const emit = (eventLevel: Exclude<LogLevel, 'silent'>, event: string, context?: LogContext): void => {
    if (LEVEL_ORDER[eventLevel] < LEVEL_ORDER[level]) return;

    const merged = { ...bindings, ...context };
    const sink = eventLevel === 'warn' ? console.warn : console.error;
    const line = `[${eventLevel}] ${event}`;
    if (Object.keys(merged).length > 0) {
      sink(line, merged);
      return;
    }
    sink(line);
  };

  return {
    debug: (event, context) => emit('debug', event, context),
    info: (event, context) => emit('info', event, context),
    warn: (event, context) => emit('warn', event, context),
    error: (event, context) => emit('error', event, context),
    child: (childBindings) => createLogger({ level, bindings: { ...bindings, ...childBindings } }),
  };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}
