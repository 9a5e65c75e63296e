export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  category: string;
  timestamp: Date;
  msg: string;
  context?: LogContext | undefined;
}

export interface Sink {
  write(entry: LogEntry): void;
  /** Called by flushLoggers() before the process exits */
  flush?(): void;
}

export interface LogMethod {
  (msg: string): void;
  (context: LogContext, msg: string): void;
}

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  /** Logger whose entries always carry `bindings` in their context. */
  child(bindings: LogContext): Logger;
}

export interface LoggerConfig {
  level?: LogLevel | undefined;
  sinks?: Sink[] | undefined;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
};

// Silent until initLogger() installs sinks
let state: { level: LogLevel; sinks: readonly Sink[] } = { level: 'info', sinks: [] };

const rootLoggers = new Map<string, Logger>();

function normalizeValue(value: unknown, ancestors: WeakSet<object>): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (typeof value === 'function' || typeof value === 'symbol') {
    return String(value);
  }
  if (typeof value !== 'object' || value === null) {
    return value;
  }
  if (ancestors.has(value)) {
    return '[Circular]';
  }

  ancestors.add(value);
  try {
    if (value instanceof Error) {
      const error: LogContext = { name: value.name, message: value.message, stack: value.stack };
      if (value.cause !== undefined) {
        error['cause'] = normalizeValue(value.cause, ancestors);
      }
      return error;
    }
    if (value instanceof Date) {
      return value.toISOString();
    }
    if (Array.isArray(value)) {
      return value.map((item: unknown) => normalizeValue(item, ancestors));
    }
    // Decimal and other value types describe themselves
    if ('toJSON' in value && typeof value.toJSON === 'function') {
      const json: unknown = value.toJSON();
      return normalizeValue(json, ancestors);
    }
    return normalizeContext(value, ancestors);
  } finally {
    ancestors.delete(value);
  }
}

function normalizeContext(context: object, ancestors = new WeakSet<object>()): LogContext {
  const normalized: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    normalized[key] = normalizeValue(value, ancestors);
  }
  return normalized;
}

function createLogger(category: string, bindings: LogContext): Logger {
  const emit = (level: LogLevel, contextOrMsg: LogContext | string, maybeMsg?: string): void => {
    if (state.sinks.length === 0 || LEVEL_RANK[level] < LEVEL_RANK[state.level]) {
      return;
    }

    const msg = typeof contextOrMsg === 'string' ? contextOrMsg : (maybeMsg ?? '');
    const context = typeof contextOrMsg === 'string' ? bindings : { ...bindings, ...contextOrMsg };
    const entry: LogEntry = { level, category, timestamp: new Date(), msg };
    if (Object.keys(context).length > 0) {
      entry.context = normalizeContext(context);
    }

    for (const sink of state.sinks) {
      sink.write(entry);
    }
  };

  const method =
    (level: LogLevel): LogMethod =>
    (contextOrMsg: LogContext | string, maybeMsg?: string) =>
      emit(level, contextOrMsg, maybeMsg);

  return {
    trace: method('trace'),
    debug: method('debug'),
    info: method('info'),
    warn: method('warn'),
    error: method('error'),
    child: (extra) => createLogger(category, { ...bindings, ...extra }),
  };
}

export function initLogger(config: LoggerConfig): void {
  state = {
    level: config.level ?? 'info',
    sinks: config.sinks ?? [],
  };
}

/**
 * Logger for a category. Safe to call at module load: entries go to whatever
 * sinks the latest initLogger() installed.
 */
export function getLogger(category: string): Logger {
  let logger = rootLoggers.get(category);
  if (!logger) {
    logger = createLogger(category, {});
    rootLoggers.set(category, logger);
  }
  return logger;
}

export function flushLoggers(): void {
  for (const sink of state.sinks) {
    sink.flush?.();
  }
}
