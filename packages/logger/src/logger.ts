export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
  level: LogLevel;
  category: string;
  timestamp: Date;
  msg: string;
  context?: Record<string, unknown>;
}

export interface Sink {
  write(entry: LogEntry): void;
  flush(): void;
}

type LogMethod = {
  (msg: string): void;
  (context: Record<string, unknown>, msg: string): void;
};

export interface Logger {
  readonly category: string;
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  isLevelEnabled(level: LogLevel): boolean;
}

export interface LoggerConfig {
  level?: LogLevel | undefined;
  sinks?: Sink[] | undefined;
}

const severity: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
};

/**
 * Turn a context object into plain JSON data.
 * Errors keep name/message/stack, bigints (base-unit amounts) become strings,
 * a repeated object reference is written as '[Circular]'.
 */
function toPlainContext(context: Record<string, unknown>): Record<string, unknown> {
  const visited = new WeakSet<object>();

  const replacer = (_key: string, value: unknown): unknown => {
    if (value instanceof Error) {
      return { name: value.name, message: value.message, stack: value.stack };
    }
    if (typeof value === 'bigint') {
      return value.toString();
    }
    if (typeof value === 'object' && value !== null) {
      if (visited.has(value)) return '[Circular]';
      visited.add(value);
    }
    return value;
  };

  try {
    return JSON.parse(JSON.stringify(context, replacer)) as Record<string, unknown>;
  } catch {
    return { error: '[unserializable]' };
  }
}

// Read on every call, so loggers created at module load pick up a later initLogger()
let activeLevel: LogLevel = 'info';
let activeSinks: Sink[] = [];

const categories = new Map<string, Logger>();

function emit(category: string, level: LogLevel, contextOrMsg: string | Record<string, unknown>, msg?: string): void {
  if (severity[level] < severity[activeLevel] || activeSinks.length === 0) return;

  const entry: LogEntry =
    typeof contextOrMsg === 'string'
      ? { level, category, timestamp: new Date(), msg: contextOrMsg }
      : { level, category, timestamp: new Date(), msg: msg ?? '', context: toPlainContext(contextOrMsg) };

  for (const sink of activeSinks) {
    sink.write(entry);
  }
}

function createCategoryLogger(category: string): Logger {
  const method =
    (level: LogLevel): LogMethod =>
    (contextOrMsg: string | Record<string, unknown>, msg?: string) =>
      emit(category, level, contextOrMsg, msg);

  return {
    category,
    trace: method('trace'),
    debug: method('debug'),
    info: method('info'),
    warn: method('warn'),
    error: method('error'),
    isLevelEnabled: (level) => activeSinks.length > 0 && severity[level] >= severity[activeLevel],
  };
}

/**
 * Configure the level and sinks for every logger. Without a call to this,
 * all loggers are silent.
 */
export function initLogger(config: LoggerConfig): void {
  activeLevel = config.level ?? 'info';
  activeSinks = config.sinks ?? [];
  categories.clear();
}

export function getLogger(category: string): Logger {
  let logger = categories.get(category);
  if (!logger) {
    logger = createCategoryLogger(category);
    categories.set(category, logger);
  }
  return logger;
}

/** Drain every sink synchronously. Call before the process exits. */
export function flushLoggers(): void {
  for (const sink of activeSinks) {
    sink.flush();
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}
