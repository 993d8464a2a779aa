export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

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

export interface Logger {
  readonly category: string;
  trace(msg: string): void;
  trace(obj: Record<string, unknown>, msg: string): void;
  debug(msg: string): void;
  debug(obj: Record<string, unknown>, msg: string): void;
  info(msg: string): void;
  info(obj: Record<string, unknown>, msg: string): void;
  warn(msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
  error(msg: string): void;
  error(obj: Record<string, unknown>, msg: string): void;
  isLevelEnabled(level: LogLevel): boolean;
}

export interface LoggerConfig {
  level?: LogLevel;
  sinks?: Sink[];
}

const levelOrder: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Serialize a context object into plain JSON values.
 * Errors keep name/message/stack, bigints become strings, values with toJSON
 * (Decimal, Currency) use it, and repeated object references become '[Circular]'.
 */
export function serializeContext(obj: Record<string, unknown>): Record<string, unknown> {
  const seen = new WeakSet<object>();

  const replacer = (_key: string, value: unknown): unknown => {
    if (value instanceof Error) {
      return {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
    }

    if (typeof value === 'bigint') {
      return value.toString();
    }

    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }

    return value;
  };

  try {
    return JSON.parse(JSON.stringify(obj, replacer)) as Record<string, unknown>;
  } catch {
    return { error: '[unserializable]' };
  }
}

type LogArgs = [msg: string] | [obj: Record<string, unknown>, msg: string];

class CategoryLogger implements Logger {
  constructor(readonly category: string) {}

  trace(...args: LogArgs): void {
    this.log('trace', args);
  }

  debug(...args: LogArgs): void {
    this.log('debug', args);
  }

  info(...args: LogArgs): void {
    this.log('info', args);
  }

  warn(...args: LogArgs): void {
    this.log('warn', args);
  }

  error(...args: LogArgs): void {
    this.log('error', args);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return globalConfig.sinks.length > 0 && levelOrder[level] >= levelOrder[globalConfig.level];
  }

  private log(level: LogLevel, args: LogArgs): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry =
      args.length === 1
        ? { level, category: this.category, timestamp: new Date(), msg: args[0] }
        : { level, category: this.category, timestamp: new Date(), msg: args[1], context: serializeContext(args[0]) };

    for (const sink of globalConfig.sinks) {
      sink.write(entry);
    }
  }
}

let globalConfig: Required<LoggerConfig> = {
  level: 'info',
  sinks: [],
};

const loggerCache = new Map<string, Logger>();

/**
 * Replace the process-wide logger configuration.
 * Loggers already handed out pick up the new level and sinks.
 */
export function initLogger(config: LoggerConfig): void {
  globalConfig = {
    level: config.level ?? 'info',
    sinks: config.sinks ?? [],
  };
}

export function getLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) {
    return cached;
  }

  const logger = new CategoryLogger(category);
  loggerCache.set(category, logger);
  return logger;
}

export function flushLoggers(): void {
  for (const sink of globalConfig.sinks) {
    sink.flush();
  }
}
