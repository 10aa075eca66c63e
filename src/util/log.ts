export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  readonly level: LogLevel;
  readonly subsystem: string;
  readonly message: string;
  readonly timestamp: number;
  readonly context?: Record<string, unknown>;
}

export type LogWriter = (entry: LogEntry) => void;
export type NowFn = () => number;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const toIsoTimestamp = (timestamp: number): string => new Date(timestamp).toISOString();

const bindConsole = <Key extends LogLevel>(method: Key): ((...parts: unknown[]) => void) => {
  const { console } = globalThis;
  const fallback = console.log.bind(console);
  const candidate = console[method]?.bind(console);
  return candidate ?? fallback;
};

export const defaultLogWriter: LogWriter = (entry) => {
  const sink = bindConsole(entry.level);
  const prefix = `[${entry.level.toUpperCase()}][${entry.subsystem}]`;
  const timestamp = toIsoTimestamp(entry.timestamp);

  if (entry.context && Object.keys(entry.context).length > 0) {
    sink(`${timestamp} ${prefix} ${entry.message}`, entry.context);
    return;
  }

  sink(`${timestamp} ${prefix} ${entry.message}`);
};

/** One line per entry, context as JSON; for CLIs whose stdout carries results. */
export const createLineLogWriter = (writeLine: (line: string) => void): LogWriter => (entry) => {
  const prefix = `${toIsoTimestamp(entry.timestamp)} [${entry.level.toUpperCase()}][${entry.subsystem}] ${entry.message}`;
  const hasContext = entry.context !== undefined && Object.keys(entry.context).length > 0;
  writeLine(hasContext ? `${prefix} ${JSON.stringify(entry.context)}` : prefix);
};

export interface Logger {
  readonly debug: (message: string, context?: Record<string, unknown>) => void;
  readonly info: (message: string, context?: Record<string, unknown>) => void;
  readonly warn: (message: string, context?: Record<string, unknown>) => void;
  readonly error: (message: string, context?: Record<string, unknown>) => void;
  readonly child: (subsystem: string) => Logger;
}

export interface LoggerOptions {
  readonly writer?: LogWriter;
  readonly now?: NowFn;
  readonly minLevel?: LogLevel;
}

const sanitizeSubsystem = (subsystem: string): string => subsystem.trim() || 'unknown';

export const parseLogLevel = (value: string | undefined): LogLevel | undefined => {
  const normalized = value?.trim().toLowerCase();
  switch (normalized) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return normalized;
    default:
      return undefined;
  }
};

const createLoggerForLevel = (
  level: LogLevel,
  subsystem: string,
  writer: LogWriter,
  now: NowFn,
  minLevel: LogLevel,
): ((message: string, context?: Record<string, unknown>) => void) => {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) {
    return () => undefined;
  }

  return (message, context) => {
    const entry: LogEntry = {
      level,
      subsystem,
      message,
      context,
      timestamp: now(),
    };
    writer(entry);
  };
};

export const createLogger = (subsystem: string, options: LoggerOptions = {}): Logger => {
  const writer = options.writer ?? defaultLogWriter;
  const now = options.now ?? Date.now;
  const minLevel = options.minLevel ?? 'debug';
  const normalized = sanitizeSubsystem(subsystem);

  const debug = createLoggerForLevel('debug', normalized, writer, now, minLevel);
  const info = createLoggerForLevel('info', normalized, writer, now, minLevel);
  const warn = createLoggerForLevel('warn', normalized, writer, now, minLevel);
  const error = createLoggerForLevel('error', normalized, writer, now, minLevel);

  const child: Logger['child'] = (suffix) => {
    const combined = `${normalized}:${sanitizeSubsystem(suffix)}`;
    return createLogger(combined, { writer, now, minLevel });
  };

  return {
    debug,
    info,
    warn,
    error,
    child,
  };
};

// LEAPWISE_LOG_LEVEL raises the floor for every logger derived from the root.
export const rootLogger = createLogger('leapwise', {
  minLevel: parseLogLevel(process.env.LEAPWISE_LOG_LEVEL) ?? 'info',
});
