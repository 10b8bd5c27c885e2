import { resolveLogLevel } from '../config/library';

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

type ConsoleSink = (...parts: unknown[]) => void;

const bindConsole = (method: LogLevel): ConsoleSink => {
  const { console } = globalThis;
  const candidate: ConsoleSink | undefined = console[method]?.bind(console);
  return candidate ?? console.log.bind(console);
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

export type LogMethod = (message: string, context?: Record<string, unknown>) => void;

export interface Logger {
  readonly level: LogLevel;
  readonly debug: LogMethod;
  readonly info: LogMethod;
  readonly warn: LogMethod;
  readonly error: LogMethod;
  readonly isEnabled: (level: LogLevel) => boolean;
  readonly child: (subsystem: string) => Logger;
}

export interface LoggerOptions {
  readonly writer?: LogWriter;
  readonly now?: NowFn;
  /** Entries below this level are dropped before reaching the writer. */
  readonly level?: LogLevel;
}

const sanitizeSubsystem = (subsystem: string): string => subsystem.trim() || 'unknown';

export const createLogger = (subsystem: string, options: LoggerOptions = {}): Logger => {
  const writer = options.writer ?? defaultLogWriter;
  const now = options.now ?? Date.now;
  const level = options.level ?? resolveLogLevel();
  const normalized = sanitizeSubsystem(subsystem);

  const isEnabled = (candidate: LogLevel): boolean => LEVEL_ORDER[candidate] >= LEVEL_ORDER[level];

  const forLevel = (entryLevel: LogLevel): LogMethod => {
    if (!isEnabled(entryLevel)) {
      return () => undefined;
    }
    return (message, context) => {
      writer({
        level: entryLevel,
        subsystem: normalized,
        message,
        context,
        timestamp: now(),
      });
    };
  };

  const child: Logger['child'] = (suffix) => {
    const combined = `${normalized}:${sanitizeSubsystem(suffix)}`;
    return createLogger(combined, { writer, now, level });
  };

  return {
    level,
    debug: forLevel('debug'),
    info: forLevel('info'),
    warn: forLevel('warn'),
    error: forLevel('error'),
    isEnabled,
    child,
  };
};

export const rootLogger = createLogger('cogs');
