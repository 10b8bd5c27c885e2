export * from './math';
export * from './easing';
export * from './random';
export * from './weighted-picker';
export * from './hash';
export * from './input-helpers';
export { createLogger, defaultLogWriter, rootLogger } from './log';
export type { LogEntry, LogLevel, LogMethod, LogWriter, Logger, LoggerOptions, NowFn } from './log';
