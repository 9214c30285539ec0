/**
 * Leveled diagnostic logger.
 * Entries go to stderr so stdout carries only report output.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context?: Record<string, unknown>;
  tag?: string;
}

export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => console.error(line);

/**
 * `timestamp LEVEL [tag] message {context}`
 */
export function formatEntry(entry: LogEntry): string {
  const tag = entry.tag ? ` [${entry.tag}]` : '';
  const context = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
  return `${entry.timestamp.toISOString()} ${LogLevel[entry.level]}${tag} ${entry.message}${context}`;
}

export class Logger {
  constructor(
    private threshold: LogLevel = LogLevel.INFO,
    private sink: LogSink = stderrSink,
    private clock: () => Date = () => new Date()
  ) {}

  setLevel(level: LogLevel): void {
    this.threshold = level;
  }

  write(level: LogLevel, message: string, context?: Record<string, unknown>, tag?: string): void {
    if (level < this.threshold) return;
    this.sink(formatEntry({ level, message, timestamp: this.clock(), context, tag }));
  }
}

export const logger = new Logger();

// tag is usually the ticker
export const logDebug = (message: string, context?: Record<string, unknown>, tag?: string) =>
  logger.write(LogLevel.DEBUG, message, context, tag);
export const logInfo = (message: string, context?: Record<string, unknown>, tag?: string) =>
  logger.write(LogLevel.INFO, message, context, tag);
export const logWarn = (message: string, context?: Record<string, unknown>, tag?: string) =>
  logger.write(LogLevel.WARN, message, context, tag);
export const logError = (message: string, context?: Record<string, unknown>, tag?: string) =>
  logger.write(LogLevel.ERROR, message, context, tag);
