/**
 * SyncLogger.ts
 * Category loggers for the sync layer
 *
 * Every component logs through a named category. Output goes to whatever sinks
 * the shared LoggingManager holds; the console sink is installed by default.
 */

// ============================================================================
// Types
// ============================================================================

export enum LogLevel {
  Debug = 0,
  Info = 1,
  Warning = 2,
  Error = 3,
}

export interface LogEntry {
  readonly timestamp: number;
  readonly level: LogLevel;
  readonly category: string;
  readonly message: string;
  readonly metadata?: Record<string, unknown>;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

export interface Logger {
  debug(message: string, metadata?: Record<string, unknown>): void;
  info(message: string, metadata?: Record<string, unknown>): void;
  warning(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, metadata?: Record<string, unknown>): void;
}

// ============================================================================
// Sinks
// ============================================================================

export function getLogLevelDescription(level: LogLevel): string {
  switch (level) {
    case LogLevel.Debug:
      return 'DEBUG';
    case LogLevel.Info:
      return 'INFO';
    case LogLevel.Warning:
      return 'WARN';
    case LogLevel.Error:
      return 'ERROR';
  }
}

export function formatLogEntry(entry: LogEntry): string {
  const timestamp = new Date(entry.timestamp).toISOString();
  return `[${timestamp}] [${getLogLevelDescription(entry.level)}] [${entry.category}] ${entry.message}`;
}

export class ConsoleLogSink implements LogSink {
  write(entry: LogEntry): void {
    const line = formatLogEntry(entry);
    const write = entry.level >= LogLevel.Error
      ? console.error
      : entry.level === LogLevel.Warning
        ? console.warn
        : console.log;

    if (entry.metadata) {
      write(line, entry.metadata);
    } else {
      write(line);
    }
  }
}

/**
 * Keeps entries in memory, oldest first. Used by tests and diagnostics screens.
 */
export class MemoryLogSink implements LogSink {
  private readonly entries: LogEntry[];
  private readonly maxEntries: number;

  constructor(maxEntries: number = 1000) {
    this.entries = [];
    this.maxEntries = maxEntries;
  }

  write(entry: LogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries);
    }
  }

  getEntries(): readonly LogEntry[] {
    return [...this.entries];
  }

  getEntriesAtLevel(level: LogLevel): readonly LogEntry[] {
    return this.entries.filter(e => e.level === level);
  }

  getMessages(): readonly string[] {
    return this.entries.map(e => e.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

// ============================================================================
// LoggingManager
// ============================================================================

export class LoggingManager {
  private minLevel: LogLevel;
  private sinks: LogSink[];

  constructor(minLevel: LogLevel = LogLevel.Info, sinks: LogSink[] = [new ConsoleLogSink()]) {
    this.minLevel = minLevel;
    this.sinks = sinks;
  }

  setLogLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLogLevel(): LogLevel {
    return this.minLevel;
  }

  setSinks(sinks: LogSink[]): void {
    this.sinks = [...sinks];
  }

  addSink(sink: LogSink): () => void {
    this.sinks.push(sink);
    return () => {
      this.sinks = this.sinks.filter(s => s !== sink);
    };
  }

  log(
    level: LogLevel,
    category: string,
    message: string,
    metadata?: Record<string, unknown>
  ): void {
    if (level < this.minLevel) {
      return;
    }

    const entry: LogEntry = {
      timestamp: Date.now(),
      level,
      category,
      message,
      metadata,
    };

    for (const sink of this.sinks) {
      sink.write(entry);
    }
  }
}

// ============================================================================
// Category Logger
// ============================================================================

/**
 * Without an explicit manager the shared one is looked up on every call, so a
 * logger created before resetLoggingManager() follows the reset.
 */
export class CategoryLogger implements Logger {
  private readonly category: string;
  private readonly manager: LoggingManager | null;

  constructor(category: string, manager: LoggingManager | null = null) {
    this.category = category;
    this.manager = manager;
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.target().log(LogLevel.Debug, this.category, message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.target().log(LogLevel.Info, this.category, message, metadata);
  }

  warning(message: string, metadata?: Record<string, unknown>): void {
    this.target().log(LogLevel.Warning, this.category, message, metadata);
  }

  error(message: string, metadata?: Record<string, unknown>): void {
    this.target().log(LogLevel.Error, this.category, message, metadata);
  }

  private target(): LoggingManager {
    return this.manager ?? getLoggingManager();
  }
}

// ============================================================================
// Singleton Instance
// ============================================================================

let loggingManagerInstance: LoggingManager | null = null;

export function getLoggingManager(): LoggingManager {
  if (!loggingManagerInstance) {
    loggingManagerInstance = new LoggingManager();
  }
  return loggingManagerInstance;
}

export function resetLoggingManager(
  minLevel?: LogLevel,
  sinks?: LogSink[]
): LoggingManager {
  loggingManagerInstance = new LoggingManager(minLevel, sinks);
  return loggingManagerInstance;
}

/**
 * Create a logger bound to a category. Pass a manager to bypass the shared one.
 */
export function createLogger(category: string, manager?: LoggingManager): Logger {
  return new CategoryLogger(category, manager ?? null);
}
