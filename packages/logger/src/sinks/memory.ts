import type { LogEntry, LogLevel, Sink } from '../logger.js';

/**
 * Keeps entries in an array. Used by tests and by hosts that surface parser
 * diagnostics themselves.
 */
export class MemorySink implements Sink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  flush(): void {
    // nothing buffered
  }

  byLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
