import type { LogEntry, LogLevel, Sink } from '../logger.js';

export interface ConsoleSinkOptions {
  color?: boolean;
}

const COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

/**
 * Writes one line per entry, synchronously.
 *
 * Format: LEVEL category: message key=value ...
 */
export class ConsoleSink implements Sink {
  private readonly color: boolean;

  constructor(options?: ConsoleSinkOptions) {
    this.color = options?.color ?? false;
  }

  write(entry: LogEntry): void {
    const line = ConsoleSink.format(entry, this.color);

    if (entry.level === 'error') {
      console.error(line);
    } else if (entry.level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  flush(): void {
    // console writes are not buffered
  }

  static format(entry: LogEntry, color = false): string {
    const upper = entry.level.toUpperCase().padEnd(5);
    const level = color ? `${COLORS[entry.level]}${upper}\x1b[0m` : upper;
    const pairs = Object.entries(entry.context ?? {}).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
    const suffix = pairs.length > 0 ? ` ${pairs.join(' ')}` : '';

    return `${level} ${entry.category}: ${entry.msg}${suffix}`;
  }
}
