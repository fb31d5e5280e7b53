import pino from 'pino';

import type { LogEntry, Sink } from '../logger.js';

export interface PinoSinkOptions {
  /** Existing pino logger to forward to. Takes precedence over `destination`. */
  logger?: pino.Logger;
  /** Where a freshly created pino logger writes; stdout when omitted. */
  destination?: pino.DestinationStream;
  service?: string;
}

/**
 * Forwards entries to pino as structured JSON.
 * The category travels as a `category` field next to the entry context.
 */
export class PinoSink implements Sink {
  private readonly pino: pino.Logger;

  constructor(options?: PinoSinkOptions) {
    this.pino =
      options?.logger ??
      pino.pino(
        {
          base: { service: options?.service ?? 'iso10962' },
          level: 'trace',
          timestamp: pino.stdTimeFunctions.isoTime,
        },
        options?.destination ?? pino.destination({ dest: 1, sync: true })
      );
  }

  write(entry: LogEntry): void {
    this.pino[entry.level]({ ...entry.context, category: entry.category }, entry.msg);
  }

  flush(): void {
    this.pino.flush();
  }
}
