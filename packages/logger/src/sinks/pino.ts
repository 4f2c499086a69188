import pino from 'pino';

import type { LogEntry, Sink } from '../logger.js';

export interface PinoSinkOptions {
  /** Where pino writes JSON lines. Defaults to stdout. */
  destination?: pino.DestinationStream | undefined;
  serviceName?: string | undefined;
}

/**
 * Forwards entries to a pino logger as structured JSON.
 * Filtering by level happens in the logger front end, so pino itself accepts everything.
 */
export class PinoSink implements Sink {
  private readonly logger: pino.Logger;

  constructor(options?: PinoSinkOptions) {
    const config: pino.LoggerOptions = {
      base: { service: options?.serviceName ?? 'relaypress' },
      level: 'trace',
      timestamp: pino.stdTimeFunctions.isoTime,
    };
    this.logger = options?.destination ? pino(config, options.destination) : pino(config);
  }

  write(entry: LogEntry): void {
    this.logger[entry.level]({ category: entry.category, ...entry.context }, entry.msg);
  }

  flush(): void {
    this.logger.flush();
  }
}
