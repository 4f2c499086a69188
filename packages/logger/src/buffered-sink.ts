import type { LogEntry, Sink } from './logger.js';

export interface BufferedSinkOptions {
  /** Entries held before the oldest are discarded. Default 1000. */
  maxBuffer?: number | undefined;
}

/**
 * Base class for sinks that queue entries and write them on the next macrotask,
 * so logging inside a retry or breaker callback never does I/O inline.
 *
 * When the queue is full the oldest entry goes. Each category that lost entries
 * gets one warning, under its own category, ahead of the next drained batch.
 */
export abstract class BufferedSink implements Sink {
  private queue: LogEntry[] = [];
  private drainScheduled = false;
  private droppedByCategory = new Map<string, number>();
  private readonly maxBuffer: number;

  constructor(options?: BufferedSinkOptions) {
    this.maxBuffer = options?.maxBuffer ?? 1000;
  }

  protected abstract writeEntry(entry: LogEntry): void;

  write(entry: LogEntry): void {
    if (this.queue.length >= this.maxBuffer) {
      const evicted = this.queue.shift();
      if (evicted) {
        this.droppedByCategory.set(evicted.category, (this.droppedByCategory.get(evicted.category) ?? 0) + 1);
      }
    }
    this.queue.push(entry);

    if (!this.drainScheduled) {
      this.drainScheduled = true;
      setImmediate(() => this.drain());
    }
  }

  /** Write everything queued now. Call before process exit. */
  flush(): void {
    this.drain();
  }

  private drain(): void {
    const entries = this.queue;
    const dropped = this.droppedByCategory;
    this.queue = [];
    this.droppedByCategory = new Map();
    this.drainScheduled = false;

    for (const [category, count] of dropped) {
      this.writeEntry({
        level: 'warn',
        category,
        timestamp: new Date(),
        msg: `Dropped ${count} log entries (buffer overflow)`,
        context: { dropped: count },
      });
    }

    for (const entry of entries) {
      this.writeEntry(entry);
    }
  }
}
