import { BufferedSink, type BufferedSinkOptions } from '../buffered-sink.js';
import type { LogEntry, LogLevel } from '../logger.js';

export interface ConsoleSinkOptions extends BufferedSinkOptions {
  color?: boolean | undefined;
}

const ANSI_COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

/**
 * Human-readable console output.
 *
 * Format: [HH:MM:SS] LEVEL [category] message {key=value, ...}
 */
export class ConsoleSink extends BufferedSink {
  private readonly color: boolean;

  constructor(options?: ConsoleSinkOptions) {
    super(options);
    this.color = options?.color ?? false;
  }

  protected writeEntry(entry: LogEntry): void {
    const line = formatConsoleLine(entry, this.color);

    if (entry.level === 'error') {
      console.error(line);
    } else if (entry.level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

export function formatConsoleLine(entry: LogEntry, color = false): string {
  const time = [entry.timestamp.getHours(), entry.timestamp.getMinutes(), entry.timestamp.getSeconds()]
    .map((part) => String(part).padStart(2, '0'))
    .join(':');
  const label = entry.level.toUpperCase().padEnd(5);
  const level = color ? `${ANSI_COLORS[entry.level]}${label}\x1b[0m` : label;
  const context = entry.context ? ` ${formatContext(entry.context)}` : '';

  return `[${time}] ${level} [${entry.category}] ${entry.msg}${context}`;
}

function formatContext(context: Record<string, unknown>): string {
  const pairs = Object.entries(context).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
  return `{${pairs.join(', ')}}`;
}
