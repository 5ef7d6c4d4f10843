import pc from 'picocolors';

import type { LogEntry, LogLevel, Sink } from '../logger.js';

type ConsoleMethod = 'error' | 'log' | 'warn';

export interface ConsoleSinkOptions {
  color?: boolean | undefined;
  /** Lines held before the oldest are dropped. Default 1000. */
  maxBuffer?: number | undefined;
  /**
   * 'stderr' sends every level to console.error so stdout only carries command output
   * (the CLI uses this in --json mode). 'split' maps error/warn to console.error/console.warn
   * and the rest to console.log.
   */
  stream?: 'split' | 'stderr' | undefined;
}

interface PendingLine {
  method: ConsoleMethod;
  text: string;
}

const levelColors: Record<LogLevel, (text: string) => string> = {
  trace: pc.gray,
  debug: pc.cyan,
  info: pc.green,
  warn: pc.yellow,
  error: pc.red,
};

/**
 * Format: [HH:MM:SS] LEVEL [category] message {context}
 *
 * Lines are formatted when written and printed on the next turn of the event
 * loop, so a benchmark loop never waits on the terminal. `flush()` prints
 * whatever is pending right away; the CLI calls it before exiting.
 */
export class ConsoleSink implements Sink {
  private readonly color: boolean;
  private readonly maxBuffer: number;
  private readonly stream: 'split' | 'stderr';
  private pending: PendingLine[] = [];
  private dropped = 0;
  private scheduled = false;

  constructor(options?: ConsoleSinkOptions) {
    this.color = options?.color ?? false;
    this.maxBuffer = options?.maxBuffer ?? 1000;
    this.stream = options?.stream ?? 'split';
  }

  write(entry: LogEntry): void {
    if (this.pending.length >= this.maxBuffer) {
      this.pending.shift();
      this.dropped++;
    }
    this.pending.push({ method: this.methodFor(entry.level), text: this.format(entry) });

    if (!this.scheduled) {
      this.scheduled = true;
      setImmediate(() => this.flush());
    }
  }

  flush(): void {
    const lines = this.pending;
    const dropped = this.dropped;
    this.pending = [];
    this.dropped = 0;
    this.scheduled = false;

    if (dropped > 0) {
      this.print({
        method: this.methodFor('warn'),
        text: this.format({
          level: 'warn',
          category: 'logger',
          timestamp: new Date(),
          msg: `Dropped ${String(dropped)} log entries (buffer overflow)`,
        }),
      });
    }

    for (const line of lines) {
      this.print(line);
    }
  }

  private print(line: PendingLine): void {
    console[line.method](line.text);
  }

  private methodFor(level: LogLevel): ConsoleMethod {
    if (this.stream === 'stderr' || level === 'error') {
      return 'error';
    }
    return level === 'warn' ? 'warn' : 'log';
  }

  private format(entry: LogEntry): string {
    const context = entry.context ? ` ${this.formatContext(entry.context)}` : '';
    return `${this.formatTime(entry.timestamp)} ${this.formatLevel(entry.level)} [${entry.category}] ${entry.msg}${context}`;
  }

  private formatTime(timestamp: Date): string {
    const hours = String(timestamp.getHours()).padStart(2, '0');
    const minutes = String(timestamp.getMinutes()).padStart(2, '0');
    const seconds = String(timestamp.getSeconds()).padStart(2, '0');
    return `[${hours}:${minutes}:${seconds}]`;
  }

  private formatLevel(level: LogLevel): string {
    const upper = level.toUpperCase().padEnd(5);
    return this.color ? levelColors[level](upper) : upper;
  }

  private formatContext(context: Record<string, unknown>): string {
    const pairs = Object.entries(context).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
    return `{${pairs.join(', ')}}`;
  }
}
