import type { LogEntry, Sink } from './logger.js';

export interface BufferedSinkOptions {
  /** Queue length at which entries are written out immediately. Defaults to 1000. */
  highWaterMark?: number | undefined;
}

/**
 * Sink base class that batches entries and writes them on the next macrotask.
 *
 * Nothing is ever discarded: a batch that reaches `highWaterMark` is written
 * synchronously, so a run that rejects thousands of records inside one input
 * chunk still logs every one of them.
 */
export abstract class BufferedSink implements Sink {
  private batch: LogEntry[] = [];
  private drainScheduled = false;
  private readonly highWaterMark: number;

  constructor(options?: BufferedSinkOptions) {
    this.highWaterMark = Math.max(1, options?.highWaterMark ?? 1000);
  }

  protected abstract writeEntry(entry: LogEntry): void;

  write(entry: LogEntry): void {
    this.batch.push(entry);

    if (this.batch.length >= this.highWaterMark) {
      this.flush();
      return;
    }

    if (!this.drainScheduled) {
      this.drainScheduled = true;
      setImmediate(() => {
        this.drainScheduled = false;
        this.flush();
      });
    }
  }

  flush(): void {
    const entries = this.batch;
    this.batch = [];
    entries.forEach((entry) => this.writeEntry(entry));
  }
}
