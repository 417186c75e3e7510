import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import { BufferedSink, type BufferedSinkOptions } from '../buffered-sink.js';
import type { LogEntry } from '../logger.js';

export interface FileSinkOptions extends BufferedSinkOptions {
  path: string;
}

/**
 * Appends one JSON object per entry. Writes are synchronous so a flush right
 * before exit leaves nothing behind.
 */
export class FileSink extends BufferedSink {
  readonly path: string;

  constructor(options: FileSinkOptions) {
    super(options);
    mkdirSync(dirname(options.path), { recursive: true });
    this.path = options.path;
  }

  protected writeEntry(entry: LogEntry): void {
    const record = {
      timestamp: entry.timestamp.toISOString(),
      level: entry.level,
      category: entry.category,
      msg: entry.msg,
      ...(entry.context ? { context: entry.context } : {}),
    };
    appendFileSync(this.path, `${JSON.stringify(record)}\n`, 'utf8');
  }
}
