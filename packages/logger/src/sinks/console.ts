import pc from 'picocolors';

import { BufferedSink, type BufferedSinkOptions } from '../buffered-sink.js';
import type { LogEntry, LogLevel } from '../logger.js';

export interface TextStream {
  write(chunk: string): unknown;
}

export interface ConsoleSinkOptions extends BufferedSinkOptions {
  color?: boolean | undefined;
  /** Defaults to stderr: stdout carries the CLI's balance table. */
  stream?: TextStream | undefined;
}

const levelColors: Record<LogLevel, (text: string) => string> = {
  trace: pc.gray,
  debug: pc.cyan,
  info: pc.green,
  warn: pc.yellow,
  error: pc.red,
};

/**
 * Human-readable sink.
 *
 * Format: `[HH:MM:SS] LEVEL [category] message {key=value, ...}`
 */
export class ConsoleSink extends BufferedSink {
  private readonly color: boolean;
  private readonly stream: TextStream;

  constructor(options?: ConsoleSinkOptions) {
    super(options);
    this.color = options?.color ?? false;
    this.stream = options?.stream ?? process.stderr;
  }

  protected writeEntry(entry: LogEntry): void {
    const context = entry.context ? ` ${formatContext(entry.context)}` : '';
    this.stream.write(
      `${formatTime(entry.timestamp)} ${this.formatLevel(entry.level)} [${entry.category}] ${entry.msg}${context}\n`
    );
  }

  private formatLevel(level: LogLevel): string {
    const label = level.toUpperCase().padEnd(5);
    return this.color ? levelColors[level](label) : label;
  }
}

function formatTime(timestamp: Date): string {
  const parts = [timestamp.getHours(), timestamp.getMinutes(), timestamp.getSeconds()];
  return `[${parts.map((part) => String(part).padStart(2, '0')).join(':')}]`;
}

function formatContext(context: Record<string, unknown>): string {
  return `{${Object.entries(context)
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
    .join(', ')}}`;
}
