import pc from 'picocolors';

import type { LogEntry, LogLevel, Sink } from '../logger.js';

export type ConsoleFormat = 'text' | 'json';

export interface ConsoleSinkOptions {
  color?: boolean | undefined;
  format?: ConsoleFormat | undefined;
  /** Defaults to stderr so stdout stays free for command output */
  stream?: { write(chunk: string): unknown } | undefined;
}

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  trace: pc.gray,
  debug: pc.cyan,
  info: pc.green,
  warn: pc.yellow,
  error: pc.red,
};

/**
 * Writes one line per entry, either `[HH:MM:SS] LEVEL [category] message {k=v}`
 * or a JSON object.
 */
export class ConsoleSink implements Sink {
  private readonly color: boolean;
  private readonly format: ConsoleFormat;
  private readonly stream: { write(chunk: string): unknown };

  constructor(options?: ConsoleSinkOptions) {
    this.color = options?.color ?? false;
    this.format = options?.format ?? 'text';
    this.stream = options?.stream ?? process.stderr;
  }

  write(entry: LogEntry): void {
    const line = this.format === 'json' ? formatJsonLine(entry) : formatLogLine(entry, this.color);
    this.stream.write(`${line}\n`);
  }
}

export function formatLogLine(entry: LogEntry, color = false): string {
  const time = entry.timestamp.toTimeString().slice(0, 8);
  const label = entry.level.toUpperCase().padEnd(5);
  const level = color ? LEVEL_COLORS[entry.level](label) : label;
  const context = entry.context
    ? ` {${Object.entries(entry.context)
        .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
        .join(', ')}}`
    : '';

  return `[${time}] ${level} [${entry.category}] ${entry.msg}${context}`;
}

export function formatJsonLine(entry: LogEntry): string {
  return JSON.stringify({
    time: entry.timestamp.toISOString(),
    level: entry.level,
    category: entry.category,
    msg: entry.msg,
    ...entry.context,
  });
}
