import type { LogEntry, Sink } from '../logger.js';

/** Keeps entries in memory, for tests and for callers that report logs themselves. */
export class MemorySink implements Sink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(): string[] {
    return this.entries.map((entry) => entry.msg);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
