import type { LogEntry, Sink } from '../logger.js';

/**
 * Keeps every entry in memory, unbuffered.
 */
export class MemorySink implements Sink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  flush(): void {
    // nothing buffered
  }

  messages(): string[] {
    return this.entries.map((entry) => entry.msg);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
