import { isLevelEnabled, type LogEntry, type LogLevel, type Sink } from './logger.js';

export interface BufferedSinkOptions {
  /** Entries kept before the buffer overflows. Default: 1000 */
  maxBuffer?: number | undefined;
  /** On overflow, drop the oldest entry or drain the buffer synchronously. Default: 'drop-oldest' */
  overflow?: 'drop-oldest' | 'drain' | undefined;
  /** Minimum level this sink accepts, on top of the global level. */
  level?: LogLevel | undefined;
  /** Only accept entries from these categories. Default: all categories */
  categories?: readonly string[] | undefined;
}

/**
 * Base class for sinks that buffer log entries and write them on the next tick.
 * Keeps per-event logging off the transaction processing loop.
 *
 * Subclasses implement `writeEntry(entry)` for actual output.
 */
export abstract class BufferedSink implements Sink {
  private buffer: LogEntry[] = [];
  private scheduled = false;
  private dropped = 0;
  private readonly maxBuffer: number;
  private readonly overflow: 'drop-oldest' | 'drain';
  private readonly level: LogLevel;
  private readonly categories: ReadonlySet<string> | undefined;

  constructor(options?: BufferedSinkOptions) {
    this.maxBuffer = options?.maxBuffer ?? 1000;
    this.overflow = options?.overflow ?? 'drop-oldest';
    this.level = options?.level ?? 'trace';
    this.categories = options?.categories ? new Set(options.categories) : undefined;
  }

  protected abstract writeEntry(entry: LogEntry): void;

  accepts(entry: LogEntry): boolean {
    if (!isLevelEnabled(entry.level, this.level)) return false;
    return this.categories === undefined || this.categories.has(entry.category);
  }

  write(entry: LogEntry): void {
    if (!this.accepts(entry)) return;

    if (this.buffer.length >= this.maxBuffer && this.overflow === 'drain') {
      this.drain();
    } else if (this.buffer.length >= this.maxBuffer) {
      this.dropped++;
      this.buffer.shift(); // drop oldest
    }
    this.buffer.push(entry);
    if (!this.scheduled) {
      this.scheduled = true;
      setImmediate(() => this.drain());
    }
  }

  /** Drain buffer synchronously. Call before process exit. */
  flush(): void {
    this.drain();
  }

  private drain(): void {
    const entries = this.buffer;
    const dropped = this.dropped;
    this.buffer = [];
    this.scheduled = false;
    this.dropped = 0;

    if (dropped > 0) {
      this.writeEntry({
        level: 'warn',
        category: 'logger',
        timestamp: new Date(),
        msg: `Dropped ${String(dropped)} log entries (buffer overflow)`,
      });
    }

    for (const entry of entries) {
      this.writeEntry(entry);
    }
  }
}
