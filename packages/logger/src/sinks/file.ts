import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import { BufferedSink, type BufferedSinkOptions } from '../buffered-sink.js';
import type { LogEntry } from '../logger.js';

export interface FileSinkOptions extends BufferedSinkOptions {
  path: string;
}

/**
 * Append-only sink writing one JSON object per line.
 * Accessed via the @ledgerline/logger/file subpath export.
 */
export class FileSink extends BufferedSink {
  readonly path: string;

  constructor(options: FileSinkOptions) {
    super(options);

    mkdirSync(dirname(options.path), { recursive: true });

    this.path = options.path;
  }

  protected writeEntry(entry: LogEntry): void {
    const line = JSON.stringify({
      timestamp: entry.timestamp.toISOString(),
      level: entry.level,
      category: entry.category,
      msg: entry.msg,
      ...(entry.context ? { context: entry.context } : {}),
    });
    // Synchronous append: BufferedSink already batches calls, and a crash must not lose drained lines
    appendFileSync(this.path, line + '\n', 'utf8');
  }
}
