import { createReadStream } from 'node:fs';
import type { Readable } from 'node:stream';

import { formatZodIssues, fromZod, TransactionRowSchema, ValidationError, type TransactionEvent } from '@ledgerline/core';
import { getLogger } from '@ledgerline/logger';
import { parse } from 'csv-parse';
import { z } from 'zod';

const REQUIRED_COLUMNS = ['type', 'client', 'tx'] as const;

// Shape of each chunk csv-parse emits with `info: true` and `columns` set
const ParsedRecordSchema = z.object({
  info: z.object({ lines: z.number() }),
  record: z.record(z.string(), z.unknown()),
});

function normalizeHeaders(header: string[]): string[] {
  const columns = header.map((name) => name.trim().toLowerCase());
  const missing = REQUIRED_COLUMNS.filter((column) => !columns.includes(column));
  if (missing.length > 0) {
    throw new ValidationError(
      `Input is missing required column${missing.length > 1 ? 's' : ''}: ${missing.join(', ')}`,
      missing.map((column) => `${column}: column is required`)
    );
  }
  return columns;
}

/**
 * Streams transaction events out of a `type,client,tx,amount` CSV file.
 *
 * Rows that fail validation are logged and skipped; framing errors (unterminated
 * quotes, unreadable file, missing header columns) end the stream with an error.
 */
export class CsvTransactionReader {
  private readonly logger = getLogger('CsvTransactionReader');
  private rowsRead = 0;
  private rowsSkipped = 0;

  constructor(
    private readonly filePath: string,
    private readonly openStream: (path: string) => Readable = createReadStream
  ) {}

  get readRows(): number {
    return this.rowsRead;
  }

  get skippedRows(): number {
    return this.rowsSkipped;
  }

  async *events(): AsyncGenerator<TransactionEvent> {
    const parser = parse({
      bom: true,
      columns: normalizeHeaders,
      info: true,
      relax_column_count: true,
      skip_empty_lines: true,
      trim: true,
    });

    const input = this.openStream(this.filePath);
    input.on('error', (error) => parser.destroy(error));
    input.pipe(parser);

    // Also runs when the consumer stops early
    try {
      const chunks: AsyncIterable<unknown> = parser;
      for await (const chunk of chunks) {
        const parsed = ParsedRecordSchema.parse(chunk);
        this.rowsRead++;

        const row = fromZod(TransactionRowSchema, parsed.record);
        if (row.isErr()) {
          this.rowsSkipped++;
          this.logger.warn({ line: parsed.info.lines, issues: formatZodIssues(row.error) }, 'Skipping malformed row');
          continue;
        }

        yield row.value;
      }
    } finally {
      input.unpipe(parser);
      input.destroy();
    }

    this.logger.debug(
      { file: this.filePath, rows: this.rowsRead, skipped: this.rowsSkipped },
      'Finished reading transactions'
    );
  }
}
