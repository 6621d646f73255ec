/**
 * Recent-Downloads History Store
 *
 * Bounded on-disk log of completed downloads. Writes go through a single
 * queue and replace the file atomically; reads parse the file afresh each
 * time they are iterated.
 */

import { atomicWriteFile, KeyedQueue, safeReadFile, type Logger } from '@tunegrab/utils';
import type { HistoryRecord } from '../types/history.js';
import {
  CURRENT_SCHEMA,
  currentHeader,
  decodeRow,
  encodeRow,
  headerSchema,
  rowSchema,
} from './schema.js';

export interface HistoryStoreOptions {
  filePath: string;
  /** Most recent records kept after each append */
  limit: number;
  enabled: boolean;
  logger?: Logger;
}

interface ParsedHistory {
  schema: number;
  records: HistoryRecord[];
  skipped: number;
}

export class HistoryStore {
  private readonly writes = new KeyedQueue<'history'>();

  constructor(private readonly options: HistoryStoreOptions) {
    if (!Number.isInteger(options.limit) || options.limit < 1) {
      throw new RangeError(`History limit must be a positive integer, got ${options.limit}`);
    }
  }

  get enabled(): boolean {
    return this.options.enabled;
  }

  /**
   * Add a record and drop everything beyond the newest `limit`
   */
  append(record: HistoryRecord): Promise<void> {
    if (!this.options.enabled) {
      return Promise.resolve();
    }

    return this.writes.run('history', async () => {
      const { records } = await this.read();
      records.push(record);
      const kept = records.slice(-this.options.limit);

      const lines = [
        JSON.stringify(currentHeader()),
        ...kept.map((item) => JSON.stringify(encodeRow(item))),
      ];
      await atomicWriteFile(this.options.filePath, `${lines.join('\n')}\n`);
      this.options.logger?.debug(
        { title: record.title, sourceId: record.sourceId, kept: kept.length },
        'Recorded download in history'
      );
    });
  }

  /**
   * Records newest first. Each iteration reads the file again.
   */
  load(): AsyncIterable<HistoryRecord> {
    return {
      [Symbol.asyncIterator]: () => this.iterate(),
    };
  }

  /**
   * Drain `load()` into an array, at most `limit` entries
   */
  async recent(limit = this.options.limit): Promise<HistoryRecord[]> {
    const records: HistoryRecord[] = [];
    for await (const record of this.load()) {
      if (records.length >= limit) {
        break;
      }
      records.push(record);
    }
    return records;
  }

  private async *iterate(): AsyncGenerator<HistoryRecord> {
    if (!this.options.enabled) {
      return;
    }
    const { records } = await this.read();
    for (let index = records.length - 1; index >= 0; index--) {
      const record = records[index];
      if (record) {
        yield record;
      }
    }
  }

  private async read(): Promise<ParsedHistory> {
    const content = await safeReadFile(this.options.filePath);
    if (content === null) {
      return { schema: CURRENT_SCHEMA, records: [], skipped: 0 };
    }

    const lines = content.split(/\r?\n/).filter((line) => line.trim().length > 0);
    let schema = 1;
    let start = 0;

    const first = lines[0];
    if (first !== undefined) {
      const header = headerSchema.safeParse(parseJson(first));
      if (header.success) {
        schema = header.data.schema;
        start = 1;
      }
    }

    const parsed: ParsedHistory = { schema, records: [], skipped: 0 };
    for (let index = start; index < lines.length; index++) {
      const line = lines[index] ?? '';
      const row = rowSchema.safeParse(parseJson(line));
      if (!row.success) {
        parsed.skipped++;
        continue;
      }
      try {
        parsed.records.push(decodeRow(row.data, schema));
      } catch (error) {
        parsed.skipped++;
        this.options.logger?.debug({ err: error, line: index + 1 }, 'Invalid history row');
      }
    }

    if (parsed.skipped > 0) {
      this.options.logger?.warn(
        { file: this.options.filePath, skipped: parsed.skipped },
        'Skipped malformed history rows'
      );
    }
    return parsed;
  }
}

function parseJson(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}
