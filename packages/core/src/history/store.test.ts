import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { HistoryRecord } from '../types/history.js';
import { HistoryStore } from './store.js';

function track(n: number): HistoryRecord {
  return {
    title: `Track ${n}`,
    artist: 'Test Artist',
    album: 'Test Album',
    sourceUrl: `https://music.youtube.com/watch?v=id${n}`,
    sourceId: `id${n}`,
    durationSeconds: 180 + n,
    downloadedAt: new Date(Date.UTC(2024, 0, 1, 0, n)),
  };
}

async function collect(store: HistoryStore): Promise<HistoryRecord[]> {
  const records: HistoryRecord[] = [];
  for await (const record of store.load()) {
    records.push(record);
  }
  return records;
}

describe('HistoryStore', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'history-'));
    filePath = join(dir, 'history.jsonl');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads nothing before the first append', async () => {
    const store = new HistoryStore({ filePath, limit: 10, enabled: true });
    expect(await collect(store)).toEqual([]);
  });

  it('returns the appended record first', async () => {
    const store = new HistoryStore({ filePath, limit: 10, enabled: true });
    await store.append(track(1));
    await store.append(track(2));

    const records = await collect(store);

    expect(records[0]).toEqual(track(2));
    expect(records[1]).toEqual(track(1));
  });

  it('keeps only the newest records, oldest first on disk', async () => {
    const store = new HistoryStore({ filePath, limit: 10, enabled: true });
    for (let n = 1; n <= 15; n++) {
      await store.append(track(n));
    }

    const records = await collect(store);
    expect(records).toHaveLength(10);
    expect(records.map((record) => record.sourceId)).toEqual(
      ['id15', 'id14', 'id13', 'id12', 'id11', 'id10', 'id9', 'id8', 'id7', 'id6']
    );

    const lines = (await readFile(filePath, 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(11);
    const rows = lines.slice(1).map((line): unknown[] => JSON.parse(line));
    expect(rows.map((row) => row[4])).toEqual(
      [6, 7, 8, 9, 10, 11, 12, 13, 14, 15].map((n) => new Date(Date.UTC(2024, 0, 1, 0, n)).toISOString())
    );
  });

  it('writes a header naming the current columns', async () => {
    const store = new HistoryStore({ filePath, limit: 5, enabled: true });
    await store.append(track(1));

    const [header] = (await readFile(filePath, 'utf8')).split('\n');
    expect(JSON.parse(header ?? '')).toEqual({
      schema: 3,
      columns: ['title', 'artist', 'sourceId', 'sourceUrl', 'downloadedAt', 'durationSeconds', 'album'],
    });
  });

  it('upgrades rows written under older schemas', async () => {
    await writeFile(filePath, [
      JSON.stringify({ schema: 1 }),
      JSON.stringify(['Old', 'Someone', 'abc', 'https://youtu.be/abc', '2023-05-01T10:00:00.000Z']),
      '',
    ].join('\n'));
    const store = new HistoryStore({ filePath, limit: 5, enabled: true });

    expect(await collect(store)).toEqual([{
      title: 'Old',
      artist: 'Someone',
      sourceId: 'abc',
      sourceUrl: 'https://youtu.be/abc',
      downloadedAt: new Date('2023-05-01T10:00:00.000Z'),
      durationSeconds: null,
      album: null,
    }]);

    await store.append(track(1));
    const records = await collect(store);
    expect(records.map((record) => record.sourceId)).toEqual(['id1', 'abc']);
    expect(records[1]?.durationSeconds).toBeNull();
  });

  it('ignores columns a schema 2 row did not have', async () => {
    await writeFile(filePath, [
      JSON.stringify({ schema: 2 }),
      JSON.stringify(['Mid', 'Someone', 'def', 'https://youtu.be/def', '2023-06-01T00:00:00.000Z', 201]),
    ].join('\n'));
    const store = new HistoryStore({ filePath, limit: 5, enabled: true });

    const [record] = await collect(store);
    expect(record?.durationSeconds).toBe(201);
    expect(record?.album).toBeNull();
  });

  it('skips malformed rows', async () => {
    await writeFile(filePath, [
      JSON.stringify({ schema: 3 }),
      'not json',
      JSON.stringify(['', 'x', 'y', 'z', 'nope']),
      JSON.stringify(['Good', 'Artist', 'ghi', 'https://youtu.be/ghi', '2023-07-01T00:00:00.000Z', null, null]),
    ].join('\n'));
    const store = new HistoryStore({ filePath, limit: 5, enabled: true });

    const records = await collect(store);
    expect(records.map((record) => record.title)).toEqual(['Good']);
  });

  it('can be iterated more than once', async () => {
    const store = new HistoryStore({ filePath, limit: 5, enabled: true });
    await store.append(track(1));
    const sequence = store.load();

    const first: string[] = [];
    for await (const record of sequence) first.push(record.sourceId);
    const second: string[] = [];
    for await (const record of sequence) second.push(record.sourceId);

    expect(first).toEqual(['id1']);
    expect(second).toEqual(['id1']);
  });

  it('serialises concurrent appends', async () => {
    const store = new HistoryStore({ filePath, limit: 10, enabled: true });

    await Promise.all([1, 2, 3, 4].map((n) => store.append(track(n))));

    expect((await store.recent()).map((record) => record.sourceId)).toEqual(['id4', 'id3', 'id2', 'id1']);
  });

  it('does nothing when disabled', async () => {
    const store = new HistoryStore({ filePath, limit: 5, enabled: false });

    await store.append(track(1));

    expect(await collect(store)).toEqual([]);
    await expect(readFile(filePath, 'utf8')).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
