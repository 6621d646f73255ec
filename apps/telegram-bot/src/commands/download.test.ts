import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { HistoryStore } from '@tunegrab/core';
import type { AlbumInfo } from '@tunegrab/catalog';
import { Dispatcher } from '../dispatcher.js';
import { CONVERSATION, testConfig, testServices, track, type TestServices } from '../testing/fakes.js';
import { buildCommands } from './index.js';

async function run(services: TestServices, text: string): Promise<string | undefined> {
  await new Dispatcher(services, buildCommands()).handle({ conversation: CONVERSATION, messageId: 1, text });
  return services.chat.edits.at(-1)?.text;
}

function album(id: string, titles: string[]): AlbumInfo {
  return {
    kind: 'album',
    id,
    title: 'Record',
    artist: 'Band',
    year: '2021',
    url: `https://music.youtube.com/browse/${id}`,
    thumbnails: [],
    tracks: titles.map((title, index) => track(String.fromCharCode(97 + index).repeat(11), title)),
  };
}

describe('/dl', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'dl-command-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('sends a track, records it and releases the file', async () => {
    const history = new HistoryStore({ filePath: join(dir, 'history.jsonl'), limit: 10, enabled: true });
    const services = testServices({ config: testConfig({ BOT_CREDIT: 'via test' }), history });
    services.catalog.addTrack(track('abc123def45', 'Song'));

    const text = await run(services, '/dl -t https://youtu.be/abc123def45');

    expect(text).toBe('✅ <b>Song</b> · Band');
    expect(services.chat.sent[1]?.content).toEqual({
      kind: 'audio',
      path: '/tmp/work/Song [abc123def45].m4a',
      title: 'Song',
      performer: 'Band',
      durationSeconds: 200,
      thumbnailPath: '/tmp/work/cover.jpg',
      caption: 'via test',
    });
    expect(services.registry.tracked(CONVERSATION)).toEqual([100, 101]);
    expect(services.downloads.released).toEqual(['abc123def45']);
    expect(await history.recent()).toMatchObject([{
      title: 'Song',
      artist: 'Band',
      album: 'Record',
      sourceId: 'abc123def45',
      sourceUrl: 'https://music.youtube.com/watch?v=abc123def45',
      durationSeconds: 200,
    }]);
  });

  it('neither sends nor records a track that finishes after the timeout', async () => {
    const history = new HistoryStore({ filePath: join(dir, 'history.jsonl'), limit: 10, enabled: true });
    const services = testServices({ config: testConfig({ OPERATION_TIMEOUT_MS: '30' }), history });
    services.catalog.addTrack(track('abc123def45', 'Song'));
    services.downloads.delayMs = 80;

    expect(await run(services, '/dl -t abc123def45'))
      .toBe('❌ <b>Cancelled</b>\nOperation cancelled: timed out after 30ms');
    await vi.waitFor(() => {
      expect(services.downloads.released).toEqual(['abc123def45']);
    });

    expect(services.chat.sent.map((message) => message.content.kind)).toEqual(['text']);
    expect(await history.recent()).toEqual([]);
  });

  it('downloads the first search match', async () => {
    const services = testServices();
    services.catalog.addTrack(track('abc123def45', 'Song'));
    services.catalog.searchResults = [{
      kind: 'track',
      id: 'abc123def45',
      title: 'Song',
      artists: 'Band',
      album: 'Record',
      year: null,
      durationSeconds: 200,
      url: 'https://music.youtube.com/watch?v=abc123def45',
      thumbnails: [],
    }];

    await run(services, '/dl -s night drive');

    expect(services.catalog.searches).toEqual([['night drive', 'tracks', 1]]);
    expect(services.downloads.downloaded).toEqual(['abc123def45']);
  });

  it('reports an empty search', async () => {
    expect(await run(testServices(), '/dl -s nothing')).toBe('No tracks found for <i>nothing</i>.');
  });

  it('keeps going through an album when a track fails', async () => {
    const services = testServices();
    services.catalog.entities.set('OLAK5uy_abc', album('OLAK5uy_abc', ['One', 'Two', 'Three']));
    services.downloads.failing.add('bbbbbbbbbbb');

    await run(services, '/dl -a OLAK5uy_abc');

    expect(services.catalog.entityLookups).toEqual([['OLAK5uy_abc', 'album']]);
    expect(services.chat.edits.map((edit) => edit.text)).toEqual([
      '⬇️ <b>Record · Band</b>\nTrack 1/3: One',
      '⬇️ <b>Record · Band</b>\nTrack 2/3: Two',
      '⬇️ <b>Record · Band</b>\nTrack 3/3: Three\nFailed so far: 1',
      '⚠️ <b>Record · Band</b>: 2/3 tracks sent\n• 2. Two: Two is unavailable',
    ]);
    expect(services.chat.sent.map((message) => message.content.kind)).toEqual(['text', 'audio', 'audio']);
    expect(services.downloads.released).toEqual(['aaaaaaaaaaa', 'ccccccccccc']);
  });

  it('caps the number of album tracks', async () => {
    const services = testServices({ config: testConfig({ ALBUM_TRACK_LIMIT: '2' }) });
    services.catalog.entities.set('OLAK5uy_abc', album('OLAK5uy_abc', ['One', 'Two', 'Three']));

    expect(await run(services, '/dl -a OLAK5uy_abc'))
      .toBe('✅ <b>Record · Band</b>: 2/2 tracks sent\nOnly the first 2 of 3 tracks were downloaded.');
  });

  it('infers a playlist from its link', async () => {
    const services = testServices();
    services.catalog.entities.set('PLmix', {
      kind: 'playlist',
      id: 'PLmix',
      title: 'Mix',
      author: 'Someone',
      url: 'https://music.youtube.com/playlist?list=PLmix',
      thumbnails: [],
      tracks: [track('aaaaaaaaaaa', 'One')],
    });

    expect(await run(services, '/dl https://music.youtube.com/playlist?list=PLmix')).toBe('✅ <b>Mix</b>: 1/1 tracks sent');
    expect(services.catalog.entityLookups).toEqual([['PLmix', undefined]]);
  });

  it('refuses a track id under -a', async () => {
    expect(await run(testServices(), '/dl -a abc123def45'))
      .toBe('❌ <b>Failed</b>\nValidation failed for link: expected an album or playlist link');
  });

  it('refuses to download an artist', async () => {
    const services = testServices();
    services.catalog.entities.set('UCband', {
      kind: 'artist',
      id: 'UCband',
      name: 'Band',
      description: null,
      url: 'https://music.youtube.com/channel/UCband',
      thumbnails: [],
      topTracks: [],
    });

    expect(await run(services, '/dl UCband'))
      .toBe('❌ <b>Failed</b>\nValidation failed for link: artists cannot be downloaded, pick one of their albums');
  });
});
