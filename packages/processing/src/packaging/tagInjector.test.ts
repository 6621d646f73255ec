import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { CommandResult } from '@tunegrab/utils';
import { TagInjector, buildTagArgs, supportsEmbeddedCover } from './tagInjector.js';

const okResult: CommandResult = { exitCode: 0, stdout: '', stderr: '', duration: 1, timedOut: false };

describe('buildTagArgs', () => {
  it('embeds the cover into m4a without re-encoding it', () => {
    const command = buildTagArgs('/w/a.m4a', '/w/a.tagging.m4a', {
      title: 'Song',
      artist: 'Band',
      album: 'Record',
      year: '2020',
      coverPath: '/w/cover.jpg',
    });

    expect(command.args).toEqual([
      '-y', '-i', '/w/a.m4a', '-i', '/w/cover.jpg',
      '-map', '0:a', '-c:a', 'copy',
      '-map', '1:v', '-c:v', 'copy', '-disposition:v:0', 'attached_pic',
      '-metadata:s:v', 'title=Album cover', '-metadata:s:v', 'comment=Cover (front)',
      '-metadata', 'title=Song',
      '-metadata', 'artist=Band',
      '-metadata', 'album_artist=Band',
      '-metadata', 'album=Record',
      '-metadata', 'date=2020',
      '/w/a.tagging.m4a',
    ]);
    expect(command.tagsWritten).toBe(5);
    expect(command.coverEmbedded).toBe(true);
  });

  it('writes tags only for opus', () => {
    const command = buildTagArgs('/w/a.opus', '/w/out.opus', { title: 'Song', artist: 'Band', coverPath: '/w/cover.jpg' });

    expect(command.coverEmbedded).toBe(false);
    expect(command.args).not.toContain('/w/cover.jpg');
    expect(command.args.slice(-1)).toEqual(['/w/out.opus']);
  });

  it('re-encodes the cover and pins ID3v2.3 for mp3', () => {
    const command = buildTagArgs('/w/a.mp3', '/w/out.mp3', { title: 'S', artist: 'B', coverPath: '/w/c.jpg' });

    expect(command.args).toContain('mjpeg');
    expect(command.args.slice(-3)).toEqual(['-id3v2_version', '3', '/w/out.mp3']);
  });

  it('knows which containers carry covers', () => {
    expect(supportsEmbeddedCover('x.FLAC')).toBe(true);
    expect(supportsEmbeddedCover('x.webm')).toBe(false);
  });
});

describe('TagInjector', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tags-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('replaces the file with the tagged copy', async () => {
    const filePath = join(dir, 'track.m4a');
    await writeFile(filePath, 'original');
    const injector = new TagInjector({
      runner: async (args) => {
        await writeFile(args[args.length - 1] ?? '', 'tagged');
        return okResult;
      },
    });

    const result = await injector.inject(filePath, { title: 'Song', artist: 'Band' });

    expect(result).toEqual({ tagsWritten: 3, coverEmbedded: false });
    expect(await readFile(filePath, 'utf8')).toBe('tagged');
    expect(await readdir(dir)).toEqual(['track.m4a']);
  });

  it('leaves the original and no temp file when ffmpeg fails', async () => {
    const filePath = join(dir, 'track.mp3');
    await writeFile(filePath, 'original');
    const injector = new TagInjector({
      runner: async (args) => {
        await writeFile(args[args.length - 1] ?? '', 'partial');
        throw new Error('ffmpeg failed with exit code 1');
      },
    });

    await expect(injector.inject(filePath, { title: 'S', artist: 'B' })).rejects.toThrow('exit code 1');
    expect(await readFile(filePath, 'utf8')).toBe('original');
    expect(await readdir(dir)).toEqual(['track.mp3']);
  });
});
