import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CoverArtPreparer, fetchThumbnail, pickThumbnail } from './thumbnails.js';

function imageResponse(contentType: string, status = 200): Response {
  return new Response(new Uint8Array([1, 2, 3]), { status, headers: { 'content-type': contentType } });
}

describe('pickThumbnail', () => {
  it('takes the largest image', () => {
    expect(pickThumbnail([
      { url: 'https://img.example/s.jpg', width: 60, height: 60 },
      { url: 'https://img.example/l', width: 544, height: 544 },
      { url: 'https://img.example/m.jpg', width: 226, height: 226 },
    ])).toEqual({ url: 'https://img.example/l', width: 544, height: 544 });
  });

  it('prefers jpg or webp between equal sizes', () => {
    expect(pickThumbnail([
      { url: 'https://img.example/a.png', width: 100, height: 100 },
      { url: 'https://img.example/b.webp', width: 100, height: 100 },
    ])?.url).toBe('https://img.example/b.webp');
  });

  it('skips non-http urls', () => {
    expect(pickThumbnail([{ url: 'data:image/png;base64,AAAA', width: 999, height: 999 }])).toBeNull();
    expect(pickThumbnail([])).toBeNull();
  });
});

describe('fetchThumbnail', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'thumb-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('names the file after the content type', async () => {
    const fetchStub = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => imageResponse('image/webp'));

    const path = await fetchThumbnail('https://img.example/a.jpg', dir, fetchStub);

    expect(path).toBe(join(dir, 'thumbnail.webp'));
    expect([...await readFile(path)]).toEqual([1, 2, 3]);
  });

  it('falls back to the url extension', async () => {
    const fetchStub = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => imageResponse('application/octet-stream'));

    await expect(fetchThumbnail('https://img.example/a.png', dir, fetchStub)).resolves.toBe(join(dir, 'thumbnail.png'));
  });

  it('rejects on an error status', async () => {
    const fetchStub = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => imageResponse('text/html', 404));

    await expect(fetchThumbnail('https://img.example/a.jpg', dir, fetchStub)).rejects.toThrow('Thumbnail request failed with HTTP 404');
  });

  it('crops the fetched image into cover.jpg', async () => {
    const fetchStub = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => imageResponse('image/jpeg'));
    const cropToSquare = vi.fn(async (_input: string, output: string) => output);
    const preparer = new CoverArtPreparer({ cropper: { cropToSquare }, fetch: fetchStub });

    const cover = await preparer.prepare([{ url: 'https://img.example/a', width: 10, height: 10 }], dir);

    expect(cover).toBe(join(dir, 'cover.jpg'));
    expect(cropToSquare).toHaveBeenCalledWith(join(dir, 'thumbnail.jpg'), join(dir, 'cover.jpg'));
  });

  it('returns null without fetching when there is nothing to pick', async () => {
    const fetchStub = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => imageResponse('image/jpeg'));
    const preparer = new CoverArtPreparer({ cropper: { cropToSquare: async (_i: string, o: string) => o }, fetch: fetchStub });

    await expect(preparer.prepare([], dir)).resolves.toBeNull();
    expect(fetchStub).not.toHaveBeenCalled();
  });
});
