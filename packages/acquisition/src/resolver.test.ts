import { mkdtemp, rm, utimes, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AmbiguousOutputError, DownloadIncompleteError } from '@tunegrab/core';
import { resolveOutput } from './resolver.js';
import type { DownloaderReport } from './types.js';

const SOURCE_ID = 'abc123def45';

function report(overrides: Partial<DownloaderReport> = {}): DownloaderReport {
  return {
    chosenFormat: null,
    postprocessorLog: [],
    reportedFinalExtension: null,
    filepath: null,
    info: null,
    ...overrides,
  };
}

describe('resolveOutput', () => {
  let workDir: string;
  let windowStart: number;

  const put = async (name: string, content = 'audio'): Promise<string> => {
    const path = join(workDir, name);
    await writeFile(path, content);
    return path;
  };

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'resolve-'));
    windowStart = Date.now();
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('follows the reported extension rather than the recorded container', async () => {
    const webm = await put(`Song [${SOURCE_ID}].webm`, 'container');
    const m4a = await put(`Song [${SOURCE_ID}].m4a`, 'audio!');

    const resolved = await resolveOutput({
      workDir,
      sourceId: SOURCE_ID,
      report: report({ filepath: webm, reportedFinalExtension: 'm4a' }),
      windowStart,
    });

    expect(resolved).toEqual({ path: m4a, size: 6, method: 'reported' });
  });

  it('scans when the reported file does not exist', async () => {
    const m4a = await put(`Song [${SOURCE_ID}].m4a`);

    const resolved = await resolveOutput({
      workDir,
      sourceId: SOURCE_ID,
      report: report({ filepath: join(workDir, `Song [${SOURCE_ID}].webm`), reportedFinalExtension: 'opus' }),
      windowStart,
    });

    expect(resolved).toEqual({ path: m4a, size: 5, method: 'scan' });
  });

  it('scans when the reported file is empty', async () => {
    await put(`Song [${SOURCE_ID}].mp3`, '');

    await expect(resolveOutput({
      workDir,
      sourceId: SOURCE_ID,
      report: report({ filepath: join(workDir, `Song [${SOURCE_ID}].webm`), reportedFinalExtension: 'mp3' }),
      windowStart,
    })).rejects.toBeInstanceOf(DownloadIncompleteError);
  });

  it('refuses to choose between two matching files', async () => {
    const first = await put(`A [${SOURCE_ID}].m4a`);
    const second = await put(`B [${SOURCE_ID}].opus`);

    const error = await resolveOutput({ workDir, sourceId: SOURCE_ID, report: report(), windowStart })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AmbiguousOutputError);
    expect(error).toMatchObject({ kind: 'ambiguous-output', candidates: [first, second] });
  });

  it('ignores partial, foreign, stale and non-audio files', async () => {
    await put(`Song [${SOURCE_ID}].m4a.part`);
    await put(`Song [${SOURCE_ID}].part-Frag3.m4a`);
    await put('Other [zzzzzzzzzzz].m4a');
    await put(`Song [${SOURCE_ID}].webm`);
    await put('cover.jpg');
    const stale = await put(`Old [${SOURCE_ID}].mp3`);
    const past = windowStart / 1000 - 3600;
    await utimes(stale, past, past);

    await expect(resolveOutput({ workDir, sourceId: SOURCE_ID, report: report(), windowStart }))
      .rejects.toMatchObject({ kind: 'download-incomplete' });
  });
});
