/**
 * Downloader Report
 *
 * yt-dlp writes its final info dict (after postprocessors moved the file)
 * as one JSON line, and logs each postprocessor step as a `[Name] ...` line.
 * Both are folded into a DownloaderReport.
 */

import { z } from 'zod';
import { getExtension } from '@tunegrab/utils';
import type { Thumbnail } from '@tunegrab/core';
import type { DownloaderInfo, DownloaderReport } from './types.js';

const POSTPROCESSOR_TAGS = new Set([
  'ExtractAudio',
  'Metadata',
  'EmbedThumbnail',
  'ThumbnailsConvertor',
  'MoveFiles',
  'Merger',
  'VideoConvertor',
  'ModifyChapters',
  'SponsorBlock',
]);

const requestedDownloadSchema = z.object({
  filepath: z.string().optional(),
  ext: z.string().optional(),
  format_id: z.string().optional(),
}).passthrough();

const infoSchema = z.object({
  id: z.string(),
  title: z.string().nullish(),
  ext: z.string().nullish(),
  filepath: z.string().nullish(),
  _filename: z.string().nullish(),
  format_id: z.string().nullish(),
  artist: z.string().nullish(),
  creator: z.string().nullish(),
  uploader: z.string().nullish(),
  channel: z.string().nullish(),
  album: z.string().nullish(),
  release_year: z.number().nullish(),
  upload_date: z.string().nullish(),
  duration: z.number().nullish(),
  webpage_url: z.string().nullish(),
  thumbnails: z.array(z.object({
    url: z.string(),
    width: z.number().nullish(),
    height: z.number().nullish(),
  }).passthrough()).nullish(),
  requested_downloads: z.array(requestedDownloadSchema).nullish(),
}).passthrough();

type RawInfo = z.infer<typeof infoSchema>;

function parseJson(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}

function lastInfoLine(output: string): RawInfo | null {
  const lines = output.split(/\r?\n/).map((line) => line.trim()).filter((line) => line.startsWith('{'));
  for (let i = lines.length - 1; i >= 0; i--) {
    const parsed = infoSchema.safeParse(parseJson(lines[i] ?? ''));
    if (parsed.success) {
      return parsed.data;
    }
  }
  return null;
}

function isPostprocessorLine(line: string): boolean {
  const tag = /^\[([A-Za-z]+)\]/.exec(line)?.[1];
  return tag !== undefined && (POSTPROCESSOR_TAGS.has(tag) || tag.startsWith('Fixup'));
}

function toInfo(raw: RawInfo): DownloaderInfo {
  const thumbnails: Thumbnail[] = (raw.thumbnails ?? []).map((thumb) => ({
    url: thumb.url,
    width: thumb.width ?? undefined,
    height: thumb.height ?? undefined,
  }));
  const year = raw.release_year
    ? String(raw.release_year)
    : raw.upload_date?.slice(0, 4) ?? null;

  return {
    id: raw.id,
    title: raw.title ?? null,
    artist: raw.artist ?? raw.creator ?? raw.channel ?? raw.uploader ?? null,
    album: raw.album ?? null,
    year,
    durationSeconds: typeof raw.duration === 'number' ? Math.round(raw.duration) : null,
    webpageUrl: raw.webpage_url ?? null,
    thumbnails,
  };
}

/**
 * Build a report from the downloader's info output and its log.
 * Missing pieces come back as null rather than failing; the resolver
 * decides what is good enough.
 */
export function parseDownloaderReport(infoOutput: string, log = ''): DownloaderReport {
  const raw = lastInfoLine(infoOutput);
  const postprocessorLog = log.split(/\r?\n/).map((line) => line.trim()).filter(isPostprocessorLine);

  const finalDownload = raw?.requested_downloads?.at(-1);
  const filepath = finalDownload?.filepath ?? raw?.filepath ?? raw?._filename ?? null;

  let extension = finalDownload?.ext ?? raw?.ext ?? null;
  if (!extension) {
    // Without an info dict the ExtractAudio destination is the best evidence
    const destination = postprocessorLog
      .filter((line) => line.startsWith('[ExtractAudio]'))
      .map((line) => /Destination:\s*(.+)$/.exec(line)?.[1])
      .filter((path): path is string => path !== undefined)
      .at(-1);
    extension = destination ? getExtension(destination) : null;
  }

  return {
    chosenFormat: finalDownload?.format_id ?? raw?.format_id ?? null,
    postprocessorLog,
    reportedFinalExtension: extension ? extension.toLowerCase().replace(/^\./, '') : null,
    filepath,
    info: raw ? toInfo(raw) : null,
  };
}
