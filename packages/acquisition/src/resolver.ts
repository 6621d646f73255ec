/**
 * Output Resolver
 *
 * Finds the single finished audio file a download produced. Postprocessors
 * rename and re-extension files after the first write, so the path the
 * output template would expand to is never trusted:
 *
 * 1. Re-derive the path from the downloader's recorded path and the
 *    extension its postprocessors reported; accept it if it is a non-empty
 *    audio file.
 * 2. Otherwise scan the work directory for non-empty audio files written
 *    during this run whose name carries the source id. Exactly one must match.
 */

import { basename } from 'node:path';
import { AmbiguousOutputError, DownloadIncompleteError } from '@tunegrab/core';
import { getExtension, listFiles, replaceExtension, safeStat, type Logger } from '@tunegrab/utils';
import type { DownloaderReport } from './types.js';

export const AUDIO_EXTENSIONS: ReadonlySet<string> = new Set([
  'm4a', 'mp3', 'opus', 'ogg', 'oga', 'flac', 'aac', 'wav',
]);

const PARTIAL_MARKERS = ['.part', '.ytdl', '.temp', '.tmp'];

/** Filesystems with coarse timestamps can report an mtime slightly before the run began */
const MTIME_SLACK_MS = 2000;

export interface ResolveRequest {
  workDir: string;
  sourceId: string;
  report: DownloaderReport;
  /** Epoch ms when the download started */
  windowStart: number;
  logger?: Logger;
}

export interface ResolvedOutput {
  path: string;
  size: number;
  method: 'reported' | 'scan';
}

export function isAudioFile(filePath: string): boolean {
  return AUDIO_EXTENSIONS.has(getExtension(filePath));
}

function isPartial(filePath: string): boolean {
  const name = basename(filePath).toLowerCase();
  return PARTIAL_MARKERS.some((marker) => name.endsWith(marker) || name.includes(`${marker}-`));
}

async function confirmReported(report: DownloaderReport): Promise<ResolvedOutput | null> {
  if (!report.filepath || !report.reportedFinalExtension) {
    return null;
  }

  const candidate = replaceExtension(report.filepath, report.reportedFinalExtension);
  if (!isAudioFile(candidate)) {
    return null;
  }

  const stats = await safeStat(candidate);
  if (!stats?.isFile() || stats.size === 0) {
    return null;
  }
  return { path: candidate, size: stats.size, method: 'reported' };
}

export async function resolveOutput(request: ResolveRequest): Promise<ResolvedOutput> {
  const { workDir, sourceId, report, windowStart, logger } = request;

  const reported = await confirmReported(report);
  if (reported) {
    logger?.debug({ path: reported.path, size: reported.size }, 'Output confirmed from downloader report');
    return reported;
  }

  logger?.info({
    filepath: report.filepath,
    reportedFinalExtension: report.reportedFinalExtension,
  }, 'Reported output not confirmed, scanning work directory');

  const candidates = (await listFiles(workDir))
    .filter(({ path, stats }) =>
      basename(path).includes(sourceId) &&
      isAudioFile(path) &&
      !isPartial(path) &&
      stats.size > 0 &&
      stats.mtimeMs >= windowStart - MTIME_SLACK_MS
    )
    .sort((a, b) => a.path.localeCompare(b.path));

  if (candidates.length > 1) {
    const paths = candidates.map((candidate) => candidate.path);
    logger?.warn({ sourceId, candidates: paths }, 'Ambiguous download output');
    throw new AmbiguousOutputError(sourceId, paths);
  }

  const [match] = candidates;
  if (!match) {
    throw new DownloadIncompleteError(sourceId, 'no finished audio file carries the source id');
  }

  logger?.debug({ path: match.path, size: match.stats.size }, 'Output found by directory scan');
  return { path: match.path, size: match.stats.size, method: 'scan' };
}
