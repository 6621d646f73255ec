/**
 * Acquisition Types
 *
 * Narrow interfaces the download pipeline drives. The real implementations
 * wrap yt-dlp and ffmpeg; tests substitute in-process fakes.
 */

import type { Thumbnail } from '@tunegrab/core';
import type { ProbedTags, TagResult, TrackTags } from '@tunegrab/processing';

export interface DownloaderRunOptions {
  /** Per-operation directory the downloader writes into */
  workDir: string;
  /** Target codec for audio extraction, e.g. m4a or opus */
  audioFormat: string;
  cookiesFile?: string | null;
}

/** Fields of the downloader's own metadata the pipeline falls back on */
export interface DownloaderInfo {
  id: string;
  title: string | null;
  artist: string | null;
  album: string | null;
  year: string | null;
  durationSeconds: number | null;
  webpageUrl: string | null;
  thumbnails: Thumbnail[];
}

export interface DownloaderReport {
  chosenFormat: string | null;
  /** Postprocessor lines, e.g. `[ExtractAudio] Destination: ...` */
  postprocessorLog: string[];
  /** Extension the postprocessors say they produced, lowercase, no dot */
  reportedFinalExtension: string | null;
  /** Path the downloader recorded for the finished file */
  filepath: string | null;
  info: DownloaderInfo | null;
}

export interface MediaDownloader {
  run(url: string, outputTemplate: string, options: DownloaderRunOptions): Promise<DownloaderReport>;
}

export interface CoverArtStage {
  /** Fetch and square-crop the best thumbnail into `workDir`; null when there is none */
  prepare(thumbnails: Thumbnail[], workDir: string): Promise<string | null>;
}

export interface TagStage {
  inject(filePath: string, tags: TrackTags): Promise<TagResult>;
  read(filePath: string): Promise<ProbedTags>;
}
