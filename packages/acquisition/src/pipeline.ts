/**
 * Download Pipeline
 *
 * Turns one MediaItem into one confirmed, tagged audio file:
 *
 * REQUESTED → FETCHING → POSTPROCESSING → RESOLVING_OUTPUT → TAGGING → COMPLETE
 *
 * Every download gets its own work directory. On failure the whole
 * directory is removed before the error propagates; on success everything
 * except the audio file and the cover is removed, and the caller releases
 * the rest once the file has been delivered.
 */

import { basename, join } from 'node:path';
import {
  DownloadStateMachine,
  OperationCancelledError,
  describeError,
  toOperationFailure,
  type DownloadResult,
  type DownloadStateTransition,
  type MediaItem,
  type MetadataWarning,
  type Operation,
  type OperationFailure,
  type TagField,
} from '@tunegrab/core';
import {
  createLogger,
  getExtension,
  listFiles,
  makeTempDir,
  moveFile,
  removePaths,
  sanitizeFilename,
  type Logger,
} from '@tunegrab/utils';
import type { ProbedTags, TrackTags } from '@tunegrab/processing';
import { resolveOutput } from './resolver.js';
import { DEFAULT_OUTPUT_TEMPLATE } from './ytdlp.js';
import type { CoverArtStage, DownloaderReport, MediaDownloader, TagStage } from './types.js';

export interface DownloadPipelineConfig {
  downloader: MediaDownloader;
  cover: CoverArtStage;
  tags: TagStage;
  /** Parent of the per-download work directories */
  tempRoot: string;
  /** Where files with a preserved extension are kept after delivery */
  libraryDir: string;
  audioFormat: string;
  /** Extensions kept in the library instead of being deleted on release */
  preserveExtensions?: readonly string[];
  cookiesFile?: string | null;
  outputTemplate?: string;
  logger?: Logger;
  now?: () => number;
}

export interface DownloadContext {
  operation?: Operation;
  onTransition?: (transition: DownloadStateTransition) => void;
}

export interface CollectionHooks {
  onTrackStart?(index: number, item: MediaItem): Promise<void> | void;
  /** Send the finished file; the pipeline releases it afterwards */
  deliver(result: DownloadResult, index: number): Promise<void>;
  onTrackFailed?(index: number, item: MediaItem, failure: OperationFailure): Promise<void> | void;
}

export interface CollectionSummary {
  total: number;
  delivered: number;
  failures: Array<{ index: number; item: MediaItem; failure: OperationFailure }>;
}

export class DownloadPipeline {
  private readonly config: DownloadPipelineConfig;
  private readonly preserve: ReadonlySet<string>;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(config: DownloadPipelineConfig) {
    this.config = config;
    this.preserve = new Set((config.preserveExtensions ?? []).map((ext) => ext.toLowerCase().replace(/^\./, '')));
    this.logger = config.logger ?? createLogger({ component: 'download-pipeline' });
    this.now = config.now ?? Date.now;
  }

  async download(item: MediaItem, context: DownloadContext = {}): Promise<DownloadResult> {
    const { operation } = context;
    const log = (operation?.logger ?? this.logger).child({ sourceId: item.sourceId });
    const machine = new DownloadStateMachine(item.sourceId, (transition) => {
      log.debug({ from: transition.from, to: transition.to, reason: transition.reason }, 'Download state changed');
      context.onTransition?.(transition);
    });

    const workDir = await makeTempDir(this.config.tempRoot, `${sanitizeFilename(item.sourceId) || 'item'}-`);

    try {
      const windowStart = this.now();
      machine.transitionTo('FETCHING');
      const report = await this.config.downloader.run(
        item.url,
        this.config.outputTemplate ?? DEFAULT_OUTPUT_TEMPLATE,
        { workDir, audioFormat: this.config.audioFormat, cookiesFile: this.config.cookiesFile }
      );
      operation?.throwIfCancelled();

      machine.transitionTo('POSTPROCESSING', report.chosenFormat ? `format ${report.chosenFormat}` : undefined);
      for (const line of report.postprocessorLog) {
        log.trace({ line }, 'Postprocessor');
      }

      machine.transitionTo('RESOLVING_OUTPUT', report.reportedFinalExtension ?? undefined);
      const output = await resolveOutput({ workDir, sourceId: item.sourceId, report, windowStart, logger: log });
      operation?.throwIfCancelled();

      machine.transitionTo('TAGGING', basename(output.path));
      const merged = mergeMetadata(item, report);
      const coverPath = await this.prepareCover(item, report, workDir, log);
      const probed = await this.applyTags(output.path, { ...merged, comment: item.url, coverPath }, log);
      const warnings = checkTags(merged, probed);
      operation?.throwIfCancelled();

      await this.sweep(workDir, [output.path, coverPath], log);
      machine.transitionTo('COMPLETE');

      for (const warning of warnings) {
        log.warn({ missing: warning.missing, required: warning.required }, 'Metadata incomplete');
      }
      log.info({ path: output.path, size: output.size, method: output.method }, 'Download complete');

      return {
        path: output.path,
        title: merged.title,
        artist: merged.artist,
        album: merged.album ?? null,
        durationSeconds: item.durationSeconds ?? probed?.durationSeconds ?? report.info?.durationSeconds ?? null,
        sourceUrl: item.url,
        sourceId: item.sourceId,
        fileSize: output.size,
        coverPath,
        warnings,
        release: this.releaser(output.path, workDir, log),
      };
    } catch (error) {
      const failure = toOperationFailure(error);
      machine.fail(failure.detail, failure.kind);
      const leftovers = await removePaths([workDir]);
      if (leftovers.length > 0) {
        log.warn({ leftovers: leftovers.map((entry) => entry.path) }, 'Cleanup after failed download left files behind');
      } else {
        log.debug({ workDir }, 'Cleaned up failed download');
      }
      throw error;
    }
  }

  /**
   * Download items one at a time, delivering each as it completes. A failed
   * track is reported through the hooks and the loop moves on; only
   * cancellation stops it.
   */
  async downloadAll(items: readonly MediaItem[], hooks: CollectionHooks, operation?: Operation): Promise<CollectionSummary> {
    const summary: CollectionSummary = { total: items.length, delivered: 0, failures: [] };

    for (const [index, item] of items.entries()) {
      operation?.throwIfCancelled();
      await hooks.onTrackStart?.(index, item);

      try {
        const result = await this.download(item, { operation });
        try {
          await hooks.deliver(result, index);
          summary.delivered++;
        } finally {
          await result.release();
        }
      } catch (error) {
        if (error instanceof OperationCancelledError) {
          throw error;
        }
        const failure = toOperationFailure(error);
        summary.failures.push({ index, item, failure });
        await hooks.onTrackFailed?.(index, item, failure);
      }
    }

    return summary;
  }

  private async prepareCover(
    item: MediaItem,
    report: DownloaderReport,
    workDir: string,
    log: Logger
  ): Promise<string | null> {
    const thumbnails = item.thumbnails.length > 0 ? item.thumbnails : report.info?.thumbnails ?? [];
    try {
      return await this.config.cover.prepare(thumbnails, workDir);
    } catch (error) {
      log.warn({ err: error }, 'Cover art unavailable, continuing without it');
      return null;
    }
  }

  private async applyTags(filePath: string, tags: TrackTags, log: Logger): Promise<ProbedTags | null> {
    try {
      const result = await this.config.tags.inject(filePath, tags);
      log.debug({ tagsWritten: result.tagsWritten, coverEmbedded: result.coverEmbedded }, 'Tags written');
    } catch (error) {
      log.warn({ err: error }, 'Tagging failed, checking what the file already carries');
    }

    try {
      return await this.config.tags.read(filePath);
    } catch (error) {
      log.warn({ err: error }, 'Could not read tags back');
      return null;
    }
  }

  /** Remove everything in the work directory except `keep` */
  private async sweep(workDir: string, keep: Array<string | null>, log: Logger): Promise<void> {
    const kept = new Set(keep.filter((path): path is string => path !== null));
    const stale = (await listFiles(workDir)).map((file) => file.path).filter((path) => !kept.has(path));
    const failures = await removePaths(stale);
    if (failures.length > 0) {
      log.warn({ failures: failures.map((entry) => ({ path: entry.path, error: describeError(entry.error) })) }, 'Could not remove intermediate files');
    } else if (stale.length > 0) {
      log.debug({ removed: stale.map((path) => basename(path)) }, 'Removed intermediate files');
    }
  }

  private releaser(filePath: string, workDir: string, log: Logger): () => Promise<void> {
    let released: Promise<void> | null = null;
    const release = async (): Promise<void> => {
      if (this.preserve.has(getExtension(filePath))) {
        const destination = join(this.config.libraryDir, basename(filePath));
        try {
          await moveFile(filePath, destination);
          log.info({ destination }, 'Preserved delivered file in library');
        } catch (error) {
          // already delivered, so release never fails on the library copy
          log.warn({ err: error, destination }, 'Could not preserve delivered file, discarding it');
        }
      }
      const failures = await removePaths([workDir]);
      if (failures.length > 0) {
        log.warn({ workDir }, 'Could not remove work directory after delivery');
      }
    };
    return () => {
      released ??= release();
      return released;
    };
  }
}

export interface MergedMetadata {
  title: string;
  artist: string;
  album: string | null;
  year: string | null;
}

function mergeMetadata(item: MediaItem, report: DownloaderReport): MergedMetadata {
  return {
    title: item.title || report.info?.title || item.sourceId,
    artist: item.artist || report.info?.artist || 'Unknown',
    album: item.album ?? report.info?.album ?? null,
    year: item.year ?? report.info?.year ?? null,
  };
}

/**
 * Compare what was meant to be written with what the file carries. Album
 * and year are only expected when there was a value for them.
 */
export function checkTags(expected: MergedMetadata, probed: ProbedTags | null): MetadataWarning[] {
  const wanted: TagField[] = ['title', 'artist'];
  if (expected.album) wanted.push('album');
  if (expected.year) wanted.push('year');

  const missing = wanted.filter((field) => !probed?.[field]);
  if (missing.length === 0) {
    return [];
  }
  return [{
    kind: 'metadata-incomplete',
    missing,
    required: missing.includes('title') || missing.includes('artist'),
  }];
}
