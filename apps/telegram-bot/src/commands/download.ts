/**
 * /dl: single tracks, search-then-download, albums and playlists
 */

import { ValidationError, type DownloadResult, type DownloadState, type MediaItem } from '@tunegrab/core';
import { extractEntityId, inferEntityKind, isVideoId, type CatalogEntity } from '@tunegrab/catalog';
import type { CommandContext, CommandDefinition } from '../dispatcher.js';
import {
  formatCollectionProgress,
  formatCollectionSummary,
  formatDelivered,
  formatUsage,
} from '../format.js';
import { escapeHtml, takeFlag } from '../text.js';
import { requireEntityId } from './lookup.js';

const DL_FLAGS = ['-t', '-s', '-a'] as const;

const STATE_LABELS: Partial<Record<DownloadState, string>> = {
  FETCHING: 'Downloading',
  POSTPROCESSING: 'Converting',
  RESOLVING_OUTPUT: 'Locating file',
  TAGGING: 'Tagging',
};

function reportProgress(ctx: CommandContext, text: string): void {
  ctx.progress(text).catch((error: unknown) => {
    ctx.operation.logger.debug({ err: error }, 'Progress update failed');
  });
}

/**
 * Send a finished file and remember it in the history. A download that
 * finishes after its operation timed out is neither sent nor recorded.
 */
export async function deliverTrack(ctx: CommandContext, result: DownloadResult): Promise<void> {
  const { config, history } = ctx.services;
  ctx.operation.throwIfCancelled();
  await ctx.sendAudio({
    kind: 'audio',
    path: result.path,
    title: result.title,
    performer: result.artist,
    ...(result.durationSeconds !== null ? { durationSeconds: result.durationSeconds } : {}),
    ...(result.coverPath ? { thumbnailPath: result.coverPath } : {}),
    ...(config.credit ? { caption: escapeHtml(config.credit) } : {}),
  });

  ctx.operation.throwIfCancelled();
  try {
    await history.append({
      title: result.title,
      artist: result.artist,
      album: result.album,
      sourceUrl: result.sourceUrl,
      sourceId: result.sourceId,
      durationSeconds: result.durationSeconds,
      downloadedAt: new Date(),
    });
  } catch (error) {
    ctx.operation.logger.warn({ err: error, sourceId: result.sourceId }, 'Could not record download in history');
  }
}

async function downloadTrack(ctx: CommandContext, item: MediaItem): Promise<string> {
  const heading = `<b>${escapeHtml(item.title)}</b> · ${escapeHtml(item.artist)}`;
  const result = await ctx.services.downloads.download(item, {
    operation: ctx.operation,
    onTransition: (transition) => {
      const label = STATE_LABELS[transition.to];
      if (label) {
        reportProgress(ctx, `⬇️ ${label}…\n${heading}`);
      }
    },
  });

  try {
    await deliverTrack(ctx, result);
  } finally {
    await result.release();
  }
  return formatDelivered(result);
}

async function downloadCollection(ctx: CommandContext, title: string, tracks: readonly MediaItem[]): Promise<string> {
  const limit = ctx.services.config.limits.albumTracks;
  const items = tracks.slice(0, limit);
  if (items.length === 0) {
    return `<b>${escapeHtml(title)}</b> has no downloadable tracks.`;
  }

  let failed = 0;
  const summary = await ctx.services.downloads.downloadAll(
    items,
    {
      onTrackStart: async (index, item) => {
        await ctx.progress(formatCollectionProgress(title, index, items.length, item.title, failed));
      },
      deliver: (result) => deliverTrack(ctx, result),
      onTrackFailed: (index, item, failure) => {
        failed++;
        ctx.operation.logger.warn({ index, sourceId: item.sourceId, kind: failure.kind }, 'Track failed, continuing');
      },
    },
    ctx.operation,
  );

  const text = formatCollectionSummary({
    title,
    total: summary.total,
    delivered: summary.delivered,
    failures: summary.failures.map((entry) => ({ index: entry.index, title: entry.item.title, failure: entry.failure })),
  });
  return tracks.length > items.length
    ? `${text}\nOnly the first ${items.length} of ${tracks.length} tracks were downloaded.`
    : text;
}

async function downloadEntity(ctx: CommandContext, entity: CatalogEntity): Promise<string> {
  switch (entity.kind) {
    case 'track':
      return downloadTrack(ctx, entity);
    case 'album':
      return downloadCollection(ctx, `${entity.title} · ${entity.artist}`, entity.tracks);
    case 'playlist':
      return downloadCollection(ctx, entity.title, entity.tracks);
    case 'artist':
      throw new ValidationError('link', 'artists cannot be downloaded, pick one of their albums');
  }
}

async function downloadFirstMatch(ctx: CommandContext, query: string): Promise<string> {
  const { catalog } = ctx.services;
  const [best] = await catalog.search(query, 'tracks', 1);
  if (!best) {
    return `No tracks found for <i>${escapeHtml(query)}</i>.`;
  }
  return downloadTrack(ctx, await catalog.getTrack(best.id));
}

export const dl: CommandDefinition = {
  name: 'dl',
  aliases: ['download'],
  usage: '/dl [-t <link>|-s <query>|-a <link>]',
  description: 'Download a track, the first search match, or a whole album or playlist',
  working: '⬇️ Preparing download…',
  async handler(ctx) {
    const { flag, rest } = takeFlag(ctx.args, DL_FLAGS);
    if (rest.length === 0) {
      return formatUsage(dl.usage, dl.description);
    }
    const { catalog } = ctx.services;

    switch (flag) {
      case '-t': {
        const id = requireEntityId(rest[0]);
        if (!isVideoId(id)) {
          throw new ValidationError('link', 'use -a for albums and playlists');
        }
        return downloadTrack(ctx, await catalog.getTrack(id));
      }
      case '-s':
        return downloadFirstMatch(ctx, rest.join(' '));
      case '-a': {
        const id = requireEntityId(rest[0]);
        const kind = inferEntityKind(id);
        if (kind !== 'album' && kind !== 'playlist') {
          throw new ValidationError('link', 'expected an album or playlist link');
        }
        return downloadEntity(ctx, await catalog.getEntity(id, kind));
      }
      case null: {
        const id = rest.length === 1 && rest[0] ? extractEntityId(rest[0]) : null;
        return id ? downloadEntity(ctx, await catalog.getEntity(id)) : downloadFirstMatch(ctx, rest.join(' '));
      }
    }
  },
};
