/**
 * Catalog lookups: /search, /see, /lyrics
 */

import { ValidationError } from '@tunegrab/core';
import { extractEntityId, isVideoId, type EntityKind, type SearchKind } from '@tunegrab/catalog';
import type { CommandDefinition } from '../dispatcher.js';
import { formatEntity, formatLyrics, formatSearchResults, formatUsage } from '../format.js';
import { escapeHtml, takeFlag } from '../text.js';

const KIND_FLAGS = ['-t', '-a', '-p', '-e'] as const;

type KindFlag = (typeof KIND_FLAGS)[number];

const SEARCH_KINDS: Record<KindFlag, SearchKind> = {
  '-t': 'tracks',
  '-a': 'albums',
  '-p': 'playlists',
  '-e': 'artists',
};

const ENTITY_KINDS: Record<KindFlag, EntityKind> = {
  '-t': 'track',
  '-a': 'album',
  '-p': 'playlist',
  '-e': 'artist',
};

/**
 * Catalog id from a pasted link or bare id
 */
export function requireEntityId(input: string | undefined): string {
  const id = input ? extractEntityId(input) : null;
  if (!id) {
    throw new ValidationError('link', `no catalog id found in "${input ?? ''}"`);
  }
  return id;
}

export const search: CommandDefinition = {
  name: 'search',
  usage: '/search [-t|-a|-p|-e] <query>',
  description: 'Search tracks (default), albums, playlists or artists',
  working: '🔎 Searching…',
  async handler(ctx) {
    const { flag, rest } = takeFlag(ctx.args, KIND_FLAGS);
    const query = rest.join(' ');
    if (!query) {
      return formatUsage(search.usage, search.description);
    }

    const kind = flag ? SEARCH_KINDS[flag] : 'tracks';
    const results = await ctx.services.catalog.search(query, kind, ctx.services.config.limits.search);
    ctx.operation.logger.debug({ kind, count: results.length }, 'Search finished');
    return formatSearchResults(query, kind, results);
  },
};

export const see: CommandDefinition = {
  name: 'see',
  usage: '/see [-t|-a|-p|-e] <link|id>',
  description: 'Show a track, album, playlist or artist',
  working: '🔎 Looking up…',
  async handler(ctx) {
    const { flag, rest } = takeFlag(ctx.args, KIND_FLAGS);
    if (rest.length === 0) {
      return formatUsage(see.usage, see.description);
    }

    const id = requireEntityId(rest[0]);
    const entity = await ctx.services.catalog.getEntity(id, flag ? ENTITY_KINDS[flag] : undefined);
    return formatEntity(entity);
  },
};

export const lyrics: CommandDefinition = {
  name: 'lyrics',
  usage: '/lyrics <link|id>',
  description: 'Show the lyrics of a track',
  working: '📝 Fetching lyrics…',
  async handler(ctx) {
    if (ctx.args.length === 0) {
      return formatUsage(lyrics.usage, lyrics.description);
    }

    const id = requireEntityId(ctx.args[0]);
    if (!isVideoId(id)) {
      throw new ValidationError('link', 'lyrics need a track link or id');
    }

    const { catalog } = ctx.services;
    const track = await catalog.getTrack(id);
    const found = await catalog.getLyrics(id, track.lyricsBrowseId);
    if (!found) {
      return `No lyrics available for <b>${escapeHtml(track.title)}</b>.`;
    }
    return formatLyrics(`${track.title} · ${track.artist}`, found);
  },
};
