/**
 * Signed-in account pages: /rec, /alast, /likes
 *
 * An anonymous session gets a short refusal instead of a catalog call.
 */

import type { CommandContext, CommandDefinition } from '../dispatcher.js';
import { formatRecommendations, formatTrackList } from '../format.js';

function signInRefusal(ctx: CommandContext, name: string): string | null {
  if (ctx.services.catalog.state !== 'anonymous') {
    return null;
  }
  ctx.operation.logger.warn({ command: name }, 'Account command refused, catalog session is anonymous');
  return `⚠️ /${name} needs a signed-in catalog session. Set YTMUSIC_HEADERS_FILE to a saved request headers file.`;
}

export const rec: CommandDefinition = {
  name: 'rec',
  aliases: ['recommendations'],
  usage: '/rec',
  description: 'Suggest tracks for your account',
  working: '🎧 Finding recommendations…',
  async handler(ctx) {
    const refusal = signInRefusal(ctx, rec.name);
    if (refusal) return refusal;

    const found = await ctx.services.catalog.getRecommendations(ctx.services.config.limits.recommendations);
    ctx.operation.logger.debug({ seed: found.seed?.sourceId ?? null, count: found.tracks.length }, 'Recommendations loaded');
    return formatRecommendations(found);
  },
};

export const alast: CommandDefinition = {
  name: 'alast',
  usage: '/alast',
  description: 'List what your account played recently',
  working: '📜 Loading listening history…',
  async handler(ctx) {
    const refusal = signInRefusal(ctx, alast.name);
    if (refusal) return refusal;

    const items = await ctx.services.catalog.getHistory(ctx.services.config.limits.accountHistory);
    if (items.length === 0) {
      return 'Your listening history is empty.';
    }
    return formatTrackList('📜 <b>Recently played</b>', items);
  },
};

export const likes: CommandDefinition = {
  name: 'likes',
  usage: '/likes',
  description: 'List your liked songs',
  working: '👍 Loading liked songs…',
  async handler(ctx) {
    const refusal = signInRefusal(ctx, likes.name);
    if (refusal) return refusal;

    const items = await ctx.services.catalog.getLikedSongs(ctx.services.config.limits.likedSongs);
    if (items.length === 0) {
      return 'No liked songs yet.';
    }
    return formatTrackList('👍 <b>Liked songs</b>', items);
  },
};
