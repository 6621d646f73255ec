/**
 * Entity Identifiers
 *
 * Recognises bare catalog ids and the link shapes people paste into chat.
 */

import type { EntityKind } from './types.js';

const VIDEO_ID = /^[A-Za-z0-9_-]{11}$/;

const LINK_PATTERNS: RegExp[] = [
  /(?:youtube\.com\/watch\?v=|youtu\.be\/)([A-Za-z0-9_-]{11})/,
  /(?:music\.youtube\.com\/watch\?v=)([A-Za-z0-9_-]{11})/,
  /(?:music\.youtube\.com\/playlist\?list=|youtube\.com\/playlist\?list=)([A-Za-z0-9_-]+)/,
  /(?:music\.youtube\.com\/browse\/|youtube\.com\/channel\/)([A-Za-z0-9_-]+)/,
];

/**
 * Pull a track, playlist, album or artist id out of a link, or pass a bare id through
 */
export function extractEntityId(linkOrId: string): string | null {
  const input = linkOrId.trim();
  if (!input) {
    return null;
  }

  if (VIDEO_ID.test(input)) {
    return input;
  }
  if (/^(PL|VL|OLAK5uy_|MPRE|MPLA|RDAM|UC)/.test(input) && /^[A-Za-z0-9_-]+$/.test(input)) {
    return input;
  }

  for (const pattern of LINK_PATTERNS) {
    const match = pattern.exec(input);
    if (match?.[1]) {
      return match[1];
    }
  }

  return null;
}

export function inferEntityKind(id: string): EntityKind | null {
  if (VIDEO_ID.test(id)) return 'track';
  if (id.startsWith('PL') || id.startsWith('VL')) return 'playlist';
  if (id.startsWith('OLAK5uy_') || id.startsWith('MPRE') || id.startsWith('MPLA') || id.startsWith('RDAM')) return 'album';
  if (id.startsWith('UC')) return 'artist';
  return null;
}

export function isVideoId(id: string): boolean {
  return VIDEO_ID.test(id);
}

type ArtistLike = string | { name?: string | null } | null | undefined;

/**
 * Join artist names, dropping auto-generated " - Topic" channel suffixes
 */
export function formatArtists(artists: ArtistLike | ArtistLike[]): string {
  const list = Array.isArray(artists) ? artists : [artists];
  const names = list
    .map((artist) => (typeof artist === 'string' ? artist : artist?.name ?? ''))
    .map((name) => name.trim().replace(/\s*-\s*Topic$/, '').trim())
    .filter((name) => name.length > 0);

  return names.length > 0 ? names.join(', ') : 'Unknown';
}

export function trackUrl(videoId: string): string {
  return `https://music.youtube.com/watch?v=${videoId}`;
}

export function entityUrl(kind: EntityKind, id: string): string {
  switch (kind) {
    case 'track':
      return trackUrl(id);
    case 'playlist':
      return `https://music.youtube.com/playlist?list=${id.startsWith('VL') ? id.slice(2) : id}`;
    case 'album':
    case 'artist':
      return `https://music.youtube.com/browse/${id}`;
  }
}
