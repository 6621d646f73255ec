/**
 * Catalog access for command handlers
 *
 * Handlers see only this interface; every call goes through the session's
 * retry policy so a lost login is recovered before the handler notices.
 */

import type { MediaItem } from '@tunegrab/core';
import type {
  CatalogAuthState,
  CatalogEntity,
  CatalogSession,
  EntityKind,
  Lyrics,
  Recommendations,
  SearchKind,
  SearchResult,
  TrackInfo,
} from '@tunegrab/catalog';

export interface MusicCatalog {
  readonly state: CatalogAuthState;
  search(query: string, kind: SearchKind, limit: number): Promise<SearchResult[]>;
  getTrack(videoId: string): Promise<TrackInfo>;
  getEntity(id: string, kind?: EntityKind): Promise<CatalogEntity>;
  getLyrics(videoId: string, lyricsBrowseId?: string | null): Promise<Lyrics | null>;
  /** The three account reads need a signed-in session */
  getHistory(limit: number): Promise<MediaItem[]>;
  getLikedSongs(limit: number): Promise<MediaItem[]>;
  getRecommendations(limit: number): Promise<Recommendations>;
}

export function sessionCatalog(session: CatalogSession): MusicCatalog {
  return {
    get state() {
      return session.state;
    },
    search: (query, kind, limit) => session.call(`catalog.search.${kind}`, (client) => client.search(query, kind, limit)),
    getTrack: (videoId) => session.call('catalog.track', (client) => client.getTrack(videoId)),
    getEntity: (id, kind) => session.call(`catalog.${kind ?? 'entity'}`, (client) => client.getEntity(id, kind)),
    getLyrics: (videoId, lyricsBrowseId) =>
      session.call('catalog.lyrics', (client) => client.getLyrics(videoId, lyricsBrowseId)),
    getHistory: (limit) => session.call('catalog.history', (client) => client.getHistory(limit)),
    getLikedSongs: (limit) => session.call('catalog.liked', (client) => client.getLikedSongs(limit)),
    getRecommendations: (limit) =>
      session.call('catalog.recommendations', (client) => client.getRecommendations(limit)),
  };
}
