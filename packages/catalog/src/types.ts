/**
 * Catalog Types
 */

import type { MediaItem, Thumbnail } from '@tunegrab/core';

export type EntityKind = 'track' | 'album' | 'playlist' | 'artist';

export type SearchKind = 'tracks' | 'albums' | 'playlists' | 'artists';

export interface SearchResult {
  kind: EntityKind;
  id: string;
  title: string;
  /** Artists for tracks and albums, owner for playlists, empty for artists */
  artists: string;
  album: string | null;
  year: string | null;
  durationSeconds: number | null;
  url: string;
  thumbnails: Thumbnail[];
}

export interface TrackInfo extends MediaItem {
  kind: 'track';
  /** Browse id of the lyrics page, when the track has one */
  lyricsBrowseId: string | null;
}

export interface AlbumInfo {
  kind: 'album';
  id: string;
  title: string;
  artist: string;
  year: string | null;
  url: string;
  thumbnails: Thumbnail[];
  tracks: MediaItem[];
}

export interface PlaylistInfo {
  kind: 'playlist';
  id: string;
  title: string;
  author: string;
  url: string;
  thumbnails: Thumbnail[];
  tracks: MediaItem[];
}

export interface ArtistInfo {
  kind: 'artist';
  id: string;
  name: string;
  description: string | null;
  url: string;
  thumbnails: Thumbnail[];
  topTracks: MediaItem[];
}

export type CatalogEntity = TrackInfo | AlbumInfo | PlaylistInfo | ArtistInfo;

export interface Lyrics {
  text: string;
  source: string | null;
}

/**
 * Browser session credentials taken from a saved request headers file
 */
export interface CatalogAuth {
  cookie: string;
  sapisid: string;
  authUser: string;
  userAgent?: string;
}

/**
 * Tracks suggested for the signed-in account. `seed` is the recently played
 * track the queue was built from; null when the home feed supplied them.
 */
export interface Recommendations {
  seed: MediaItem | null;
  tracks: MediaItem[];
}
