/**
 * Music Catalog Client
 *
 * Talks to the YouTube Music web API (the same JSON endpoints the web player
 * uses) over fetch. With browser credentials every request is signed with a
 * SAPISIDHASH; without them requests run as an anonymous visitor.
 *
 * Endpoints:
 * - search: query + filter params
 * - next: watch queue for a video (track details, lyrics page id)
 * - browse: album, playlist, artist, lyrics and account pages
 */

import { NotFoundError, ValidationError, type MediaItem } from '@tunegrab/core';
import { createLogger } from '@tunegrab/utils';
import { CATALOG_ORIGIN, sapisidHash } from './auth.js';
import { CatalogHttpError, parseRetryAfter } from './errors.js';
import { entityUrl, formatArtists, inferEntityKind, isVideoId } from './ids.js';
import {
  parseLyrics,
  parsePageHeader,
  parseSearchResults,
  parseTrackRows,
  parseWatchQueue,
  parseWatchTrack,
} from './parsers.js';
import type {
  AlbumInfo,
  ArtistInfo,
  CatalogAuth,
  CatalogEntity,
  EntityKind,
  Lyrics,
  PlaylistInfo,
  Recommendations,
  SearchKind,
  SearchResult,
  TrackInfo,
} from './types.js';

const log = createLogger({ component: 'catalog' });

const CLIENT_NAME = 'WEB_REMIX';
const CLIENT_VERSION = '1.20240918.01.00';
const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64; rv:128.0) Gecko/20100101 Firefox/128.0';

/** Search filter params understood by the web client */
const SEARCH_PARAMS: Record<SearchKind, string> = {
  tracks: 'EgWKAQIIAWoMEA4QChADEAQQCRAF',
  albums: 'EgWKAQIYAWoMEA4QChADEAQQCRAF',
  artists: 'EgWKAQIgAWoMEA4QChADEAQQCRAF',
  playlists: 'EgeKAQQoAEABagwQDhAKEAMQBBAJEAU%3D',
};

const HISTORY_PAGE = 'FEmusic_history';
const LIKED_PAGE = 'VLLM';
const HOME_PAGE = 'FEmusic_home';

const SEARCH_ENTITY: Record<SearchKind, EntityKind> = {
  tracks: 'track',
  albums: 'album',
  artists: 'artist',
  playlists: 'playlist',
};

export interface CatalogClientConfig {
  auth?: CatalogAuth | null;
  language?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
  now?: () => number;
}

export class CatalogClient {
  private readonly auth: CatalogAuth | null;
  private readonly language: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;

  constructor(config: CatalogClientConfig = {}) {
    this.auth = config.auth ?? null;
    this.language = config.language ?? 'en';
    this.timeoutMs = config.timeoutMs ?? 15000;
    this.fetchImpl = config.fetch ?? fetch;
    this.now = config.now ?? Date.now;
  }

  get authenticated(): boolean {
    return this.auth !== null;
  }

  private headers(): Headers {
    const headers = new Headers({
      'Content-Type': 'application/json',
      'User-Agent': this.auth?.userAgent ?? DEFAULT_USER_AGENT,
      Origin: CATALOG_ORIGIN,
      'X-Origin': CATALOG_ORIGIN,
    });
    if (this.auth) {
      headers.set('Cookie', this.auth.cookie);
      headers.set('X-Goog-AuthUser', this.auth.authUser);
      headers.set('Authorization', sapisidHash(this.auth.sapisid, Math.floor(this.now() / 1000)));
    }
    return headers;
  }

  /**
   * POST one API request and return the decoded JSON body
   */
  private async request(endpoint: string, body: Record<string, unknown>, query = ''): Promise<unknown> {
    const url = `${CATALOG_ORIGIN}/youtubei/v1/${endpoint}?prettyPrint=false${query}`;
    log.debug({ endpoint, authenticated: this.authenticated }, 'Catalog request');

    const response = await this.fetchImpl(url, {
      method: 'POST',
      headers: this.headers(),
      body: JSON.stringify({
        context: {
          client: { clientName: CLIENT_NAME, clientVersion: CLIENT_VERSION, hl: this.language },
          user: {},
        },
        ...body,
      }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new CatalogHttpError(
        endpoint,
        response.status,
        text,
        parseRetryAfter(response.headers.get('retry-after'), this.now())
      );
    }

    const data: unknown = await response.json();
    return data;
  }

  private browse(browseId: string): Promise<unknown> {
    return this.request('browse', { browseId });
  }

  async search(query: string, kind: SearchKind, limit: number): Promise<SearchResult[]> {
    const trimmed = query.trim();
    if (!trimmed) {
      throw new ValidationError('query', 'Search query is empty');
    }
    const response = await this.request('search', { query: trimmed }, `&params=${SEARCH_PARAMS[kind]}`);
    return parseSearchResults(response, SEARCH_ENTITY[kind], limit);
  }

  async getTrack(videoId: string): Promise<TrackInfo> {
    if (!isVideoId(videoId)) {
      throw new ValidationError('videoId', `Not a track id: ${videoId}`);
    }
    const response = await this.request('next', {
      videoId,
      isAudioOnly: true,
      enablePersistentPlaylistPanel: true,
      tunerSettingValue: 'AUTOMIX_SETTING_NORMAL',
    });
    const track = parseWatchTrack(response);
    if (!track || track.sourceId !== videoId) {
      throw new NotFoundError('Track', videoId);
    }
    return { kind: 'track', ...track };
  }

  async getAlbum(browseId: string): Promise<AlbumInfo> {
    // OLAK5uy_ ids are the album's auto-generated playlist
    const pageId = browseId.startsWith('OLAK5uy_') ? `VL${browseId}` : browseId;
    const response = await this.browse(pageId);
    const header = parsePageHeader(response);
    if (!header) {
      throw new NotFoundError('Album', browseId);
    }

    const artist = header.artists.length > 0 ? formatArtists(header.artists) : formatArtists(header.plain[0]);
    return {
      kind: 'album',
      id: browseId,
      title: header.title,
      artist,
      year: header.year,
      url: entityUrl('album', browseId),
      thumbnails: header.thumbnails,
      tracks: parseTrackRows(response, {
        artist,
        album: header.title,
        year: header.year,
        thumbnails: header.thumbnails,
      }),
    };
  }

  async getPlaylist(playlistId: string): Promise<PlaylistInfo> {
    const id = playlistId.startsWith('VL') ? playlistId.slice(2) : playlistId;
    const response = await this.browse(`VL${id}`);
    const header = parsePageHeader(response);
    if (!header) {
      throw new NotFoundError('Playlist', playlistId);
    }

    return {
      kind: 'playlist',
      id,
      title: header.title,
      author: header.artists.length > 0 ? formatArtists(header.artists) : formatArtists(header.plain[0]),
      url: entityUrl('playlist', id),
      thumbnails: header.thumbnails,
      tracks: parseTrackRows(response),
    };
  }

  async getArtist(channelId: string): Promise<ArtistInfo> {
    const response = await this.browse(channelId);
    const header = parsePageHeader(response);
    if (!header) {
      throw new NotFoundError('Artist', channelId);
    }

    return {
      kind: 'artist',
      id: channelId,
      name: header.title,
      description: header.description,
      url: entityUrl('artist', channelId),
      thumbnails: header.thumbnails,
      topTracks: parseTrackRows(response, { artist: header.title }),
    };
  }

  /**
   * Look up any entity; the kind is inferred from the id when not given
   */
  getEntity(id: string, kind: EntityKind | null = inferEntityKind(id)): Promise<CatalogEntity> {
    switch (kind) {
      case 'track':
        return this.getTrack(id);
      case 'album':
        return this.getAlbum(id);
      case 'playlist':
        return this.getPlaylist(id);
      case 'artist':
        return this.getArtist(id);
      case null:
        return Promise.reject(new ValidationError('id', `Unrecognised catalog id: ${id}`));
    }
  }

  /**
   * Lyrics for a track, or null when it has none
   */
  async getLyrics(videoId: string, lyricsBrowseId?: string | null): Promise<Lyrics | null> {
    const browseId = lyricsBrowseId ?? (await this.getTrack(videoId)).lyricsBrowseId;
    if (!browseId) {
      return null;
    }
    return parseLyrics(await this.browse(browseId));
  }

  private requireAuth(): void {
    if (!this.auth) {
      throw new ValidationError('auth', 'No credentials configured');
    }
  }

  /**
   * Fetch a page only a signed-in account can read. Throws CatalogHttpError
   * when the cookie has been rejected.
   */
  async verifyAuthentication(): Promise<void> {
    this.requireAuth();
    await this.browse(HISTORY_PAGE);
  }

  /** Recently played tracks, newest first */
  async getHistory(limit: number): Promise<MediaItem[]> {
    this.requireAuth();
    return parseTrackRows(await this.browse(HISTORY_PAGE)).slice(0, limit);
  }

  async getLikedSongs(limit: number): Promise<MediaItem[]> {
    this.requireAuth();
    return parseTrackRows(await this.browse(LIKED_PAGE)).slice(0, limit);
  }

  /**
   * A radio queue seeded with the last played track. The home feed stands
   * in when the history is empty or the queue comes back empty.
   */
  async getRecommendations(limit: number): Promise<Recommendations> {
    const [seed] = await this.getHistory(1);

    if (seed) {
      const queue = parseWatchQueue(await this.request('next', {
        videoId: seed.sourceId,
        playlistId: `RDAMVM${seed.sourceId}`,
        isAudioOnly: true,
        enablePersistentPlaylistPanel: true,
        tunerSettingValue: 'AUTOMIX_SETTING_NORMAL',
      }));
      const tracks = queue.filter((item) => item.sourceId !== seed.sourceId);
      if (tracks.length > 0) {
        return { seed, tracks: tracks.slice(0, limit) };
      }
      log.debug({ seed: seed.sourceId }, 'Radio queue empty, using home feed');
    }

    return { seed: null, tracks: parseTrackRows(await this.browse(HOME_PAGE)).slice(0, limit) };
  }
}
