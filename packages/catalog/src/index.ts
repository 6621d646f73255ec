/**
 * @tunegrab/catalog
 *
 * Music metadata and search service client:
 * - Search, entity lookup and lyrics
 * - Browser-cookie authentication with anonymous fallback
 * - Entity id extraction and artist formatting
 * - Error classification for the resilient call wrapper
 */

export { CatalogClient, type CatalogClientConfig } from './client.js';
export { CatalogSession, type CatalogAuthState, type CatalogSessionOptions } from './session.js';
export { CatalogHttpError, classifyCatalogError, parseRetryAfter } from './errors.js';
export { loadBrowserAuth, parseHeaders, authFromHeaders, sapisidHash } from './auth.js';
export {
  extractEntityId,
  inferEntityKind,
  isVideoId,
  formatArtists,
  trackUrl,
  entityUrl,
} from './ids.js';
export type {
  EntityKind,
  SearchKind,
  SearchResult,
  TrackInfo,
  AlbumInfo,
  PlaylistInfo,
  ArtistInfo,
  CatalogEntity,
  Lyrics,
  CatalogAuth,
  Recommendations,
} from './types.js';
