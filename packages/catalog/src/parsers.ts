/**
 * Response Parsers
 *
 * The catalog's web API returns deeply nested renderer trees whose exact
 * nesting shifts between page layouts. Parsers locate renderers by key
 * rather than by full path and read only the fields they need.
 */

import { dig, digArray, digString, isArray, isNumber, isObject, isString, parseDuration } from '@tunegrab/utils';
import type { MediaItem, Thumbnail } from '@tunegrab/core';
import { entityUrl, formatArtists, trackUrl } from './ids.js';
import type { EntityKind, Lyrics, SearchResult } from './types.js';

const TYPE_LABELS = new Set(['Song', 'Video', 'Album', 'Single', 'EP', 'Playlist', 'Artist', 'Episode', 'Podcast']);
const HEADER_KEYS = [
  'musicResponsiveHeaderRenderer',
  'musicDetailHeaderRenderer',
  'musicImmersiveHeaderRenderer',
  'musicVisualHeaderRenderer',
  'musicEditablePlaylistDetailHeaderRenderer',
];

/**
 * Depth-first search for every value stored under `key`
 */
export function findAll(value: unknown, key: string, limit = Infinity): unknown[] {
  const found: unknown[] = [];
  const stack: unknown[] = [value];

  while (stack.length > 0 && found.length < limit) {
    const current = stack.pop();
    if (isArray(current)) {
      for (let index = current.length - 1; index >= 0; index--) {
        stack.push(current[index]);
      }
    } else if (isObject(current)) {
      if (key in current) {
        found.push(current[key]);
        continue;
      }
      const values = Object.values(current);
      for (let index = values.length - 1; index >= 0; index--) {
        stack.push(values[index]);
      }
    }
  }

  return found;
}

export function findFirst(value: unknown, key: string): unknown {
  return findAll(value, key, 1)[0];
}

interface Run {
  text: string;
  browseId?: string;
  videoId?: string;
}

function runsOf(value: unknown): Run[] {
  return digArray(value, 'runs').flatMap((run) => {
    const text = digString(run, 'text');
    if (text === undefined) {
      return [];
    }
    return [{
      text,
      browseId: digString(run, 'navigationEndpoint', 'browseEndpoint', 'browseId'),
      videoId: digString(run, 'navigationEndpoint', 'watchEndpoint', 'videoId'),
    }];
  });
}

export function runsText(value: unknown): string {
  return runsOf(value).map((run) => run.text).join('');
}

export function parseThumbnails(value: unknown): Thumbnail[] {
  if (!isArray(value)) {
    return [];
  }
  return value.flatMap((item) => {
    const url = digString(item, 'url');
    if (!url) {
      return [];
    }
    const width = dig(item, 'width');
    const height = dig(item, 'height');
    return [{
      url,
      width: isNumber(width) ? width : undefined,
      height: isNumber(height) ? height : undefined,
    }];
  });
}

function isSeparator(text: string): boolean {
  return text.trim() === '' || text.trim() === '•' || text.trim() === '&' || text.trim() === ',';
}

interface RunDetails {
  artists: string[];
  album: string | null;
  albumId: string | null;
  year: string | null;
  durationSeconds: number | null;
  plain: string[];
}

function describeRuns(runs: Run[]): RunDetails {
  const details: RunDetails = { artists: [], album: null, albumId: null, year: null, durationSeconds: null, plain: [] };
  for (const run of runs) {
    const text = run.text.trim();
    if (isSeparator(text)) continue;

    if (run.browseId?.startsWith('UC')) {
      details.artists.push(text);
    } else if (run.browseId?.startsWith('MPRE')) {
      details.album = text;
      details.albumId = run.browseId;
    } else if (/^\d{4}$/.test(text)) {
      details.year = text;
    } else if (/^\d+(:\d{2}){1,2}$/.test(text)) {
      details.durationSeconds = parseDuration(text);
    } else if (!TYPE_LABELS.has(text)) {
      details.plain.push(text);
    }
  }
  return details;
}

function listItemColumns(renderer: unknown): { title: Run[]; detail: Run[]; fixed: Run[] } {
  const flex = digArray(renderer, 'flexColumns').map((column) =>
    runsOf(dig(column, 'musicResponsiveListItemFlexColumnRenderer', 'text'))
  );
  const fixed = digArray(renderer, 'fixedColumns').flatMap((column) =>
    runsOf(dig(column, 'musicResponsiveListItemFixedColumnRenderer', 'text'))
  );
  return { title: flex[0] ?? [], detail: flex.slice(1).flat(), fixed };
}

function listItemVideoId(renderer: unknown, title: Run[]): string | undefined {
  return digString(renderer, 'playlistItemData', 'videoId')
    ?? digString(
      renderer,
      'overlay', 'musicItemThumbnailOverlayRenderer', 'content', 'musicPlayButtonRenderer',
      'playNavigationEndpoint', 'watchEndpoint', 'videoId'
    )
    ?? title.find((run) => run.videoId)?.videoId;
}

function listItemThumbnails(renderer: unknown): Thumbnail[] {
  return parseThumbnails(dig(renderer, 'thumbnail', 'musicThumbnailRenderer', 'thumbnail', 'thumbnails'));
}

/**
 * One search row. Rows of the wrong shape for `kind` are dropped.
 */
export function parseSearchItem(renderer: unknown, kind: EntityKind): SearchResult | null {
  const { title: titleRuns, detail, fixed } = listItemColumns(renderer);
  const title = titleRuns.map((run) => run.text).join('').trim();
  if (!title) {
    return null;
  }

  const details = describeRuns([...detail, ...fixed]);
  const thumbnails = listItemThumbnails(renderer);
  const artists = details.artists.length > 0 ? formatArtists(details.artists) : formatArtists(details.plain[0]);

  if (kind === 'track') {
    const videoId = listItemVideoId(renderer, titleRuns);
    if (!videoId) return null;
    return {
      kind,
      id: videoId,
      title,
      artists,
      album: details.album,
      year: details.year,
      durationSeconds: details.durationSeconds,
      url: trackUrl(videoId),
      thumbnails,
    };
  }

  const browseId = digString(renderer, 'navigationEndpoint', 'browseEndpoint', 'browseId');
  if (!browseId) {
    return null;
  }
  const id = kind === 'playlist' && browseId.startsWith('VL') ? browseId.slice(2) : browseId;

  return {
    kind,
    id,
    title,
    artists: kind === 'artist' ? '' : artists,
    album: null,
    year: details.year,
    durationSeconds: null,
    url: entityUrl(kind, id),
    thumbnails,
  };
}

export function parseSearchResults(response: unknown, kind: EntityKind, limit: number): SearchResult[] {
  const results: SearchResult[] = [];
  for (const renderer of findAll(response, 'musicResponsiveListItemRenderer')) {
    const item = parseSearchItem(renderer, kind);
    if (item) {
      results.push(item);
      if (results.length >= limit) break;
    }
  }
  return results;
}

/**
 * Tracks listed on an album, playlist or artist page
 */
export function parseTrackRows(
  response: unknown,
  defaults: { artist?: string; album?: string | null; year?: string | null; thumbnails?: Thumbnail[] } = {}
): MediaItem[] {
  const tracks: MediaItem[] = [];
  for (const renderer of findAll(response, 'musicResponsiveListItemRenderer')) {
    const { title: titleRuns, detail, fixed } = listItemColumns(renderer);
    const videoId = listItemVideoId(renderer, titleRuns);
    const title = titleRuns.map((run) => run.text).join('').trim();
    if (!videoId || !title) {
      continue;
    }

    const details = describeRuns([...detail, ...fixed]);
    const ownThumbnails = listItemThumbnails(renderer);
    tracks.push({
      sourceId: videoId,
      url: trackUrl(videoId),
      title,
      artist: details.artists.length > 0
        ? formatArtists(details.artists)
        : defaults.artist ?? formatArtists(details.plain[0]),
      album: details.album ?? defaults.album ?? null,
      year: details.year ?? defaults.year ?? null,
      durationSeconds: details.durationSeconds,
      thumbnails: ownThumbnails.length > 0 ? ownThumbnails : defaults.thumbnails ?? [],
    });
  }
  return tracks;
}

export interface PageHeader {
  title: string;
  artists: string[];
  plain: string[];
  year: string | null;
  description: string | null;
  thumbnails: Thumbnail[];
}

export function parsePageHeader(response: unknown): PageHeader | null {
  let header: unknown;
  for (const key of HEADER_KEYS) {
    header = findFirst(response, key);
    if (header !== undefined) break;
  }
  if (header === undefined) {
    return null;
  }

  const title = runsText(dig(header, 'title')).trim();
  const subtitle = describeRuns([
    ...runsOf(dig(header, 'straplineTextOne')),
    ...runsOf(dig(header, 'subtitle')),
  ]);
  const descriptionSource = dig(header, 'description', 'musicDescriptionShelfRenderer', 'description') ?? dig(header, 'description');
  const description = runsText(descriptionSource).trim();
  const thumbnails = findFirst(header, 'thumbnails');

  return {
    title,
    artists: subtitle.artists,
    plain: subtitle.plain,
    year: subtitle.year,
    description: description || null,
    thumbnails: parseThumbnails(thumbnails),
  };
}

export interface WatchTrack extends MediaItem {
  lyricsBrowseId: string | null;
}

function parsePanelItem(panel: unknown): MediaItem | null {
  const videoId = digString(panel, 'videoId');
  if (!videoId) {
    return null;
  }

  const details = describeRuns(runsOf(dig(panel, 'longBylineText')));
  const lengthText = runsText(dig(panel, 'lengthText'));
  return {
    sourceId: videoId,
    url: trackUrl(videoId),
    title: runsText(dig(panel, 'title')).trim() || videoId,
    artist: details.artists.length > 0 ? formatArtists(details.artists) : formatArtists(details.plain[0]),
    album: details.album,
    year: details.year,
    durationSeconds: lengthText ? parseDuration(lengthText) : null,
    thumbnails: parseThumbnails(dig(panel, 'thumbnail', 'thumbnails')),
  };
}

/**
 * First entry of the watch queue for a video, plus its lyrics page id
 */
export function parseWatchTrack(response: unknown): WatchTrack | null {
  const item = parsePanelItem(findFirst(response, 'playlistPanelVideoRenderer'));
  if (!item) {
    return null;
  }

  const lyricsBrowseId = findAll(response, 'browseEndpoint')
    .map((endpoint) => digString(endpoint, 'browseId'))
    .find((browseId): browseId is string => isString(browseId) && browseId.startsWith('MPLY')) ?? null;
  return { ...item, lyricsBrowseId };
}

/** Every entry of a watch queue, in order */
export function parseWatchQueue(response: unknown): MediaItem[] {
  return findAll(response, 'playlistPanelVideoRenderer')
    .map(parsePanelItem)
    .filter((item): item is MediaItem => item !== null);
}

export function parseLyrics(response: unknown): Lyrics | null {
  const shelf = findFirst(response, 'musicDescriptionShelfRenderer');
  const text = runsText(dig(shelf, 'description')).trim();
  if (!text) {
    return null;
  }
  const source = runsText(dig(shelf, 'footer')).trim();
  return { text, source: source || null };
}
