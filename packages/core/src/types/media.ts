/**
 * Media Types
 *
 * Shapes shared between the catalog, the download pipeline and the bot.
 */

export interface Thumbnail {
  url: string;
  width?: number;
  height?: number;
}

/**
 * A single track resolved from the catalog (or from the downloader's own
 * metadata when the catalog has nothing better)
 */
export interface MediaItem {
  /** Unique source identifier, e.g. an 11 character video id */
  sourceId: string;
  url: string;
  title: string;
  artist: string;
  album: string | null;
  year: string | null;
  durationSeconds: number | null;
  thumbnails: Thumbnail[];
}

export type TagField = 'title' | 'artist' | 'album' | 'year';

/**
 * Tag check outcome after the tagging stage. Never thrown.
 */
export interface MetadataWarning {
  kind: 'metadata-incomplete';
  missing: TagField[];
  /** True when title or artist is missing */
  required: boolean;
}

export interface DownloadResult {
  /** Absolute path of the confirmed, tagged audio file */
  path: string;
  title: string;
  artist: string;
  album: string | null;
  durationSeconds: number | null;
  sourceUrl: string;
  sourceId: string;
  fileSize: number;
  /** Square cover prepared for the upload thumbnail, if one was produced */
  coverPath: string | null;
  warnings: MetadataWarning[];
  /** Resolves once the work directory is gone; call after delivery */
  release(): Promise<void>;
}
