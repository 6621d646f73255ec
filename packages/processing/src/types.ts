/**
 * Processing Types
 */

/** Tags written into a finished audio file */
export interface TrackTags {
  title: string;
  artist: string;
  album?: string | null;
  year?: string | null;
  comment?: string;
  /** Square JPEG to embed as front cover */
  coverPath?: string | null;
}

/** Tags and stream facts read back from a file */
export interface ProbedTags {
  title: string | null;
  artist: string | null;
  album: string | null;
  year: string | null;
  durationSeconds: number | null;
  codec: string | null;
  hasCover: boolean;
}

export interface TagResult {
  tagsWritten: number;
  coverEmbedded: boolean;
}
