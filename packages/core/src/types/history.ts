/**
 * One completed download as kept by the history store
 */
export interface HistoryRecord {
  title: string;
  artist: string;
  album: string | null;
  sourceUrl: string;
  sourceId: string;
  /** null when unknown (rows written before durations were kept) */
  durationSeconds: number | null;
  downloadedAt: Date;
}
