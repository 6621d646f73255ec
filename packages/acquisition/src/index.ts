/**
 * @tunegrab/acquisition
 *
 * Media download and output resolution:
 * - yt-dlp subprocess client and report parsing
 * - Thumbnail selection and cover preparation
 * - Output resolution after postprocessing
 * - The download pipeline, single item and sequential collections
 */

export {
  YtDlpClient,
  buildYtDlpArgs,
  DEFAULT_OUTPUT_TEMPLATE,
  REPORT_FILE,
  type YtDlpConfig,
  type CommandRunner,
} from './ytdlp.js';
export { parseDownloaderReport } from './report.js';
export {
  CoverArtPreparer,
  pickThumbnail,
  fetchThumbnail,
  type CoverArtPreparerConfig,
  type SquareCropper,
} from './thumbnails.js';
export {
  resolveOutput,
  isAudioFile,
  AUDIO_EXTENSIONS,
  type ResolveRequest,
  type ResolvedOutput,
} from './resolver.js';
export {
  DownloadPipeline,
  checkTags,
  type DownloadPipelineConfig,
  type DownloadContext,
  type CollectionHooks,
  type CollectionSummary,
  type MergedMetadata,
} from './pipeline.js';
export type {
  MediaDownloader,
  DownloaderRunOptions,
  DownloaderReport,
  DownloaderInfo,
  CoverArtStage,
  TagStage,
} from './types.js';
