/**
 * @tunegrab/processing
 *
 * ffmpeg/ffprobe stages for finished downloads:
 * - Square cover-art crop
 * - Tag and cover embedding
 * - Tag read-back
 */

export { CoverCropper, buildCropArgs, type CoverCropperConfig, type FFmpegRunner } from './coverArt.js';
export {
  TagInjector,
  buildTagArgs,
  supportsEmbeddedCover,
  type TagInjectorConfig,
  type TagCommand,
} from './packaging/tagInjector.js';
export { probeTags, parseProbeOutput } from './ffprobe.js';
export type { TrackTags, ProbedTags, TagResult } from './types.js';
