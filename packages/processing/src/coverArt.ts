/**
 * Cover Art
 *
 * Center-crops artwork to a square JPEG with ffmpeg. Streaming thumbnails
 * are 16:9 frames with the square album art in the middle.
 */

import { execFFmpeg, type CommandResult } from '@tunegrab/utils';

export type FFmpegRunner = (args: string[]) => Promise<CommandResult>;

export interface CoverCropperConfig {
  ffmpegPath?: string;
  /** JPEG quality on ffmpeg's 2 (best) to 31 scale */
  quality?: number;
  runner?: FFmpegRunner;
}

export function buildCropArgs(inputPath: string, outputPath: string, quality = 2): string[] {
  return [
    '-y',
    '-i', inputPath,
    '-vf', 'crop=min(iw\\,ih):min(iw\\,ih),format=yuvj420p',
    '-frames:v', '1',
    '-q:v', String(quality),
    outputPath,
  ];
}

export class CoverCropper {
  private readonly quality: number;
  private readonly run: FFmpegRunner;

  constructor(config: CoverCropperConfig = {}) {
    this.quality = config.quality ?? 2;
    const ffmpegPath = config.ffmpegPath ?? 'ffmpeg';
    this.run = config.runner ?? ((args) => execFFmpeg(args, { ffmpegPath, timeout: 60000 }));
  }

  /**
   * Write a square crop of `inputPath` to `outputPath` (any format ffmpeg decodes in, JPEG out)
   */
  async cropToSquare(inputPath: string, outputPath: string): Promise<string> {
    await this.run(buildCropArgs(inputPath, outputPath, this.quality));
    return outputPath;
  }
}
