/**
 * Tag Injector
 *
 * Writes title/artist/album/year tags and the front cover into a finished
 * audio file. ffmpeg copies the audio stream untouched into a sibling temp
 * file which then replaces the original.
 *
 * Cover support by container:
 * - m4a/mp4, mp3, flac: embedded as an attached picture
 * - opus/ogg/webm and others: tags only
 */

import { rename, rm } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { execFFmpeg, getBasename, getExtension, type Logger } from '@tunegrab/utils';
import type { FFmpegRunner } from '../coverArt.js';
import { probeTags } from '../ffprobe.js';
import type { ProbedTags, TagResult, TrackTags } from '../types.js';

const COVER_CONTAINERS = new Set(['m4a', 'mp4', 'mp3', 'flac']);

export interface TagInjectorConfig {
  ffmpegPath?: string;
  ffprobePath?: string;
  runner?: FFmpegRunner;
  probe?: (filePath: string) => Promise<ProbedTags>;
  logger?: Logger;
}

export interface TagCommand {
  args: string[];
  tagsWritten: number;
  coverEmbedded: boolean;
}

export function supportsEmbeddedCover(filePath: string): boolean {
  return COVER_CONTAINERS.has(getExtension(filePath));
}

/**
 * ffmpeg arguments that copy `inputPath` to `outputPath` with `tags` applied
 */
export function buildTagArgs(inputPath: string, outputPath: string, tags: TrackTags): TagCommand {
  const ext = getExtension(inputPath);
  const embedCover = Boolean(tags.coverPath) && COVER_CONTAINERS.has(ext);

  const args = ['-y', '-i', inputPath];
  if (embedCover && tags.coverPath) {
    args.push('-i', tags.coverPath);
  }

  args.push('-map', '0:a', '-c:a', 'copy');
  if (embedCover) {
    args.push(
      '-map', '1:v',
      '-c:v', ext === 'mp3' || ext === 'flac' ? 'mjpeg' : 'copy',
      '-disposition:v:0', 'attached_pic',
      '-metadata:s:v', 'title=Album cover',
      '-metadata:s:v', 'comment=Cover (front)',
    );
  }

  const metadata: Array<[string, string | null | undefined]> = [
    ['title', tags.title],
    ['artist', tags.artist],
    ['album_artist', tags.artist],
    ['album', tags.album],
    ['date', tags.year],
    ['comment', tags.comment],
  ];

  let tagsWritten = 0;
  for (const [name, value] of metadata) {
    if (value) {
      args.push('-metadata', `${name}=${value}`);
      tagsWritten++;
    }
  }

  if (ext === 'mp3') {
    args.push('-id3v2_version', '3');
  }
  args.push(outputPath);

  return { args, tagsWritten, coverEmbedded: embedCover };
}

export class TagInjector {
  private readonly run: FFmpegRunner;
  private readonly probe: (filePath: string) => Promise<ProbedTags>;
  private readonly logger?: Logger;

  constructor(config: TagInjectorConfig = {}) {
    const ffmpegPath = config.ffmpegPath ?? 'ffmpeg';
    const ffprobePath = config.ffprobePath ?? 'ffprobe';
    this.run = config.runner ?? ((args) => execFFmpeg(args, { ffmpegPath }));
    this.probe = config.probe ?? ((filePath) => probeTags(filePath, ffprobePath));
    this.logger = config.logger;
  }

  /**
   * Tag `filePath` in place
   */
  async inject(filePath: string, tags: TrackTags): Promise<TagResult> {
    const ext = getExtension(filePath);
    const tempOutput = join(dirname(filePath), `${getBasename(filePath)}.tagging.${ext}`);
    const command = buildTagArgs(filePath, tempOutput, tags);

    try {
      await this.run(command.args);
      await rename(tempOutput, filePath);
    } catch (error) {
      await rm(tempOutput, { force: true });
      throw error;
    }

    if (tags.coverPath && !command.coverEmbedded) {
      this.logger?.debug({ filePath, ext }, 'Container cannot carry a cover, wrote tags only');
    }
    return { tagsWritten: command.tagsWritten, coverEmbedded: command.coverEmbedded };
  }

  read(filePath: string): Promise<ProbedTags> {
    return this.probe(filePath);
  }
}
