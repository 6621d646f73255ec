/**
 * FFprobe Reader
 *
 * Reads container tags and stream facts back from an audio file.
 */

import { z } from 'zod';
import { CommandFailedError, executeCommand } from '@tunegrab/utils';
import type { ProbedTags } from './types.js';

const tagMap = z.record(z.string(), z.string()).optional();

const probeSchema = z.object({
  streams: z.array(z.object({
    codec_type: z.string().optional(),
    codec_name: z.string().optional(),
    disposition: z.object({ attached_pic: z.number().optional() }).passthrough().optional(),
    tags: tagMap,
  }).passthrough()).default([]),
  format: z.object({
    duration: z.string().optional(),
    tags: tagMap,
  }).passthrough().optional(),
});

function pick(tags: Map<string, string>, ...names: string[]): string | null {
  for (const name of names) {
    const value = tags.get(name)?.trim();
    if (value) return value;
  }
  return null;
}

/**
 * Normalise `ffprobe -print_format json` output. Tag names are matched
 * case-insensitively because each container spells them differently.
 */
export function parseProbeOutput(stdout: string): ProbedTags {
  const data = probeSchema.parse(JSON.parse(stdout));

  const tags = new Map<string, string>();
  const audio = data.streams.find((stream) => stream.codec_type === 'audio');
  // Ogg keeps tags on the stream, most other containers on the format
  for (const source of [audio?.tags, data.format?.tags]) {
    for (const [name, value] of Object.entries(source ?? {})) {
      tags.set(name.toLowerCase(), value);
    }
  }

  const date = pick(tags, 'date', 'year', 'originaldate');
  const duration = data.format?.duration ? Number.parseFloat(data.format.duration) : Number.NaN;

  return {
    title: pick(tags, 'title'),
    artist: pick(tags, 'artist', 'album_artist', 'performer'),
    album: pick(tags, 'album'),
    year: date ? date.slice(0, 4) : null,
    durationSeconds: Number.isFinite(duration) ? Math.round(duration) : null,
    codec: audio?.codec_name ?? null,
    hasCover: data.streams.some((stream) => stream.disposition?.attached_pic === 1),
  };
}

export async function probeTags(filePath: string, ffprobePath = 'ffprobe'): Promise<ProbedTags> {
  const result = await executeCommand(ffprobePath, [
    '-v', 'quiet',
    '-print_format', 'json',
    '-show_format',
    '-show_streams',
    filePath,
  ], { timeout: 60000 });

  if (result.exitCode !== 0) {
    throw new CommandFailedError(ffprobePath, result);
  }
  return parseProbeOutput(result.stdout);
}
