/**
 * Thumbnails
 *
 * Picks the best artwork candidate, downloads it into the work directory
 * and hands it to the square crop.
 */

import { join } from 'node:path';
import { createLogger, getExtension, safeWriteFile, type Logger } from '@tunegrab/utils';
import type { Thumbnail } from '@tunegrab/core';
import type { CoverArtStage } from './types.js';

const CONTENT_TYPE_EXTENSIONS: Record<string, string> = {
  'image/jpeg': 'jpg',
  'image/jpg': 'jpg',
  'image/png': 'png',
  'image/webp': 'webp',
};

const PREFERRED_EXTENSIONS = new Set(['jpg', 'jpeg', 'webp']);

function area(thumbnail: Thumbnail): number {
  return (thumbnail.width ?? 0) * (thumbnail.height ?? 0);
}

function urlExtension(url: string): string {
  try {
    return getExtension(new URL(url).pathname);
  } catch {
    return '';
  }
}

/**
 * Largest thumbnail by area; on a tie, a jpg or webp over anything else
 */
export function pickThumbnail(thumbnails: readonly Thumbnail[]): Thumbnail | null {
  let best: Thumbnail | null = null;
  for (const candidate of thumbnails) {
    if (!/^https?:\/\//i.test(candidate.url)) continue;
    if (best === null || area(candidate) > area(best)) {
      best = candidate;
    } else if (
      area(candidate) === area(best) &&
      PREFERRED_EXTENSIONS.has(urlExtension(candidate.url)) &&
      !PREFERRED_EXTENSIONS.has(urlExtension(best.url))
    ) {
      best = candidate;
    }
  }
  return best;
}

/**
 * Download `url` to `<destDir>/thumbnail.<ext>`, the extension taken from
 * the response's content type, then the URL, then jpg.
 */
export async function fetchThumbnail(
  url: string,
  destDir: string,
  fetchImpl: typeof fetch = fetch,
  timeoutMs = 30000
): Promise<string> {
  const response = await fetchImpl(url, { signal: AbortSignal.timeout(timeoutMs) });
  if (!response.ok) {
    throw new Error(`Thumbnail request failed with HTTP ${response.status}`);
  }

  const contentType = response.headers.get('content-type')?.split(';')[0]?.trim().toLowerCase() ?? '';
  const extension = CONTENT_TYPE_EXTENSIONS[contentType] ?? (urlExtension(url) || 'jpg');
  const filePath = join(destDir, `thumbnail.${extension}`);

  await safeWriteFile(filePath, Buffer.from(await response.arrayBuffer()));
  return filePath;
}

export interface SquareCropper {
  cropToSquare(inputPath: string, outputPath: string): Promise<string>;
}

export interface CoverArtPreparerConfig {
  cropper: SquareCropper;
  fetch?: typeof fetch;
  logger?: Logger;
}

export class CoverArtPreparer implements CoverArtStage {
  private readonly cropper: SquareCropper;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(config: CoverArtPreparerConfig) {
    this.cropper = config.cropper;
    this.fetchImpl = config.fetch ?? fetch;
    this.logger = config.logger ?? createLogger({ component: 'cover-art' });
  }

  async prepare(thumbnails: Thumbnail[], workDir: string): Promise<string | null> {
    const best = pickThumbnail(thumbnails);
    if (!best) {
      this.logger.debug('No usable thumbnail');
      return null;
    }

    const original = await fetchThumbnail(best.url, workDir, this.fetchImpl);
    const cover = await this.cropper.cropToSquare(original, join(workDir, 'cover.jpg'));
    this.logger.debug({ url: best.url, width: best.width, height: best.height }, 'Cover prepared');
    return cover;
  }
}
