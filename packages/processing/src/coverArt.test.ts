import { describe, expect, it, vi } from 'vitest';
import { CoverCropper, buildCropArgs } from './coverArt.js';

describe('buildCropArgs', () => {
  it('crops the centred square and writes one JPEG frame', () => {
    expect(buildCropArgs('/work/thumb.webp', '/work/cover.jpg')).toEqual([
      '-y',
      '-i', '/work/thumb.webp',
      '-vf', 'crop=min(iw\\,ih):min(iw\\,ih),format=yuvj420p',
      '-frames:v', '1',
      '-q:v', '2',
      '/work/cover.jpg',
    ]);
  });
});

describe('CoverCropper', () => {
  it('passes the configured quality to the runner', async () => {
    const runner = vi.fn(async (_args: string[]) => ({ exitCode: 0, stdout: '', stderr: '', duration: 1, timedOut: false }));
    const cropper = new CoverCropper({ runner, quality: 4 });

    await expect(cropper.cropToSquare('in.png', 'out.jpg')).resolves.toBe('out.jpg');
    expect(runner).toHaveBeenCalledWith(buildCropArgs('in.png', 'out.jpg', 4));
  });
});
