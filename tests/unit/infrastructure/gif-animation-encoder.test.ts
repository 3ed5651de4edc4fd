import { describe, expect, it } from 'vitest';

import type { AnimationOptions } from '@domain/game-animation/index.js';

import {
  GifAnimationEncoder,
  normalizePaletteSize,
} from '@/infrastructure/animation-encoder/gif-animation-encoder.js';
import { encodePng } from '@/shared/media/rasterToolkit.js';

import { captureError } from '../../helpers/errors.js';
import { decodeGif, readLoopCount, solidPixels, solidPng, streamOf, type Rgba } from '../../helpers/media.js';

const RED: Rgba = [255, 0, 0, 255];
const BLUE: Rgba = [0, 0, 255, 255];

const baseOptions: AnimationOptions = { loop: 0, duration: 0.5, paletteSize: 16, subrectangles: false };

function redWithFirstPixelBlue(): Buffer {
  const data = solidPixels(4, 2, RED);
  data.set(BLUE, 0);
  return encodePng({ width: 4, height: 2, data });
}

describe('GifAnimationEncoder', () => {
  const encoder = new GifAnimationEncoder();

  it('encodes a single frame animation', async () => {
    const artifact = await encoder.encode(streamOf([solidPng(4, 2, RED)]), baseOptions);

    try {
      const bytes = await artifact.read();
      const { gif, frames } = decodeGif(bytes);

      expect(artifact.mimeType).toBe('image/gif');
      expect(artifact.frameCount).toBe(1);
      expect(artifact.byteLength).toBe(bytes.byteLength);
      expect(bytes.subarray(0, 6).toString('latin1')).toBe('GIF89a');
      expect(gif.lsd.width).toBe(4);
      expect(gif.lsd.height).toBe(2);
      expect(frames).toHaveLength(1);
    } finally {
      await artifact.release();
    }
  });

  it('decodes back to the pixels of the input frame', async () => {
    const colors: Rgba[] = [
      [0, 0, 0, 255],
      [255, 255, 255, 255],
      [255, 0, 0, 255],
      [0, 255, 0, 255],
      [0, 0, 255, 255],
      [255, 255, 0, 255],
      [0, 255, 255, 255],
      [255, 0, 255, 255],
    ];
    const data = new Uint8Array(colors.flat());
    const artifact = await encoder.encode(streamOf([encodePng({ width: 4, height: 2, data })]), baseOptions);

    try {
      const { frames } = decodeGif(await artifact.read());

      expect(frames[0]?.dims).toMatchObject({ width: 4, height: 2, top: 0, left: 0 });
      expect([...(frames[0]?.patch ?? [])]).toEqual([...data]);
    } finally {
      await artifact.release();
    }
  });

  it('stores the loop count', async () => {
    const artifact = await encoder.encode(
      streamOf([solidPng(4, 2, RED), solidPng(4, 2, BLUE)]),
      { ...baseOptions, loop: 3 },
    );

    try {
      expect(readLoopCount(await artifact.read())).toBe(3);
    } finally {
      await artifact.release();
    }
  });

  it('leaves unchanged pixels transparent when subrectangles are enabled', async () => {
    const artifact = await encoder.encode(
      streamOf([solidPng(4, 2, RED), redWithFirstPixelBlue()]),
      { ...baseOptions, subrectangles: true },
    );

    try {
      const { frames } = decodeGif(await artifact.read());
      const second = frames[1];

      expect(frames).toHaveLength(2);
      expect(second?.disposalType).toBe(1);
      expect(second?.patch[3]).toBe(255);
      expect(second?.patch[7]).toBe(0);
      expect(frames[0]?.patch[7]).toBe(255);
    } finally {
      await artifact.release();
    }
  });

  it('writes every pixel of every frame when subrectangles are disabled', async () => {
    const artifact = await encoder.encode(
      streamOf([solidPng(4, 2, RED), redWithFirstPixelBlue()]),
      baseOptions,
    );

    try {
      const { frames } = decodeGif(await artifact.read());

      expect(frames[1]?.patch[3]).toBe(255);
      expect(frames[1]?.patch[7]).toBe(255);
    } finally {
      await artifact.release();
    }
  });

  it('rejects missing timing before pulling any frame', async () => {
    let pulled = 0;
    async function* frames(): AsyncGenerator<Buffer, void, undefined> {
      pulled += 1;
      yield solidPng(4, 2, RED);
    }

    const error = await encoder
      .encode(frames(), { loop: 0, paletteSize: 16, subrectangles: true })
      .catch((reason: unknown) => reason);

    expect(error).toMatchObject({ kind: 'InvalidArgument', code: 'animation.missing-timing' });
    expect(pulled).toBe(0);
  });

  it('rejects an empty frame stream', async () => {
    const error = await encoder.encode(streamOf<Buffer>([]), baseOptions).catch((reason: unknown) => reason);

    expect(error).toMatchObject({ kind: 'InvalidArgument', code: 'animation.no-frames' });
  });

  it('rejects frames whose size differs from the first frame', async () => {
    const error = await encoder
      .encode(streamOf([solidPng(4, 2, RED), solidPng(2, 2, RED)]), baseOptions)
      .catch((reason: unknown) => reason);

    expect(error).toMatchObject({ kind: 'RenderError', code: 'animation.frame-size-mismatch' });
  });

  it('rejects frames that are not PNG images', async () => {
    const error = await encoder
      .encode(streamOf([solidPng(4, 2, RED), Buffer.from('not a png')]), baseOptions)
      .catch((reason: unknown) => reason);

    expect(error).toMatchObject({ kind: 'RenderError', code: 'raster.decode-failed' });
  });

  it('removes the temporary file on release', async () => {
    const artifact = await encoder.encode(streamOf([solidPng(4, 2, RED)]), baseOptions);

    await artifact.release();
    await artifact.release();

    const error = await artifact.read().catch((reason: unknown) => reason);
    expect(error).toBeInstanceOf(Error);
  });
});

describe('normalizePaletteSize', () => {
  it('rounds to the nearest power of two', () => {
    expect(normalizePaletteSize(2)).toBe(2);
    expect(normalizePaletteSize(64)).toBe(64);
    expect(normalizePaletteSize(100)).toBe(128);
    expect(normalizePaletteSize(90)).toBe(64);
    expect(normalizePaletteSize(23)).toBe(16);
    expect(normalizePaletteSize(46)).toBe(32);
    expect(normalizePaletteSize(48)).toBe(64);
    expect(normalizePaletteSize(256)).toBe(256);
  });

  it('rejects sizes outside 2..256', () => {
    for (const size of [1, 257, 12.5]) {
      expect(captureError(() => normalizePaletteSize(size))).toMatchObject({
        code: 'animation.invalid-palette-size',
      });
    }
  });
});
