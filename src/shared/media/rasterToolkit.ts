import { PNG } from 'pngjs';

import { AppError } from '../errors/app-error.js';

export interface RasterImage {
  readonly width: number;
  readonly height: number;
  /** RGBA, 4 bytes per pixel, row-major. */
  readonly data: Uint8Array;
}

export function decodePng(png: Buffer): RasterImage {
  try {
    const decoded = PNG.sync.read(png);
    return { width: decoded.width, height: decoded.height, data: decoded.data };
  } catch (error) {
    throw AppError.render('raster.decode-failed', 'Unable to decode PNG frame', error);
  }
}

export function encodePng(image: RasterImage): Buffer {
  const png = new PNG({ width: image.width, height: image.height });
  png.data = Buffer.from(image.data);
  return PNG.sync.write(png);
}

export function pixelsEqual(a: Uint8Array, b: Uint8Array, pixelIndex: number): boolean {
  const offset = pixelIndex * 4;
  return (
    a[offset] === b[offset] &&
    a[offset + 1] === b[offset + 1] &&
    a[offset + 2] === b[offset + 2] &&
    a[offset + 3] === b[offset + 3]
  );
}
