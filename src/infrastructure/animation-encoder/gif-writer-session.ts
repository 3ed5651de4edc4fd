import { promises as fs } from 'node:fs';
import type { FileHandle } from 'node:fs/promises';

import { applyPalette, GIFEncoder, quantize, type Palette } from 'gifenc';

import { AppError } from '../../shared/errors/app-error.js';
import { decodePng, pixelsEqual, type RasterImage } from '../../shared/media/rasterToolkit.js';

// GIF disposal method 1: leave the frame in place for the next one to draw over
const DISPOSE_KEEP = 1;

export interface GifWriterSettings {
  readonly delayMs: number;
  readonly loop: number;
  readonly paletteSize: number;
  readonly subrectangles: boolean;
}

/**
 * Streams GIF frames into an open file handle. Encoded bytes are flushed after every frame,
 * so the encoder runs in manual mode: the header is written once, with the first frame.
 */
export class GifWriterSession {
  private readonly encoder = GIFEncoder({ auto: false });

  private previous: RasterImage | null = null;

  private closed = false;

  private frames = 0;

  private bytes = 0;

  private constructor(
    private readonly handle: FileHandle,
    private readonly settings: GifWriterSettings,
  ) {}

  public static async open(filePath: string, settings: GifWriterSettings): Promise<GifWriterSession> {
    try {
      const handle = await fs.open(filePath, 'w');
      return new GifWriterSession(handle, settings);
    } catch (error) {
      throw AppError.io('io.write-failed', `Unable to open ${filePath} for writing`, error, { path: filePath });
    }
  }

  public get frameCount(): number {
    return this.frames;
  }

  public get bytesWritten(): number {
    return this.bytes;
  }

  public async append(png: Buffer): Promise<void> {
    const raster = decodePng(png);
    const previous = this.previous;

    if (previous && (previous.width !== raster.width || previous.height !== raster.height)) {
      throw AppError.render(
        'animation.frame-size-mismatch',
        `Frame ${this.frames} is ${raster.width}x${raster.height}, expected ${previous.width}x${previous.height}`,
      );
    }

    if (!previous) {
      this.encoder.writeHeader();
    }

    if (previous && this.settings.subrectangles) {
      this.writeDeltaFrame(raster, previous);
    } else {
      this.writeFullFrame(raster);
    }

    await this.flush();
    this.previous = raster;
    this.frames += 1;
  }

  public async finish(): Promise<void> {
    this.encoder.finish();
    await this.flush();
  }

  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;
    await this.handle.close();
  }

  private writeFullFrame(raster: RasterImage): void {
    const palette = quantize(raster.data, this.settings.paletteSize);
    const index = applyPalette(raster.data, palette);

    this.encoder.writeFrame(index, raster.width, raster.height, {
      palette,
      first: this.previous === null,
      delay: this.settings.delayMs,
      repeat: this.settings.loop,
      dispose: this.settings.subrectangles ? DISPOSE_KEEP : -1,
    });
  }

  /**
   * Pixels unchanged since the previous frame get a reserved transparent index,
   * so only the regions that moved carry colour data.
   */
  private writeDeltaFrame(raster: RasterImage, previous: RasterImage): void {
    const palette: Palette = quantize(raster.data, Math.max(1, this.settings.paletteSize - 1));
    const index = applyPalette(raster.data, palette);
    const transparentIndex = palette.length;
    palette.push([0, 0, 0]);

    const pixelCount = raster.width * raster.height;
    for (let pixel = 0; pixel < pixelCount; pixel += 1) {
      if (pixelsEqual(raster.data, previous.data, pixel)) {
        index[pixel] = transparentIndex;
      }
    }

    this.encoder.writeFrame(index, raster.width, raster.height, {
      palette,
      delay: this.settings.delayMs,
      transparent: true,
      transparentIndex,
      dispose: DISPOSE_KEEP,
    });
  }

  private async flush(): Promise<void> {
    const chunk = this.encoder.bytesView();

    if (chunk.byteLength > 0) {
      await this.handle.write(chunk);
      this.bytes += chunk.byteLength;
    }

    this.encoder.reset();
  }
}
