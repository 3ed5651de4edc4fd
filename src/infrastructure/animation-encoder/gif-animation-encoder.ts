import type {
  AnimationArtifact,
  AnimationEncoder,
  AnimationOptions,
} from '../../domain/game-animation/index.js';
import { AppError } from '../../shared/errors/app-error.js';
import { createChildLogger } from '../../shared/logger/pino.js';
import { resolveFrameDelayMs } from '../../shared/media/frameTiming.js';
import { nearestPowerOfTwo } from '../../shared/media/numberUtils.js';
import { TemporaryFile } from '../files/temporary-file.js';

import { GifWriterSession, type GifWriterSettings } from './gif-writer-session.js';

const MIN_PALETTE_SIZE = 2;
const MAX_PALETTE_SIZE = 256;

class GifAnimationArtifact implements AnimationArtifact {
  public readonly mimeType = 'image/gif';

  public constructor(
    private readonly file: TemporaryFile,
    public readonly frameCount: number,
    public readonly byteLength: number,
  ) {}

  public read(): Promise<Buffer> {
    return this.file.read();
  }

  public release(): Promise<void> {
    return this.file.release();
  }
}

export class GifAnimationEncoder implements AnimationEncoder {
  private readonly logger = createChildLogger({ module: 'GifAnimationEncoder' });

  public async encode(frames: AsyncIterable<Buffer>, options: AnimationOptions): Promise<AnimationArtifact> {
    const settings = resolveWriterSettings(options);

    let file: TemporaryFile | undefined;
    let session: GifWriterSession | undefined;

    try {
      try {
        for await (const png of frames) {
          if (!session) {
            file = await TemporaryFile.create('animation.gif');
            session = await GifWriterSession.open(file.path, settings);
          }

          await session.append(png);
          this.logger.debug({ frame: session.frameCount, bytes: session.bytesWritten }, 'Appended GIF frame');
        }

        if (!session || !file) {
          throw AppError.invalidArgument('animation.no-frames', 'Cannot encode an animation without frames');
        }

        await session.finish();
        return new GifAnimationArtifact(file, session.frameCount, session.bytesWritten);
      } finally {
        await session?.close();
      }
    } catch (error) {
      await file?.release();
      throw error;
    }
  }
}

export function resolveWriterSettings(options: AnimationOptions): GifWriterSettings {
  const delayMs = resolveFrameDelayMs(options);

  if (!Number.isInteger(options.loop) || options.loop < 0) {
    throw AppError.invalidArgument('animation.invalid-loop', `Loop count must be a non-negative integer, got ${options.loop}`);
  }

  return {
    delayMs,
    loop: options.loop,
    paletteSize: normalizePaletteSize(options.paletteSize),
    subrectangles: options.subrectangles,
  };
}

export function normalizePaletteSize(paletteSize: number): number {
  if (!Number.isInteger(paletteSize) || paletteSize < MIN_PALETTE_SIZE || paletteSize > MAX_PALETTE_SIZE) {
    throw AppError.invalidArgument(
      'animation.invalid-palette-size',
      `Palette size must be an integer between ${MIN_PALETTE_SIZE} and ${MAX_PALETTE_SIZE}, got ${paletteSize}`,
    );
  }

  return nearestPowerOfTwo(paletteSize);
}
