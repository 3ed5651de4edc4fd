import {
  RenderGameAnimationCommand,
  RenderGameAnimationHandler,
  type RenderGameAnimationInput,
  type RenderedGameAnimation,
} from './application/game-animation/index.js';
import { GifAnimationEncoder } from './infrastructure/animation-encoder/gif-animation-encoder.js';
import { SvgBoardRenderer } from './infrastructure/board-renderer/svg-board-renderer.js';
import { ChessJsGameParser } from './infrastructure/chess/chess-js-game-parser.js';
import { ResvgRasterizer } from './infrastructure/rasterizer/resvg-rasterizer.js';

export function createGameAnimationHandler(): RenderGameAnimationHandler {
  return new RenderGameAnimationHandler({
    parser: new ChessJsGameParser(),
    renderer: new SvgBoardRenderer(),
    rasterizer: new ResvgRasterizer(),
    encoder: new GifAnimationEncoder(),
  });
}

/**
 * Renders a PGN game into a temporary GIF artifact. Pair with `persistArtifact`,
 * or call `artifact.release()` once the bytes are no longer needed.
 */
export function renderPgnToGif(
  pgn: string,
  options: Omit<RenderGameAnimationInput, 'pgn'>,
  handler: RenderGameAnimationHandler = createGameAnimationHandler(),
): Promise<RenderedGameAnimation> {
  return handler.execute(new RenderGameAnimationCommand({ pgn, ...options }));
}

export {
  RenderGameAnimationCommand,
  RenderGameAnimationHandler,
  type RenderGameAnimationInput,
  type RenderedGameAnimation,
};
export type {
  AnimationArtifact,
  AnimationOptions,
  BoardOrientation,
  BoardRenderOptions,
} from './domain/game-animation/index.js';
export { AppError, type AppErrorKind } from './shared/errors/app-error.js';
export { analyzeGif, type GifAnalysis } from './shared/media/gifToolkit.js';
export { persistArtifact } from './infrastructure/files/artifact-writer.js';
export { readTextFile } from './infrastructure/files/text-file-reader.js';
