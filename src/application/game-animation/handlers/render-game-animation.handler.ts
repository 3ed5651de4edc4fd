import type {
  AnimationArtifact,
  AnimationEncoder,
  BoardFrame,
  BoardRenderOptions,
  BoardRenderer,
  GameParser,
  Rasterizer,
} from '../../../domain/game-animation/index.js';
import { AppError } from '../../../shared/errors/app-error.js';
import { createChildLogger } from '../../../shared/logger/pino.js';
import type { RenderGameAnimationCommand } from '../commands/render-game-animation.command.js';
import {
  renderGameAnimationCommandSchema,
  type RenderGameAnimationPayload,
} from '../dto/render-game-animation.dto.js';

export interface RenderGameAnimationDependencies {
  readonly parser: GameParser;
  readonly renderer: BoardRenderer;
  readonly rasterizer: Rasterizer;
  readonly encoder: AnimationEncoder;
}

export interface RenderedGameAnimation {
  readonly artifact: AnimationArtifact;
  readonly frameCount: number;
  readonly headers: Readonly<Record<string, string>>;
}

/**
 * Parses a game and streams its positions through render, rasterize and encode, one frame at a time.
 * The returned artifact belongs to the caller, who must persist or release it.
 */
export class RenderGameAnimationHandler {
  private readonly logger = createChildLogger({ module: 'RenderGameAnimationHandler' });

  public constructor(private readonly dependencies: RenderGameAnimationDependencies) {}

  public async execute(command: RenderGameAnimationCommand): Promise<RenderedGameAnimation> {
    const payload = this.validate(command);
    const { parser, encoder } = this.dependencies;

    try {
      const game = parser.parse(payload.pgn);
      const expectedFrames = game.frameCount(payload.sequence.includeInitialPosition);

      this.logger.info(
        {
          white: game.headers.White,
          black: game.headers.Black,
          plies: game.plyCount,
          frames: expectedFrames,
        },
        'Starting game animation render',
      );

      const boards = game.positions(payload.sequence.includeInitialPosition);
      const frames = this.renderFrames(boards, payload);
      const artifact = await encoder.encode(frames, payload.animation);

      this.logger.info(
        { frames: artifact.frameCount, bytes: artifact.byteLength },
        'Game animation render completed',
      );

      return { artifact, frameCount: artifact.frameCount, headers: game.headers };
    } catch (error) {
      this.logger.error({ error }, 'Game animation render failed');
      throw AppError.fromUnknown(error, 'game-animation.failure');
    }
  }

  private async *renderFrames(
    boards: Iterable<BoardFrame>,
    payload: RenderGameAnimationPayload,
  ): AsyncGenerator<Buffer, void, undefined> {
    const { renderer, rasterizer } = this.dependencies;
    const options: BoardRenderOptions = payload.render;

    for (const { position, lastMove } of boards) {
      const highlight = payload.sequence.highlightLastMove ? lastMove : null;
      const svg = renderer.render(position, options, highlight);
      yield await rasterizer.rasterize(svg);
    }
  }

  private validate(command: RenderGameAnimationCommand): RenderGameAnimationPayload {
    const parsed = renderGameAnimationCommandSchema.safeParse(command.payload);

    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.issues }, 'Invalid game animation payload received');
      throw AppError.validation('game-animation.invalid-payload', { issues: parsed.error.issues });
    }

    return parsed.data;
  }
}
