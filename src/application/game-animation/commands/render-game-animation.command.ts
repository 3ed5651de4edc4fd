import type { RenderGameAnimationInput } from '../dto/render-game-animation.dto.js';

export class RenderGameAnimationCommand {
  public readonly payload: RenderGameAnimationInput;

  public constructor(payload: RenderGameAnimationInput) {
    this.payload = payload;
  }
}
