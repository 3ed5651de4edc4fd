import type { AnimationOptions } from '../value-objects/animation-options.js';

/**
 * Encoded animation held in a temporary resource until it is persisted or released.
 */
export interface AnimationArtifact {
  readonly mimeType: 'image/gif';
  readonly frameCount: number;
  readonly byteLength: number;
  read(): Promise<Buffer>;
  release(): Promise<void>;
}

export interface AnimationEncoder {
  encode(frames: AsyncIterable<Buffer>, options: AnimationOptions): Promise<AnimationArtifact>;
}
