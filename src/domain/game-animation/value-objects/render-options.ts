export type BoardOrientation = 'white' | 'black';

export interface BoardRenderOptions {
  readonly orientation: BoardOrientation;
  readonly size: number;
  readonly coordinates: boolean;
  /** Raw stylesheet text embedded into every rendered board. */
  readonly style?: string;
}
