import type { BoardPosition, LastMoveHighlight } from '../value-objects/board-position.js';
import type { BoardRenderOptions } from '../value-objects/render-options.js';

export interface BoardRenderer {
  /** Returns an SVG document for the position. */
  render(position: BoardPosition, options: BoardRenderOptions, lastMove: LastMoveHighlight | null): string;
}
