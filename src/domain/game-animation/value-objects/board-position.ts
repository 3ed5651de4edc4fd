/**
 * Value objects describing the positions a game passes through.
 */
export interface BoardPosition {
  readonly fen: string;
  /** Number of half-moves played to reach this position; 0 is the starting position. */
  readonly ply: number;
}

export interface MoveRecord {
  readonly san: string;
  readonly from: string;
  readonly to: string;
  readonly promotion?: string;
  readonly fenBefore: string;
  readonly fenAfter: string;
}

export interface LastMoveHighlight {
  readonly from: string;
  readonly to: string;
}

export interface BoardFrame {
  readonly position: BoardPosition;
  readonly lastMove: MoveRecord | null;
}
