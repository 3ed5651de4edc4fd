import type { BoardFrame, MoveRecord } from '../value-objects/board-position.js';

export interface GameRecordProps {
  readonly headers: Readonly<Record<string, string>>;
  readonly initialFen: string;
  readonly moves: readonly MoveRecord[];
}

/**
 * Parsed game: tag pairs and the mainline, each move carrying the positions around it.
 */
export class GameRecord {
  public readonly headers: Readonly<Record<string, string>>;

  public readonly initialFen: string;

  public readonly moves: readonly MoveRecord[];

  private constructor(props: GameRecordProps) {
    this.headers = Object.freeze({ ...props.headers });
    this.initialFen = props.initialFen;
    this.moves = Object.freeze([...props.moves]);
  }

  public static create(props: GameRecordProps): GameRecord {
    let expectedFen = props.initialFen;

    props.moves.forEach((move, index) => {
      if (move.fenBefore !== expectedFen) {
        throw new Error(`Move ${index + 1} (${move.san}) does not continue from the previous position`);
      }
      expectedFen = move.fenAfter;
    });

    return new GameRecord(props);
  }

  public get plyCount(): number {
    return this.moves.length;
  }

  public frameCount(includeInitialPosition: boolean): number {
    return this.moves.length + (includeInitialPosition ? 1 : 0);
  }

  /**
   * Yields the positions of the mainline in order. Every call returns a new single-pass generator.
   */
  public *positions(includeInitialPosition = true): Generator<BoardFrame, void, undefined> {
    if (includeInitialPosition) {
      yield { position: { fen: this.initialFen, ply: 0 }, lastMove: null };
    }

    for (const [index, move] of this.moves.entries()) {
      yield { position: { fen: move.fenAfter, ply: index + 1 }, lastMove: move };
    }
  }
}
