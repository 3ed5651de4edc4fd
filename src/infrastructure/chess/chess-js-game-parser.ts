import { Chess } from 'chess.js';

import { GameRecord, type GameParser, type MoveRecord } from '../../domain/game-animation/index.js';
import { AppError } from '../../shared/errors/app-error.js';
import { createChildLogger } from '../../shared/logger/pino.js';

// a blank line before a tag section, or a result token ending a line that a tag section follows
const GAME_BOUNDARY = /\n[ \t]*\n(?=\s*\[)|(?<=(?:\*|1-0|0-1|1\/2-1\/2))[ \t]*\n(?=[ \t]*\[)/;

export class ChessJsGameParser implements GameParser {
  private readonly logger = createChildLogger({ module: 'ChessJsGameParser' });

  public parse(pgn: string): GameRecord {
    const text = normalizePgnText(firstGameText(pgn));

    if (text.length === 0) {
      throw AppError.parse('pgn.parse-failed', 'PGN text does not contain a game');
    }

    const chess = new Chess();
    try {
      chess.loadPgn(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw AppError.parse('pgn.parse-failed', `Unable to parse PGN: ${reason}`, error);
    }

    const history = chess.history({ verbose: true });
    const moves: MoveRecord[] = history.map((move) => ({
      san: move.san,
      from: move.from,
      to: move.to,
      promotion: move.promotion,
      fenBefore: move.before,
      fenAfter: move.after,
    }));
    const initialFen = history[0]?.before ?? chess.fen();
    const headers = readHeaders(chess);

    this.logger.debug({ plies: moves.length, white: headers.White, black: headers.Black }, 'Parsed PGN game');

    return GameRecord.create({ headers, initialFen, moves });
  }
}

/**
 * Keeps only the first game of a multi-game file.
 */
export function firstGameText(pgn: string): string {
  const normalized = pgn.replace(/\r\n?/g, '\n');
  return normalized.split(GAME_BOUNDARY).find((chunk) => chunk.trim().length > 0) ?? '';
}

/**
 * Normalises newlines and makes sure the tag section is followed by a blank line.
 */
export function normalizePgnText(pgn: string): string {
  const text = pgn.replace(/\r\n?/g, '\n').trim();

  if (text.length === 0) {
    return text;
  }

  const lines = text.split('\n');
  if (lines[0]?.startsWith('[')) {
    let index = 0;
    while (index < lines.length && lines[index]?.startsWith('[')) {
      index += 1;
    }
    if (index < lines.length && lines[index] !== '') {
      lines.splice(index, 0, '');
    }
  }

  return `${lines.join('\n')}\n`;
}

function readHeaders(chess: Chess): Record<string, string> {
  const headers: Record<string, string> = {};

  for (const [key, value] of Object.entries(chess.header())) {
    if (typeof value === 'string') {
      headers[key] = value;
    }
  }

  return headers;
}
