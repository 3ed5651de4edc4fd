import type { GameRecord } from '../entities/game-record.js';

export interface GameParser {
  parse(pgn: string): GameRecord;
}
