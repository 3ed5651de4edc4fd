import { readFileSync } from 'node:fs';

import { z } from 'zod';

import { AppError } from '../../shared/errors/app-error.js';

const pieceShapeSchema = z.object({
  body: z.array(z.string().min(1)).min(1),
  detail: z.array(z.string().min(1)),
});

const pieceSetSchema = z.object({
  squareSize: z.number().positive(),
  strokeWidth: z.number().positive(),
  pieces: z.object({
    p: pieceShapeSchema,
    n: pieceShapeSchema,
    b: pieceShapeSchema,
    r: pieceShapeSchema,
    q: pieceShapeSchema,
    k: pieceShapeSchema,
  }),
});

export type PieceSet = z.infer<typeof pieceSetSchema>;

export type PieceKind = keyof PieceSet['pieces'];

const DEFAULT_PIECE_SET_URL = new URL('../../../assets/pieces.json', import.meta.url);

let cached: PieceSet | undefined;

export function loadPieceSet(source: URL = DEFAULT_PIECE_SET_URL): PieceSet {
  if (cached && source === DEFAULT_PIECE_SET_URL) {
    return cached;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(source, 'utf8'));
  } catch (error) {
    throw AppError.io('io.read-failed', `Unable to load piece set from ${source.pathname}`, error);
  }

  const parsed = pieceSetSchema.safeParse(raw);
  if (!parsed.success) {
    throw AppError.validation('board-renderer.invalid-piece-set', { issues: parsed.error.issues });
  }

  if (source === DEFAULT_PIECE_SET_URL) {
    cached = parsed.data;
  }

  return parsed.data;
}
