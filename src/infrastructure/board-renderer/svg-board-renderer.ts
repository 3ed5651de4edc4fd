import { Chess, type Color, type PieceSymbol } from 'chess.js';

import type {
  BoardPosition,
  BoardRenderOptions,
  BoardRenderer,
  LastMoveHighlight,
} from '../../domain/game-animation/index.js';
import { AppError } from '../../shared/errors/app-error.js';

import { loadPieceSet, type PieceSet } from './piece-set.js';

const FILES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] as const;
const MARGIN = 15;

const PIECE_NAMES: Record<PieceSymbol, string> = {
  p: 'pawn',
  n: 'knight',
  b: 'bishop',
  r: 'rook',
  q: 'queen',
  k: 'king',
};

export interface BoardColors {
  readonly light: string;
  readonly dark: string;
  readonly lightLastMove: string;
  readonly darkLastMove: string;
  readonly margin: string;
  readonly coordinate: string;
}

export const DEFAULT_BOARD_COLORS: BoardColors = {
  light: '#ffce9e',
  dark: '#d18b47',
  lightLastMove: '#cdd16a',
  darkLastMove: '#aaa23b',
  margin: '#212121',
  coordinate: '#e5e5e5',
};

interface PieceColors {
  readonly body: string;
  readonly outline: string;
  readonly detail: string;
}

const PIECE_COLORS: Record<Color, PieceColors> = {
  w: { body: '#ffffff', outline: '#000000', detail: '#000000' },
  b: { body: '#000000', outline: '#000000', detail: '#ffffff' },
};

export class SvgBoardRenderer implements BoardRenderer {
  public constructor(
    private readonly pieceSet: PieceSet = loadPieceSet(),
    private readonly colors: BoardColors = DEFAULT_BOARD_COLORS,
  ) {}

  public render(
    position: BoardPosition,
    options: BoardRenderOptions,
    lastMove: LastMoveHighlight | null,
  ): string {
    assertBoardSize(options.size);

    const squareSize = this.pieceSet.squareSize;
    const margin = options.coordinates ? MARGIN : 0;
    const fullSize = squareSize * 8 + margin * 2;
    const grid = new Chess(position.fen).board();
    const highlighted = new Set(lastMove ? [lastMove.from, lastMove.to] : []);

    const squares: string[] = [];
    const pieces: string[] = [];

    for (let row = 0; row < 8; row += 1) {
      for (let column = 0; column < 8; column += 1) {
        const fileIndex = options.orientation === 'white' ? column : 7 - column;
        const rankIndex = options.orientation === 'white' ? 7 - row : row;
        const name = `${FILES[fileIndex]}${rankIndex + 1}`;
        const x = margin + column * squareSize;
        const y = margin + row * squareSize;

        squares.push(this.renderSquare(name, fileIndex, rankIndex, x, y, highlighted.has(name)));

        const piece = grid[7 - rankIndex]?.[fileIndex];
        if (piece) {
          pieces.push(this.renderPiece(piece.type, piece.color, x, y));
        }
      }
    }

    const parts = [
      `<svg xmlns="http://www.w3.org/2000/svg" version="1.2" viewBox="0 0 ${fullSize} ${fullSize}" width="${options.size}" height="${options.size}">`,
    ];

    if (options.style !== undefined) {
      parts.push(`<style>${escapeXml(options.style)}</style>`);
    }

    parts.push(
      `<rect x="0" y="0" width="${fullSize}" height="${fullSize}" fill="${this.colors.margin}" class="background"/>`,
      ...squares,
      ...pieces,
    );

    if (options.coordinates) {
      parts.push(...this.renderCoordinates(options, squareSize));
    }

    parts.push('</svg>');
    return parts.join('');
  }

  private renderSquare(
    name: string,
    fileIndex: number,
    rankIndex: number,
    x: number,
    y: number,
    isLastMove: boolean,
  ): string {
    const squareSize = this.pieceSet.squareSize;
    const shade = (fileIndex + rankIndex) % 2 === 1 ? 'light' : 'dark';
    const fill = shade === 'light'
      ? isLastMove ? this.colors.lightLastMove : this.colors.light
      : isLastMove ? this.colors.darkLastMove : this.colors.dark;
    const classes = ['square', shade, name, ...(isLastMove ? ['lastmove'] : [])].join(' ');

    return `<rect x="${x}" y="${y}" width="${squareSize}" height="${squareSize}" class="${classes}" fill="${fill}" stroke="none"/>`;
  }

  private renderPiece(type: PieceSymbol, color: Color, x: number, y: number): string {
    const shape = this.pieceSet.pieces[type];
    const palette = PIECE_COLORS[color];
    const colorName = color === 'w' ? 'white' : 'black';

    const body = `<g fill="${palette.body}" stroke="${palette.outline}" stroke-width="${this.pieceSet.strokeWidth}" stroke-linejoin="round" stroke-linecap="round">${shape.body.join('')}</g>`;
    const detail = shape.detail.length > 0
      ? `<g fill="${palette.detail}" stroke="${palette.detail}" stroke-linecap="round">${shape.detail.join('')}</g>`
      : '';

    return `<g class="piece ${colorName} ${PIECE_NAMES[type]}" transform="translate(${x}, ${y})">${body}${detail}</g>`;
  }

  private renderCoordinates(options: BoardRenderOptions, squareSize: number): string[] {
    const labels: string[] = [];
    const textAttributes = `text-anchor="middle" font-family="sans-serif" font-size="11" fill="${this.colors.coordinate}"`;

    for (let index = 0; index < 8; index += 1) {
      const file = FILES[options.orientation === 'white' ? index : 7 - index];
      const rank = options.orientation === 'white' ? 8 - index : index + 1;
      const center = MARGIN + index * squareSize + squareSize / 2;

      labels.push(
        `<text x="${center}" y="${MARGIN + squareSize * 8 + 11}" ${textAttributes} class="coord file">${file}</text>`,
        `<text x="${MARGIN / 2}" y="${center + 4}" ${textAttributes} class="coord rank">${rank}</text>`,
      );
    }

    return labels;
  }
}

export function assertBoardSize(size: number): void {
  if (!Number.isInteger(size) || size <= 0) {
    throw AppError.invalidArgument(
      'board-renderer.invalid-size',
      `size of the board must be a positive integer, got ${size}`,
      { size },
    );
  }
}

function escapeXml(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}
