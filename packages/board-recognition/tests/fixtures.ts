/**
 * Synthetic chess imagery for tests.
 * All functions work in pure TypeScript on RGBA buffers.
 */

import type { Grid, RawImage } from '../src/types';
import { createImage } from '../src/image';

export const LIGHT_SQUARE = 210;
export const DARK_SQUARE = 110;
export const BACKGROUND = 30;

export type FixturePiece = 'white' | 'black' | null;

function fillRect(
  img: RawImage,
  x0: number,
  y0: number,
  x1: number,
  y1: number,
  value: number
): void {
  for (let y = y0; y < y1; y++) {
    for (let x = x0; x < x1; x++) {
      const i = (y * img.width + x) * 4;
      img.data[i] = value;
      img.data[i + 1] = value;
      img.data[i + 2] = value;
      img.data[i + 3] = 255;
    }
  }
}

/** Uniform gray square */
export function solidSquare(size: number, value: number): RawImage {
  return createImage(size, size, [value, value, value]);
}

/**
 * Draw a piece into the cell at (`ox`, `oy`) of side `size`.
 *
 * Both colours fill exactly the centre window `[size/4, 3size/4)`. A black
 * piece is solid 0; a white piece is 255 with a 0 core inset by `size/10`,
 * so its centre window is 36% dark at a mean of 163.2 when `size` is 80.
 */
function drawPiece(
  img: RawImage,
  ox: number,
  oy: number,
  size: number,
  piece: 'white' | 'black'
): void {
  const lo = Math.floor(size / 4);
  const hi = Math.floor((3 * size) / 4);
  if (piece === 'black') {
    fillRect(img, ox + lo, oy + lo, ox + hi, oy + hi, 0);
    return;
  }
  const inset = Math.floor(size / 10);
  fillRect(img, ox + lo, oy + lo, ox + hi, oy + hi, 255);
  fillRect(img, ox + lo + inset, oy + lo + inset, ox + hi - inset, oy + hi - inset, 0);
}

/** A single square holding a piece */
export function pieceSquare(size: number, background: number, piece: 'white' | 'black'): RawImage {
  const img = solidSquare(size, background);
  drawPiece(img, 0, 0, size, piece);
  return img;
}

/** `(row + col)` odd is a dark square, which puts a1 bottom-left */
export function isDarkCell(row: number, col: number): boolean {
  return (row + col) % 2 === 1;
}

export interface SyntheticSceneOptions {
  imageSize: number;
  squareSize: number;
  /** Top-left corner of the board; centred when omitted */
  offset?: number;
  pieces?: Grid<FixturePiece>;
}

/** A checkerboard with optional pieces on a dark background */
export function createChessScene(opts: SyntheticSceneOptions): RawImage {
  const { imageSize, squareSize, pieces } = opts;
  const boardPx = squareSize * 8;
  const offset = opts.offset ?? Math.floor((imageSize - boardPx) / 2);
  const img = createImage(imageSize, imageSize, [BACKGROUND, BACKGROUND, BACKGROUND]);

  for (let row = 0; row < 8; row++) {
    for (let col = 0; col < 8; col++) {
      const x = offset + col * squareSize;
      const y = offset + row * squareSize;
      const shade = isDarkCell(row, col) ? DARK_SQUARE : LIGHT_SQUARE;
      fillRect(img, x, y, x + squareSize, y + squareSize, shade);
      const piece = pieces?.[row][col] ?? null;
      if (piece) drawPiece(img, x, y, squareSize, piece);
    }
  }
  return img;
}

/** 8×8 piece layout from eight 8-character rows: 'W', 'B' or '.' */
export function layout(rows: string[]): Grid<FixturePiece> {
  return rows.map(row =>
    [...row].map((ch): FixturePiece => (ch === 'W' ? 'white' : ch === 'B' ? 'black' : null))
  );
}

/** Grid of uniform squares, for orientation tests */
export function uniformGrid(size: number, value: number): Grid<RawImage> {
  return Array.from({ length: 8 }, () =>
    Array.from({ length: 8 }, () => solidSquare(size, value))
  );
}
