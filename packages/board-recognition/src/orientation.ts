import type {
  Grid,
  Orientation,
  OrientationMode,
  RawImage,
  RecognitionResult,
} from './types';
import { meanBrightness, toGrayscale } from './image';
import { assertBoardGrid, BOARD_DIM } from './segment';

export type OrientationMethod = 'manual' | 'corner-color' | 'piece-identity' | 'default';

export interface OrientationDecision {
  orientation: Orientation;
  method: OrientationMethod;
}

/** Brightness gap (0–255) the corner squares must differ by */
export const CORNER_THRESHOLD = 10;

/** Extra white pieces one edge row needs over the other */
export const PIECE_MARGIN = 2;

const FILES = 'abcdefgh';

// ============================================================================
// Heuristics
// ============================================================================

export function squareBrightness(square: RawImage): number {
  return meanBrightness(toGrayscale(square));
}

/**
 * a1 is a dark square. If the bottom-left square is clearly darker than the
 * top-right one, white sits at the bottom; the reverse means black does.
 */
export function orientationFromCorners(
  squares: Grid<RawImage>,
  threshold = CORNER_THRESHOLD
): Orientation | null {
  const bottomLeft = squareBrightness(squares[BOARD_DIM - 1][0]);
  const topRight = squareBrightness(squares[0][BOARD_DIM - 1]);
  if (bottomLeft < topRight - threshold) return 'white';
  if (topRight < bottomLeft - threshold) return 'black';
  return null;
}

function countWhite(row: RecognitionResult[]): number {
  return row.filter(r => r.pieceType !== null && r.pieceType.startsWith('WHITE_')).length;
}

/** Whichever edge row holds at least two more white pieces is white's side */
export function orientationFromPieces(results: Grid<RecognitionResult>): Orientation | null {
  const bottom = countWhite(results[BOARD_DIM - 1]);
  const top = countWhite(results[0]);
  if (bottom >= top + PIECE_MARGIN) return 'white';
  if (top >= bottom + PIECE_MARGIN) return 'black';
  return null;
}

/**
 * Corner colours first, then piece identity when a classified grid is
 * available. Falls back to white-at-bottom, which is an assumption rather
 * than something detected (`method: 'default'`).
 */
export function detectOrientation(
  squares: Grid<RawImage>,
  results?: Grid<RecognitionResult>,
  threshold = CORNER_THRESHOLD
): OrientationDecision {
  assertBoardGrid(squares);

  const byCorners = orientationFromCorners(squares, threshold);
  if (byCorners) return { orientation: byCorners, method: 'corner-color' };

  if (results) {
    assertBoardGrid(results);
    const byPieces = orientationFromPieces(results);
    if (byPieces) return { orientation: byPieces, method: 'piece-identity' };
  }

  return { orientation: 'white', method: 'default' };
}

/** Honour a manual 'white' / 'black' choice; detect on 'auto' */
export function resolveOrientation(
  mode: OrientationMode,
  squares: Grid<RawImage>,
  results?: Grid<RecognitionResult>
): OrientationDecision {
  if (mode !== 'auto') return { orientation: mode, method: 'manual' };
  return detectOrientation(squares, results);
}

// ============================================================================
// Grid rotation
// ============================================================================

/** Rotate a grid 180°: reverse the rows, then each row. Its own inverse. */
export function flipGrid<T>(grid: Grid<T>): Grid<T> {
  return [...grid].reverse().map(row => [...row].reverse());
}

// ============================================================================
// Square naming
// ============================================================================

/**
 * Algebraic name of the square at `grid[row][col]` for a board seen with
 * `orientation` at the bottom of the image.
 */
export function squareName(row: number, col: number, orientation: Orientation): string {
  if (row < 0 || row >= BOARD_DIM || col < 0 || col >= BOARD_DIM) {
    throw new Error(`Cell (${row}, ${col}) is off the board`);
  }
  return orientation === 'white'
    ? `${FILES[col]}${BOARD_DIM - row}`
    : `${FILES[BOARD_DIM - 1 - col]}${row + 1}`;
}

/** Inverse of `squareName` */
export function squareCell(name: string, orientation: Orientation): { row: number; col: number } {
  const match = /^([a-h])([1-8])$/.exec(name);
  if (!match) throw new Error(`Invalid square name: ${name}`);
  const file = FILES.indexOf(match[1]);
  const rank = Number(match[2]);
  return orientation === 'white'
    ? { row: BOARD_DIM - rank, col: file }
    : { row: rank - 1, col: BOARD_DIM - 1 - file };
}
