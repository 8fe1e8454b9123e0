import type { Grid, RawImage } from './types';
import { crop } from './image';

export const BOARD_DIM = 8;

/**
 * Split a board image into an 8×8 grid of equal squares.
 *
 * Square size is `floor(height / 8)` × `floor(width / 8)`; any remainder
 * pixels along the right and bottom edges are dropped. `grid[row][col]`,
 * row 0 at the top of the image as captured (not necessarily rank 8).
 */
export function segmentBoard(board: RawImage): Grid<RawImage> {
  const squareH = Math.floor(board.height / BOARD_DIM);
  const squareW = Math.floor(board.width / BOARD_DIM);
  if (squareH === 0 || squareW === 0) {
    throw new Error(
      `Board image ${board.width}x${board.height} is too small to split into ${BOARD_DIM}x${BOARD_DIM}`
    );
  }

  const grid: Grid<RawImage> = [];
  for (let row = 0; row < BOARD_DIM; row++) {
    const squares: RawImage[] = [];
    for (let col = 0; col < BOARD_DIM; col++) {
      squares.push(crop(board, col * squareW, row * squareH, squareW, squareH));
    }
    grid.push(squares);
  }
  return grid;
}

/** Apply `fn` to every cell, keeping the grid shape */
export function mapGrid<T, U>(grid: Grid<T>, fn: (cell: T, row: number, col: number) => U): Grid<U> {
  return grid.map((cells, row) => cells.map((cell, col) => fn(cell, row, col)));
}

/** Throws unless `grid` is exactly 8 rows of 8 */
export function assertBoardGrid<T>(grid: Grid<T>): void {
  if (grid.length !== BOARD_DIM || grid.some(row => row.length !== BOARD_DIM)) {
    throw new Error(
      `Expected an ${BOARD_DIM}x${BOARD_DIM} grid, got ${grid.length} rows of [${grid
        .map(row => row.length)
        .join(', ')}]`
    );
  }
}
