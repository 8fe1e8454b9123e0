import { PIECE_SYMBOLS } from './types';
import type { Grid, RecognitionResult } from './types';
import { assertBoardGrid } from './segment';

/**
 * Side to move, castling rights, en passant and move counters. A fixed
 * placeholder: nothing here is inferred from the image.
 */
export const PLACEMENT_SUFFIX = ' w KQkq - 0 1';

/**
 * Build a FEN-style placement string from a classified grid, top row first.
 * Empty and Unknown squares are run-length counted. Legality is not checked.
 */
export function buildPlacement(grid: Grid<RecognitionResult>): string {
  assertBoardGrid(grid);

  const rows = grid.map(row => {
    let out = '';
    let empty = 0;
    for (const { pieceType } of row) {
      if (pieceType === null || pieceType === 'EMPTY') {
        empty++;
        continue;
      }
      if (empty > 0) {
        out += String(empty);
        empty = 0;
      }
      out += PIECE_SYMBOLS[pieceType];
    }
    if (empty > 0) out += String(empty);
    return out;
  });

  return rows.join('/') + PLACEMENT_SUFFIX;
}
