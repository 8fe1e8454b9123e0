import { describe, test, expect } from 'vitest';
import {
  ClassModelStore,
  PieceClassifier,
  PLACEMENT_SUFFIX,
  createImage,
  reclassifyWithRegion,
  recognizePosition,
  retrainFromFeedback,
} from '../src/index';
import { DARK_SQUARE, createChessScene, layout, pieceSquare } from './fixtures';

// 640px board of 80px squares at (80, 80) in an 800×800 photo
const BOARD = { x: 80, y: 80, width: 640, height: 640 };

const scene = () =>
  createChessScene({
    imageSize: 800,
    squareSize: 80,
    pieces: layout([
      '.BBBBBB.',
      '........',
      '........',
      '........',
      '........',
      '........',
      '........',
      '.WWWWWW.',
    ]),
  });

describe('Recognition pipeline', () => {
  test('manual region: pieces, orientation and placement', () => {
    const report = reclassifyWithRegion(scene(), BOARD);

    expect(report.detection.detected).toBe(false);
    expect(report.results[0][1].pieceType).toBe('BLACK_PAWN');
    expect(report.results[7][6].pieceType).toBe('WHITE_PAWN');
    expect(report.results[4][4].pieceType).toBe('EMPTY');
    expect(report.features[0][1].centerDarkness).toBe(1);
    // Both corners are dark squares, so piece identity decides
    expect(report.orientation).toEqual({ orientation: 'white', method: 'piece-identity' });
    expect(report.boardResults).toBe(report.results);
    expect(report.placement).toBe('1pppppp1/8/8/8/8/8/8/1PPPPPP1 w KQkq - 0 1');
  });

  test('black at the bottom turns the board before encoding', () => {
    const report = reclassifyWithRegion(scene(), BOARD, { orientation: 'black' });

    expect(report.orientation).toEqual({ orientation: 'black', method: 'manual' });
    expect(report.results[0][1].pieceType).toBe('BLACK_PAWN');
    expect(report.boardResults[7][6].pieceType).toBe('BLACK_PAWN');
    expect(report.placement).toBe('1PPPPPP1/8/8/8/8/8/8/1pppppp1 w KQkq - 0 1');
  });

  test('learned prototypes change the outcome', () => {
    const model = new ClassModelStore();
    retrainFromFeedback([{ image: pieceSquare(80, DARK_SQUARE, 'black'), label: 'BLACK_QUEEN' }], model);

    const report = reclassifyWithRegion(scene(), BOARD, {}, new PieceClassifier({ model }));
    expect(report.results[0][1]).toEqual({ pieceType: 'BLACK_QUEEN', confidence: 0.85, alternatives: [] });
    expect(report.placement).toBe('1qqqqqq1/8/8/8/8/8/8/1PPPPPP1 w KQkq - 0 1');
  });

  test('detected board yields a well-formed placement', () => {
    const report = recognizePosition(scene(), { minSize: 100, boardSize: 640 });
    expect(report).not.toBeNull();
    if (!report) return;
    expect(report.detection.detected).toBe(true);
    expect(report.results).toHaveLength(8);

    const board = report.placement.slice(0, -PLACEMENT_SUFFIX.length);
    expect(report.placement.endsWith(PLACEMENT_SUFFIX)).toBe(true);
    expect(board.split('/')).toHaveLength(8);
    expect([...board].filter(ch => ch === '/')).toHaveLength(7);
  });

  test('no board found → null', () => {
    expect(recognizePosition(createImage(160, 160, [128, 128, 128]))).toBeNull();
  });

  test('fallback treats the whole photo as the board', () => {
    const report = recognizePosition(createImage(160, 160, [128, 128, 128]), {
      fallbackToFullImage: true,
    });
    expect(report).not.toBeNull();
    if (!report) return;
    expect(report.detection.detected).toBe(false);
    expect(report.detection.region).toEqual({ x: 0, y: 0, width: 160, height: 160 });
    expect(report.orientation).toEqual({ orientation: 'white', method: 'default' });
    expect(report.placement).toBe('8/8/8/8/8/8/8/8 w KQkq - 0 1');
  });
});
