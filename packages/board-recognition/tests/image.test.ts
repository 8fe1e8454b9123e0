import { createHash } from 'node:crypto';
import { describe, test, expect } from 'vitest';
import type { RawImage } from '../src/types';
import { createImage, crop, meanSaturation, resize, resizeTo, toGrayscale } from '../src/image';
import { adaptiveThreshold, canny, gaussianBlur, gaussianKernel } from '../src/edges';
import { assertBoardGrid, mapGrid, segmentBoard } from '../src/segment';
import { computeImageHash, correctionKey } from '../src/hash';
import { solidSquare } from './fixtures';

// ============================================================================
// Image utilities
// ============================================================================

describe('Image utilities', () => {
  test('toGrayscale: red pixel → 76', () => {
    const img: RawImage = {
      data: new Uint8ClampedArray([255, 0, 0, 255]),
      width: 1,
      height: 1,
    };
    expect(Math.round(toGrayscale(img).data[0])).toBe(76);
  });

  test('toGrayscale: white pixel → 255', () => {
    const img = createImage(1, 1, [255, 255, 255]);
    expect(Math.round(toGrayscale(img).data[0])).toBe(255);
  });

  test('resize: preserves aspect ratio for non-square', () => {
    const small = resize(createImage(200, 100, [128, 128, 128]), 100);
    expect(small.width).toBe(100);
    expect(small.height).toBe(50);
  });

  test('resize: returns same image if already small', () => {
    const img = createImage(50, 50);
    expect(resize(img, 100)).toBe(img);
  });

  test('resizeTo: exact output size, uniform colour kept', () => {
    const out = resizeTo(createImage(30, 10, [10, 20, 30]), 64, 64);
    expect(out.width).toBe(64);
    expect(out.height).toBe(64);
    expect([...out.data.subarray(0, 4)]).toEqual([10, 20, 30, 255]);
  });

  test('resizeTo: rejects an empty image', () => {
    expect(() => resizeTo(createImage(0, 0), 8, 8)).toThrow('empty');
  });

  test('crop: clamps to image bounds', () => {
    const img = createImage(20, 20);
    const out = crop(img, 15, 15, 10, 10);
    expect(out.width).toBe(5);
    expect(out.height).toBe(5);
  });

  test('crop: copies the requested pixels', () => {
    const img = createImage(4, 4);
    img.data[(2 * 4 + 3) * 4] = 99;
    const out = crop(img, 3, 2, 1, 1);
    expect(out.data[0]).toBe(99);
  });

  test('resizeTo: halving averages each pair of source pixels', () => {
    const img = createImage(4, 1, [0, 0, 0]);
    img.data[4] = 100;
    img.data[12] = 200;
    // reds [0, 100, 0, 200] sample at 0.5 and 2.5
    const out = resizeTo(img, 2, 1);
    expect([out.data[0], out.data[4]]).toEqual([50, 100]);
  });

  test('meanSaturation: pure colour 255, gray 0', () => {
    expect(meanSaturation(createImage(3, 3, [0, 0, 200]))).toBe(255);
    expect(meanSaturation(createImage(3, 3, [90, 90, 90]))).toBe(0);
    expect(meanSaturation(createImage(3, 3, [0, 0, 0]))).toBe(0);
  });
});

// ============================================================================
// Edge detection and thresholding
// ============================================================================

describe('Edge detection', () => {
  test('gaussianKernel derives sigma from its size', () => {
    const k = gaussianKernel(5);
    expect(k).toHaveLength(5);
    expect(k.reduce((s, w) => s + w, 0)).toBeCloseTo(1, 12);
    expect(k[0]).toBeCloseTo(k[4], 12);
    // sigma 1.1 for five taps
    expect(k[1] / k[2]).toBeCloseTo(Math.exp(-1 / (2 * 1.1 * 1.1)), 9);
  });

  test('gaussianKernel rejects an even size', () => {
    expect(() => gaussianKernel(4)).toThrow('positive odd');
  });

  test('gaussianBlur reduces variance', () => {
    const size = 40;
    const data = new Float32Array(size * size);
    for (let i = 0; i < data.length; i++) data[i] = i % 2 === 0 ? 0 : 255;
    const blurred = gaussianBlur({ data, width: size, height: size }, 5);
    const varNoisy = data.reduce((s, v) => s + (v - 128) ** 2, 0);
    const varBlur = blurred.data.reduce((s, v) => s + (v - 128) ** 2, 0);
    expect(varBlur).toBeLessThan(varNoisy);
  });

  test('canny marks a vertical step as a one-pixel line', () => {
    const size = 50;
    const data = new Float32Array(size * size);
    for (let y = 0; y < size; y++)
      for (let x = 0; x < size; x++) data[y * size + x] = x < 25 ? 40 : 200;
    const edges = canny({ data, width: size, height: size });
    for (let y = 0; y < size; y++) {
      const row = [...edges.subarray(y * size, (y + 1) * size)];
      expect(row.flatMap((v, x) => (v ? [x] : []))).toEqual([24]);
    }
  });

  test('canny: a step below the low threshold leaves no edge', () => {
    const size = 20;
    const data = new Float32Array(size * size);
    // |gx| = 4 * 12 = 48, under the default low of 50
    for (let i = 0; i < data.length; i++) data[i] = i % size < 10 ? 100 : 112;
    const edges = canny({ data, width: size, height: size });
    expect(edges.every(v => v === 0)).toBe(true);
  });

  test('canny: flat image has no edges', () => {
    const size = 30;
    const edges = canny({ data: new Float32Array(size * size).fill(128), width: size, height: size });
    expect(edges.reduce((s, v) => s + v, 0)).toBe(0);
  });

  test('adaptiveThreshold: uniform image is all white', () => {
    const size = 20;
    const out = adaptiveThreshold({ data: new Float32Array(size * size).fill(90), width: size, height: size });
    expect(out.every(v => v === 255)).toBe(true);
  });

  test('adaptiveThreshold: the dark side of a step turns black', () => {
    const size = 30;
    const data = new Float32Array(size * size);
    for (let y = 0; y < size; y++)
      for (let x = 0; x < size; x++) data[y * size + x] = x < 15 ? 30 : 220;
    const out = adaptiveThreshold({ data, width: size, height: size });
    expect(out[10 * size + 14]).toBe(0);
    expect(out[10 * size + 15]).toBe(255);
    expect(out[10 * size + 0]).toBe(255);
  });
});

// ============================================================================
// Segmentation
// ============================================================================

describe('Square segmentation', () => {
  test('splits into 8×8 squares, dropping the remainder', () => {
    const grid = segmentBoard(createImage(83, 83));
    expect(grid).toHaveLength(8);
    for (const row of grid) {
      expect(row).toHaveLength(8);
      for (const sq of row) {
        expect(sq.width).toBe(10);
        expect(sq.height).toBe(10);
      }
    }
  });

  test('row 0 is the top of the image', () => {
    const board = createImage(16, 16, [200, 200, 200]);
    board.data[0] = 7;
    const grid = segmentBoard(board);
    expect(grid[0][0].data[0]).toBe(7);
    expect(grid[7][7].data[0]).toBe(200);
  });

  test('rejects a board smaller than 8 pixels', () => {
    expect(() => segmentBoard(createImage(7, 40))).toThrow('too small');
  });

  test('mapGrid passes coordinates', () => {
    const grid = mapGrid(segmentBoard(createImage(8, 8)), (_sq, row, col) => `${row}${col}`);
    expect(grid[2][5]).toBe('25');
  });

  test('assertBoardGrid rejects a ragged grid', () => {
    const grid = Array.from({ length: 8 }, () => Array.from({ length: 8 }, () => 0));
    grid[3].pop();
    expect(() => assertBoardGrid(grid)).toThrow('8x8');
  });
});

// ============================================================================
// Content hash
// ============================================================================

describe('Content hash', () => {
  test('is 64 hex characters', () => {
    expect(computeImageHash(solidSquare(10, 50))).toMatch(/^[0-9a-f]{64}$/);
  });

  test('same content at another resolution hashes alike', () => {
    expect(computeImageHash(solidSquare(100, 120))).toBe(computeImageHash(solidSquare(37, 120)));
  });

  test('different content hashes differently', () => {
    expect(computeImageHash(solidSquare(40, 100))).not.toBe(computeImageHash(solidSquare(40, 101)));
  });

  test('correctionKey without an image uses the no_image marker', () => {
    const expected = createHash('sha256').update('no_image:e4').digest('hex');
    expect(correctionKey(null, 'e4')).toBe(expected);
  });

  test('correctionKey differs per square and per image', () => {
    const hash = computeImageHash(solidSquare(8, 10));
    expect(correctionKey(hash, 'e4')).not.toBe(correctionKey(hash, 'e5'));
    expect(correctionKey(hash, 'e4')).not.toBe(correctionKey(null, 'e4'));
  });
});
