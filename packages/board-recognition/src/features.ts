import type { FeatureVector, RawImage } from './types';
import { meanSaturation, toGrayscale } from './image';
import { canny } from './edges';

/** Gray level below which a pixel counts as dark */
export const DARK_THRESHOLD = 100;

/**
 * Compute the descriptor of one square image.
 *
 * The centre window is `[h/4, 3h/4) × [w/4, 3w/4)` (integer division), which
 * is where a piece sits on a well-cropped square.
 */
export function extractFeatures(square: RawImage): FeatureVector {
  const gray = toGrayscale(square);
  const { data, width, height } = gray;
  const n = data.length;
  if (n === 0) throw new Error('Cannot extract features from an empty square image');

  let sum = 0,
    sumSq = 0,
    dark = 0;
  for (const v of data) {
    sum += v;
    sumSq += v * v;
    if (v < DARK_THRESHOLD) dark++;
  }
  const avgBrightness = sum / n;
  const brightnessVariance = Math.max(0, sumSq / n - avgBrightness * avgBrightness);

  const edges = canny(gray, 50, 150);
  let edgeCount = 0;
  for (const e of edges) if (e) edgeCount++;

  const y0 = Math.floor(height / 4);
  const y1 = Math.floor((3 * height) / 4);
  const x0 = Math.floor(width / 4);
  const x1 = Math.floor((3 * width) / 4);
  let centerSum = 0,
    centerDark = 0,
    centerCount = 0;
  for (let y = y0; y < y1; y++) {
    for (let x = x0; x < x1; x++) {
      const v = data[y * width + x];
      centerSum += v;
      if (v < DARK_THRESHOLD) centerDark++;
      centerCount++;
    }
  }

  return {
    avgBrightness,
    brightnessVariance,
    edgeDensity: edgeCount / n,
    darkPixelRatio: dark / n,
    avgSaturation: meanSaturation(square),
    centerDarkness: centerCount > 0 ? centerDark / centerCount : 0,
    centerBrightness: centerCount > 0 ? centerSum / centerCount : avgBrightness,
  };
}

// Per-feature scale bringing each component into roughly 0–1
const FEATURE_SCALE: Record<keyof FeatureVector, number> = {
  avgBrightness: 255,
  brightnessVariance: 127.5 * 127.5,
  edgeDensity: 1,
  darkPixelRatio: 1,
  avgSaturation: 255,
  centerDarkness: 1,
  centerBrightness: 255,
};

const FEATURE_KEYS: ReadonlyArray<keyof FeatureVector> = [
  'avgBrightness',
  'brightnessVariance',
  'edgeDensity',
  'darkPixelRatio',
  'avgSaturation',
  'centerDarkness',
  'centerBrightness',
];

/** Euclidean distance between two descriptors after normalisation */
export function featureDistance(a: FeatureVector, b: FeatureVector): number {
  let sq = 0;
  for (const key of FEATURE_KEYS) {
    const d = (a[key] - b[key]) / FEATURE_SCALE[key];
    sq += d * d;
  }
  return Math.sqrt(sq);
}

/** Component-wise mean of a non-empty list of descriptors */
export function meanFeatures(vectors: FeatureVector[]): FeatureVector {
  if (vectors.length === 0) throw new Error('meanFeatures needs at least one vector');
  const out: FeatureVector = {
    avgBrightness: 0,
    brightnessVariance: 0,
    edgeDensity: 0,
    darkPixelRatio: 0,
    avgSaturation: 0,
    centerDarkness: 0,
    centerBrightness: 0,
  };
  for (const v of vectors) {
    for (const key of FEATURE_KEYS) out[key] += v[key];
  }
  for (const key of FEATURE_KEYS) out[key] /= vectors.length;
  return out;
}
