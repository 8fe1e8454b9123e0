import type { GrayImage } from './types';

type Border = 'reflect101' | 'replicate';

function borderIndex(i: number, n: number, border: Border): number {
  if (n === 1) return 0;
  if (border === 'replicate') return i < 0 ? 0 : i >= n ? n - 1 : i;
  // reflect101: ...2 1 | 0 1 2 ... n-1 | n-2 n-3...
  while (i < 0 || i >= n) i = i < 0 ? -i : 2 * n - 2 - i;
  return i;
}

// ============================================================================
// Gaussian smoothing
// ============================================================================

/**
 * Normalised 1-D Gaussian of `ksize` taps. A non-positive `sigma` is derived
 * from the size as `0.3 * ((ksize - 1) / 2 - 1) + 0.8`, so 5 taps get 1.1
 * and 11 taps get 2.
 */
export function gaussianKernel(ksize: number, sigma = 0): Float64Array {
  if (ksize < 1 || ksize % 2 === 0) {
    throw new Error(`Gaussian kernel size must be a positive odd number, got ${ksize}`);
  }
  const s = sigma > 0 ? sigma : 0.3 * ((ksize - 1) / 2 - 1) + 0.8;
  const half = (ksize - 1) / 2;
  const kernel = new Float64Array(ksize);
  let sum = 0;
  for (let k = -half; k <= half; k++) {
    sum += kernel[k + half] = Math.exp(-(k * k) / (2 * s * s));
  }
  return kernel.map(w => w / sum);
}

/** Convolve rows, then columns, with the same symmetric kernel */
function separable(gray: GrayImage, kernel: Float64Array, border: Border): GrayImage {
  const { data, width, height } = gray;
  const half = (kernel.length - 1) / 2;
  const rows = new Float32Array(data.length);
  const out = new Float32Array(data.length);

  for (let y = 0; y < height; y++) {
    const line = y * width;
    for (let x = 0; x < width; x++) {
      let acc = 0;
      kernel.forEach((w, k) => {
        acc += w * data[line + borderIndex(x + k - half, width, border)];
      });
      rows[line + x] = acc;
    }
  }
  for (let x = 0; x < width; x++) {
    for (let y = 0; y < height; y++) {
      let acc = 0;
      kernel.forEach((w, k) => {
        acc += w * rows[borderIndex(y + k - half, height, border) * width + x];
      });
      out[y * width + x] = acc;
    }
  }
  return { data: out, width, height };
}

/** Gaussian blur with a `ksize`×`ksize` kernel, mirrored (reflect-101) at the borders */
export function gaussianBlur(gray: GrayImage, ksize: number, sigma = 0): GrayImage {
  return separable(gray, gaussianKernel(ksize, sigma), 'reflect101');
}

// ============================================================================
// Adaptive threshold
// ============================================================================

/**
 * Binary threshold against the Gaussian-weighted mean of each pixel's
 * `blockSize`×`blockSize` neighbourhood: 255 where `pixel > mean - offset`,
 * else 0. Uniform areas come out white and the darker side of every
 * contrast edge comes out black.
 */
export function adaptiveThreshold(gray: GrayImage, blockSize = 11, offset = 2): Uint8Array {
  const local = separable(gray, gaussianKernel(blockSize), 'replicate');
  return Uint8Array.from(gray.data, (v, i) => (v > local.data[i] - offset ? 255 : 0));
}

// ============================================================================
// Canny
// ============================================================================

const TAN_22_5 = Math.tan(Math.PI / 8);

/**
 * Canny edge map (255 = edge) on the image as given, without smoothing.
 *
 * 3×3 Sobel derivatives with replicated borders, L1 magnitude
 * `|gx| + |gy|`, non-maximum suppression in four directions, then
 * hysteresis: pixels above `high` seed edges that grow through
 * 8-connected pixels above `low`. Ties along the gradient keep only the
 * first pixel, so a step edge comes out one pixel wide.
 */
export function canny(gray: GrayImage, low = 50, high = 150): Uint8Array {
  const { data, width, height } = gray;
  const n = width * height;
  const gx = new Float32Array(n);
  const gy = new Float32Array(n);
  const mag = new Float32Array(n);

  const at = (x: number, y: number) =>
    data[borderIndex(y, height, 'replicate') * width + borderIndex(x, width, 'replicate')];

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = y * width + x;
      gx[i] =
        at(x + 1, y - 1) + 2 * at(x + 1, y) + at(x + 1, y + 1) -
        (at(x - 1, y - 1) + 2 * at(x - 1, y) + at(x - 1, y + 1));
      gy[i] =
        at(x - 1, y + 1) + 2 * at(x, y + 1) + at(x + 1, y + 1) -
        (at(x - 1, y - 1) + 2 * at(x, y - 1) + at(x + 1, y - 1));
      mag[i] = Math.abs(gx[i]) + Math.abs(gy[i]);
    }
  }

  // Magnitude outside the image counts as 0
  const m = (x: number, y: number) =>
    x < 0 || x >= width || y < 0 || y >= height ? 0 : mag[y * width + x];

  // 0 = suppressed, 1 = weak, 2 = strong
  const state = new Uint8Array(n);
  const stack: number[] = [];
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = y * width + x;
      const v = mag[i];
      if (v <= low) continue;

      const ax = Math.abs(gx[i]);
      const ay = Math.abs(gy[i]);
      let isMax: boolean;
      if (ay < ax * TAN_22_5) {
        isMax = v > m(x - 1, y) && v >= m(x + 1, y);
      } else if (ay * TAN_22_5 > ax) {
        isMax = v > m(x, y - 1) && v >= m(x, y + 1);
      } else {
        const s = gx[i] < 0 !== gy[i] < 0 ? -1 : 1;
        isMax = v > m(x - s, y - 1) && v > m(x + s, y + 1);
      }
      if (!isMax) continue;

      state[i] = v > high ? 2 : 1;
      if (state[i] === 2) stack.push(i);
    }
  }

  let i: number | undefined;
  while ((i = stack.pop()) !== undefined) {
    const x = i % width;
    const y = (i - x) / width;
    for (let dy = -1; dy <= 1; dy++) {
      for (let dx = -1; dx <= 1; dx++) {
        const nx = x + dx;
        const ny = y + dy;
        if (nx < 0 || nx >= width || ny < 0 || ny >= height) continue;
        const j = ny * width + nx;
        if (state[j] !== 1) continue;
        state[j] = 2;
        stack.push(j);
      }
    }
  }

  return state.map(s => (s === 2 ? 255 : 0));
}
