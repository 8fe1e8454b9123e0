import type { RawImage, GrayImage } from './types';

// ============================================================================
// Construction
// ============================================================================

/** Solid-colour RGBA image */
export function createImage(
  width: number,
  height: number,
  fill: [number, number, number] = [0, 0, 0]
): RawImage {
  const data = new Uint8ClampedArray(width * height * 4);
  for (let i = 0; i < data.length; i += 4) {
    data[i] = fill[0];
    data[i + 1] = fill[1];
    data[i + 2] = fill[2];
    data[i + 3] = 255;
  }
  return { data, width, height };
}

// ============================================================================
// Grayscale conversion
// ============================================================================

/** BT.601 luma, rounded to whole gray levels like an 8-bit conversion */
export function toGrayscale(img: RawImage): GrayImage {
  const { data, width, height } = img;
  const gray = new Float32Array(width * height);
  gray.forEach((_, p) => {
    const i = p * 4;
    gray[p] = Math.round(0.299 * data[i] + 0.587 * data[i + 1] + 0.114 * data[i + 2]);
  });
  return { data: gray, width, height };
}

export function meanBrightness(gray: GrayImage): number {
  const { data } = gray;
  if (data.length === 0) return 0;
  let sum = 0;
  for (const v of data) sum += v;
  return sum / data.length;
}

// ============================================================================
// Resize (bilinear)
// ============================================================================

interface Taps {
  lo: Int32Array;
  hi: Int32Array;
  weight: Float32Array; // share of `hi`
}

// Pixel centres line up: output n samples source (n + 0.5) * src / dst - 0.5
function bilinearTaps(src: number, dst: number): Taps {
  const taps: Taps = {
    lo: new Int32Array(dst),
    hi: new Int32Array(dst),
    weight: new Float32Array(dst),
  };
  const scale = src / dst;
  for (let n = 0; n < dst; n++) {
    const pos = Math.min(Math.max((n + 0.5) * scale - 0.5, 0), src - 1);
    const lo = Math.floor(pos);
    taps.lo[n] = lo;
    taps.hi[n] = Math.min(lo + 1, src - 1);
    taps.weight[n] = pos - lo;
  }
  return taps;
}

function resample(img: RawImage, newW: number, newH: number): RawImage {
  const { data, width } = img;
  const cols = bilinearTaps(img.width, newW);
  const rows = bilinearTaps(img.height, newH);
  const out = new Uint8ClampedArray(newW * newH * 4);

  for (let y = 0; y < newH; y++) {
    const top = rows.lo[y] * width;
    const bottom = rows.hi[y] * width;
    const wy = rows.weight[y];
    for (let x = 0; x < newW; x++) {
      const wx = cols.weight[x];
      const a = (top + cols.lo[x]) * 4;
      const b = (top + cols.hi[x]) * 4;
      const c = (bottom + cols.lo[x]) * 4;
      const d = (bottom + cols.hi[x]) * 4;
      const o = (y * newW + x) * 4;
      for (let ch = 0; ch < 4; ch++) {
        const upper = data[a + ch] + (data[b + ch] - data[a + ch]) * wx;
        const lower = data[c + ch] + (data[d + ch] - data[c + ch]) * wx;
        out[o + ch] = Math.round(upper + (lower - upper) * wy);
      }
    }
  }
  return { data: out, width: newW, height: newH };
}

/** Downscale so neither side exceeds `maxDim`, keeping the aspect ratio */
export function resize(img: RawImage, maxDim: number): RawImage {
  const { width, height } = img;
  if (width <= maxDim && height <= maxDim) return img;

  const scale = Math.min(maxDim / width, maxDim / height);
  return resample(img, Math.round(width * scale), Math.round(height * scale));
}

/** Resample to exactly `width` × `height` */
export function resizeTo(img: RawImage, width: number, height: number): RawImage {
  if (img.width === 0 || img.height === 0) {
    throw new Error(`Cannot resize an empty ${img.width}x${img.height} image`);
  }
  if (img.width === width && img.height === height) return img;
  return resample(img, width, height);
}

// ============================================================================
// Cropping
// ============================================================================

/** Copy a rectangle out of `img`, clamped to the image bounds */
export function crop(img: RawImage, x: number, y: number, w: number, h: number): RawImage {
  const x0 = Math.max(0, Math.min(Math.floor(x), img.width - 1));
  const y0 = Math.max(0, Math.min(Math.floor(y), img.height - 1));
  const x1 = Math.min(x0 + Math.floor(w), img.width);
  const y1 = Math.min(y0 + Math.floor(h), img.height);
  const outW = Math.max(0, x1 - x0);
  const outH = Math.max(0, y1 - y0);

  const out = new Uint8ClampedArray(outW * outH * 4);
  for (let row = 0; row < outH; row++) {
    const start = ((y0 + row) * img.width + x0) * 4;
    out.set(img.data.subarray(start, start + outW * 4), row * outW * 4);
  }
  return { data: out, width: outW, height: outH };
}

// ============================================================================
// Colour statistics
// ============================================================================

/**
 * Mean HSV saturation on a 0–255 scale: `255 * (max - min) / max` per pixel,
 * 0 for black. Gray pixels score 0.
 */
export function meanSaturation(img: RawImage): number {
  const { data, width, height } = img;
  const n = width * height;
  if (n === 0) return 0;
  let sum = 0;
  for (let i = 0; i < data.length; i += 4) {
    const hi = Math.max(data[i], data[i + 1], data[i + 2]);
    if (hi > 0) sum += Math.round((255 * (hi - Math.min(data[i], data[i + 1], data[i + 2]))) / hi);
  }
  return sum / n;
}
