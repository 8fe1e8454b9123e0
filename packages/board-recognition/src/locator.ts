import type {
  BinaryImage,
  BoardCandidate,
  Grid,
  LocatorOptions,
  RawImage,
  Region,
} from './types';
import { crop, resize, resizeTo, toGrayscale } from './image';
import { adaptiveThreshold, gaussianBlur } from './edges';
import { segmentBoard } from './segment';

// ============================================================================
// Preprocessing
// ============================================================================

/** Grayscale → Gaussian blur → adaptive threshold */
export function preprocessImage(img: RawImage, opts: LocatorOptions = {}): BinaryImage {
  const { blurKernel = 5, thresholdBlockSize = 11, thresholdOffset = 2 } = opts;
  const blurred = gaussianBlur(toGrayscale(img), blurKernel);
  return {
    data: adaptiveThreshold(blurred, thresholdBlockSize, thresholdOffset),
    width: img.width,
    height: img.height,
  };
}

// ============================================================================
// Contour extraction
// ============================================================================

const NEIGHBOURS_8: Array<[number, number]> = [
  [-1, -1],
  [0, -1],
  [1, -1],
  [-1, 0],
  [1, 0],
  [-1, 1],
  [0, 1],
  [1, 1],
];

/**
 * Area enclosed by component `label` inside its bounding box: the box minus
 * every non-component pixel reachable from the box border (4-connected).
 */
function filledArea(labels: Int32Array, width: number, label: number, box: Region): number {
  const { x: bx, y: by, width: bw, height: bh } = box;
  const outside = new Uint8Array(bw * bh);
  const stack: number[] = [];

  const seed = (lx: number, ly: number) => {
    const li = ly * bw + lx;
    if (outside[li] || labels[(by + ly) * width + (bx + lx)] === label) return;
    outside[li] = 1;
    stack.push(li);
  };

  for (let lx = 0; lx < bw; lx++) {
    seed(lx, 0);
    seed(lx, bh - 1);
  }
  for (let ly = 0; ly < bh; ly++) {
    seed(0, ly);
    seed(bw - 1, ly);
  }

  let outsideCount = stack.length;
  let li: number | undefined;
  while ((li = stack.pop()) !== undefined) {
    const lx = li % bw;
    const ly = Math.floor(li / bw);
    const before = stack.length;
    if (lx > 0) seed(lx - 1, ly);
    if (lx < bw - 1) seed(lx + 1, ly);
    if (ly > 0) seed(lx, ly - 1);
    if (ly < bh - 1) seed(lx, ly + 1);
    outsideCount += stack.length - before;
  }

  return bw * bh - outsideCount;
}

/**
 * Extract every contour from a thresholded image.
 *
 * A contour is an 8-connected component of dark (0) pixels. Its rectangle
 * is the component's bounding box and its area is the filled area, i.e.
 * the component plus everything it encloses.
 */
export function findBoardCandidates(binary: BinaryImage): BoardCandidate[] {
  const { data, width, height } = binary;
  const labels = new Int32Array(width * height);
  const candidates: BoardCandidate[] = [];
  let next = 0;

  for (let start = 0; start < data.length; start++) {
    if (data[start] !== 0 || labels[start] !== 0) continue;

    const label = ++next;
    let minX = width,
      minY = height,
      maxX = -1,
      maxY = -1;

    labels[start] = label;
    const stack = [start];
    let idx: number | undefined;
    while ((idx = stack.pop()) !== undefined) {
      const x = idx % width;
      const y = Math.floor(idx / width);
      if (x < minX) minX = x;
      if (x > maxX) maxX = x;
      if (y < minY) minY = y;
      if (y > maxY) maxY = y;

      for (const [dx, dy] of NEIGHBOURS_8) {
        const nx = x + dx;
        const ny = y + dy;
        if (nx < 0 || nx >= width || ny < 0 || ny >= height) continue;
        const ni = ny * width + nx;
        if (data[ni] === 0 && labels[ni] === 0) {
          labels[ni] = label;
          stack.push(ni);
        }
      }
    }

    const box: Region = { x: minX, y: minY, width: maxX - minX + 1, height: maxY - minY + 1 };
    candidates.push({ ...box, area: filledArea(labels, width, label, box) });
  }

  return candidates;
}

// ============================================================================
// Board location
// ============================================================================

export interface BoardSearch {
  /** Thresholded image the search ran on (at processing resolution) */
  binary: BinaryImage;
  /** Every contour, in processing-resolution pixels */
  candidates: BoardCandidate[];
  /** Source pixels per processing pixel */
  scale: number;
  /** Winning rectangle in source pixels, or null */
  region: Region | null;
}

/**
 * Run the full board search and keep every intermediate stage.
 *
 * Contours are kept when their filled area lies strictly between `minSize²`
 * and `maxSize²` and their width/height ratio strictly between `minAspect`
 * and `maxAspect`; the largest survivor wins.
 */
export function searchBoard(img: RawImage, opts: LocatorOptions = {}): BoardSearch {
  const {
    minSize = 200,
    maxSize = 2000,
    minAspect = 0.8,
    maxAspect = 1.2,
    processingSize = 1000,
  } = opts;

  // Large photos are searched at reduced resolution; areas scale back up
  const processImg = resize(img, processingSize);
  const scale = img.width / processImg.width;

  const binary = preprocessImage(processImg, opts);
  const candidates = findBoardCandidates(binary);

  let best: BoardCandidate | null = null;
  for (const c of candidates) {
    const area = c.area * scale * scale;
    if (area <= minSize * minSize || area >= maxSize * maxSize) continue;
    const aspect = c.width / c.height;
    if (aspect <= minAspect || aspect >= maxAspect) continue;
    if (!best || c.area > best.area) best = c;
  }

  const region = best
    ? {
        x: Math.round(best.x * scale),
        y: Math.round(best.y * scale),
        width: Math.round(best.width * scale),
        height: Math.round(best.height * scale),
      }
    : null;
  return { binary, candidates, scale, region };
}

/**
 * Find the chess board's bounding rectangle in a raw photo. Returns null
 * when no contour passes the size and aspect filters, in which case the
 * caller supplies a region by hand.
 */
export function locateBoard(img: RawImage, opts: LocatorOptions = {}): Region | null {
  return searchBoard(img, opts).region;
}

// ============================================================================
// Board extraction
// ============================================================================

export interface BoardDetection {
  region: Region;
  /** false when the region was supplied by the caller */
  detected: boolean;
  /** The search stages; null when a manual region skipped the search */
  search: BoardSearch | null;
  boardImage: RawImage;
  squares: Grid<RawImage>;
}

/** Treat `region` as the board, segmenting it at its own size */
export function boardFromRegion(img: RawImage, region: Region): BoardDetection {
  const boardImage = extractBoardRegion(img, region);
  return { region, detected: false, search: null, boardImage, squares: segmentBoard(boardImage) };
}

/** Crop `region` out of the image, clamped to its bounds */
export function extractBoardRegion(img: RawImage, region: Region): RawImage {
  return crop(img, region.x, region.y, region.width, region.height);
}

/**
 * Locate, crop and segment the board.
 *
 * A `manualRegion` bypasses detection and is segmented at its own size;
 * a detected board is resampled to `boardSize`² first. Returns null when
 * detection fails and no region was given.
 */
export function detectBoard(
  img: RawImage,
  opts: LocatorOptions & { manualRegion?: Region; boardSize?: number } = {}
): BoardDetection | null {
  const { manualRegion, boardSize = 800 } = opts;

  if (manualRegion) return boardFromRegion(img, manualRegion);

  const search = searchBoard(img, opts);
  const { region } = search;
  if (!region) return null;

  const boardImage = resizeTo(extractBoardRegion(img, region), boardSize, boardSize);
  return { region, detected: true, search, boardImage, squares: segmentBoard(boardImage) };
}
