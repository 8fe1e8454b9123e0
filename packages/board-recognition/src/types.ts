// ============================================================================
// Core types for chess board recognition
// ============================================================================

/** Raw RGBA image */
export interface RawImage {
  data: Uint8ClampedArray;
  width: number;
  height: number;
}

/** Grayscale image as float array (0-255 range) */
export interface GrayImage {
  data: Float32Array;
  width: number;
  height: number;
}

/** Binary mask (0 / 255) */
export interface BinaryImage {
  data: Uint8Array;
  width: number;
  height: number;
}

/** Axis-aligned rectangle in source image pixels */
export interface Region {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** A contour found in the thresholded image, with its filled area */
export interface BoardCandidate extends Region {
  area: number;
}

/** 8×8 grid indexed `grid[row][col]`; row 0 is the top of the image as captured */
export type Grid<T> = T[][];

export type PieceColor = 'white' | 'black';

/** Which side of the board faces the camera (sits at the bottom of the image) */
export type Orientation = 'white' | 'black';

export type OrientationMode = Orientation | 'auto';

export const PIECE_TYPES = [
  'WHITE_PAWN',
  'WHITE_KNIGHT',
  'WHITE_BISHOP',
  'WHITE_ROOK',
  'WHITE_QUEEN',
  'WHITE_KING',
  'BLACK_PAWN',
  'BLACK_KNIGHT',
  'BLACK_BISHOP',
  'BLACK_ROOK',
  'BLACK_QUEEN',
  'BLACK_KING',
  'EMPTY',
] as const;

export type PieceType = (typeof PIECE_TYPES)[number];

export type PieceKind = 'pawn' | 'knight' | 'bishop' | 'rook' | 'queen' | 'king';

/** Placement symbol per piece type ('.' for an empty square) */
export const PIECE_SYMBOLS: Record<PieceType, string> = {
  WHITE_PAWN: 'P',
  WHITE_KNIGHT: 'N',
  WHITE_BISHOP: 'B',
  WHITE_ROOK: 'R',
  WHITE_QUEEN: 'Q',
  WHITE_KING: 'K',
  BLACK_PAWN: 'p',
  BLACK_KNIGHT: 'n',
  BLACK_BISHOP: 'b',
  BLACK_ROOK: 'r',
  BLACK_QUEEN: 'q',
  BLACK_KING: 'k',
  EMPTY: '.',
};

/** Descriptor computed from one square image */
export interface FeatureVector {
  avgBrightness: number;
  brightnessVariance: number;
  edgeDensity: number;
  darkPixelRatio: number;
  avgSaturation: number;
  centerDarkness: number;
  centerBrightness: number;
}

export interface RankedPiece {
  pieceType: PieceType;
  confidence: number;
}

/** Classification of one square. `pieceType: null` means Unknown. */
export interface RecognitionResult {
  pieceType: PieceType | null;
  confidence: number;
  alternatives: RankedPiece[];
}

/** Learned aggregate descriptor for one piece type */
export interface ClassPrototype {
  pieceType: PieceType;
  features: FeatureVector;
  sampleCount: number;
  trainedAt: string;
}

/** A labelled square image fed to retraining */
export interface TrainingSample {
  image: RawImage;
  label: PieceType;
}

/**
 * One human correction, as held in memory. Immutable apart from `isActive`,
 * which a later record with the same `uniqueKey` switches off.
 */
export interface CorrectionRecord {
  readonly squareName: string;
  readonly originalPrediction: PieceType | null;
  readonly originalConfidence: number;
  readonly userCorrection: PieceType;
  readonly timestamp: string;
  readonly squareImagePath: string | null;
  readonly boardOrientation: Orientation | null;
  readonly sessionId: string | null;
  readonly imageHash: string | null;
  readonly uniqueKey: string;
  isActive: boolean;
}

/** Options for board location */
export interface LocatorOptions {
  minSize?: number; // minimum board edge in pixels (default 200)
  maxSize?: number; // maximum board edge in pixels (default 2000)
  minAspect?: number; // exclusive lower bound on width/height (default 0.8)
  maxAspect?: number; // exclusive upper bound on width/height (default 1.2)
  blurKernel?: number; // odd side of the pre-threshold Gaussian (default 5, sigma 1.1)
  thresholdBlockSize?: number; // odd side of the adaptive-threshold neighbourhood (default 11, sigma 2)
  thresholdOffset?: number; // constant subtracted from the local mean (default 2)
  processingSize?: number; // longest side the search runs at (default 1000)
}

/** Options for the full recognition pipeline */
export interface RecognitionOptions extends LocatorOptions {
  boardSize?: number; // size of the resampled square board image (default 800)
  orientation?: OrientationMode; // default 'auto'
  /** Use the whole image as the board when detection finds nothing. */
  fallbackToFullImage?: boolean;
  /** Board rectangle supplied by the user; skips detection. */
  manualRegion?: Region;
}
