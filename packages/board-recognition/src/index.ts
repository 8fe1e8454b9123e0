// ============================================================================
// @chess-vision/board-recognition – public API
// ============================================================================

export type {
  RawImage,
  GrayImage,
  BinaryImage,
  Region,
  BoardCandidate,
  Grid,
  PieceColor,
  PieceKind,
  PieceType,
  Orientation,
  OrientationMode,
  FeatureVector,
  RankedPiece,
  RecognitionResult,
  ClassPrototype,
  TrainingSample,
  CorrectionRecord,
  LocatorOptions,
  RecognitionOptions,
} from './types';
export { PIECE_TYPES, PIECE_SYMBOLS } from './types';

import type {
  FeatureVector,
  Grid,
  RawImage,
  RecognitionOptions,
  RecognitionResult,
  Region,
} from './types';
import { boardFromRegion, detectBoard } from './locator';
import type { BoardDetection } from './locator';
import { extractFeatures } from './features';
import { PieceClassifier } from './classifier';
import { flipGrid, resolveOrientation } from './orientation';
import type { OrientationDecision } from './orientation';
import { buildPlacement } from './placement';
import { mapGrid } from './segment';

export { createImage, toGrayscale, resize, resizeTo, crop, meanSaturation } from './image';
export {
  preprocessImage,
  findBoardCandidates,
  searchBoard,
  locateBoard,
  extractBoardRegion,
  boardFromRegion,
  detectBoard,
} from './locator';
export type { BoardSearch, BoardDetection } from './locator';
export { segmentBoard, mapGrid, BOARD_DIM } from './segment';
export { extractFeatures, featureDistance, meanFeatures } from './features';
export {
  PieceClassifier,
  HeuristicTypeEstimator,
  PrototypeTypeEstimator,
  emptinessScore,
  estimateColor,
} from './classifier';
export type { ClassifierOptions, PieceTypeEstimator, TypeEstimate } from './classifier';
export {
  detectOrientation,
  resolveOrientation,
  flipGrid,
  squareName,
  squareCell,
} from './orientation';
export type { OrientationDecision, OrientationMethod } from './orientation';
export { buildPlacement, PLACEMENT_SUFFIX } from './placement';
export { ClassModelStore, pieceColor } from './model';
export type { ModelSnapshot } from './model';
export { retrainFromFeedback } from './retrain';
export type { RetrainResult } from './retrain';
export { computeImageHash, correctionKey } from './hash';
export { readPng, writePng } from './image-io';
export { FeedbackStore, generateSessionId, SQUARE_IMAGE_DIR } from './feedback';
export type {
  FeedbackStoreOptions,
  CorrectionInput,
  CorrectionStatistics,
  SessionSummary,
} from './feedback';

// ============================================================================
// Main entry point
// ============================================================================

/** Every stage of one recognition run */
export interface RecognitionReport {
  detection: BoardDetection;
  features: Grid<FeatureVector>;
  /** Per-square results as captured (row 0 = top of the image) */
  results: Grid<RecognitionResult>;
  orientation: OrientationDecision;
  /** `results` turned so that white sits at the bottom */
  boardResults: Grid<RecognitionResult>;
  /** Placement string; the suffix after the board is a fixed placeholder */
  placement: string;
}

function runPipeline(
  detection: BoardDetection,
  classifier: PieceClassifier,
  options: RecognitionOptions
): RecognitionReport {
  const { orientation: mode = 'auto' } = options;

  const features = mapGrid(detection.squares, square => extractFeatures(square));
  const results = classifier.classifyFeatures(features);
  const orientation = resolveOrientation(mode, detection.squares, results);
  const boardResults = orientation.orientation === 'black' ? flipGrid(results) : results;

  return {
    detection,
    features,
    results,
    orientation,
    boardResults,
    placement: buildPlacement(boardResults),
  };
}

/**
 * Recognise a chess position from a raw RGBA photo.
 *
 * Returns null when no board is found and neither `manualRegion` nor
 * `fallbackToFullImage` gives one; the caller should then ask the user for
 * a rectangle and call `reclassifyWithRegion`.
 */
export function recognizePosition(
  img: RawImage,
  options: RecognitionOptions = {},
  classifier: PieceClassifier = new PieceClassifier()
): RecognitionReport | null {
  const { fallbackToFullImage = false } = options;

  let detection = detectBoard(img, options);
  if (!detection && fallbackToFullImage) {
    detection = detectBoard(img, {
      ...options,
      manualRegion: { x: 0, y: 0, width: img.width, height: img.height },
    });
  }
  if (!detection) return null;

  return runPipeline(detection, classifier, options);
}

/** Re-run recognition on a user-supplied board rectangle */
export function reclassifyWithRegion(
  img: RawImage,
  region: Region,
  options: RecognitionOptions = {},
  classifier: PieceClassifier = new PieceClassifier()
): RecognitionReport {
  return runPipeline(boardFromRegion(img, region), classifier, options);
}
