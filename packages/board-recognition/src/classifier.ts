import type {
  FeatureVector,
  Grid,
  PieceColor,
  PieceKind,
  PieceType,
  RankedPiece,
  RawImage,
  RecognitionResult,
} from './types';
import { extractFeatures, featureDistance } from './features';
import { ClassModelStore, pieceColor } from './model';
import { assertBoardGrid, mapGrid } from './segment';
import { squareName } from './orientation';

const PIECES: Record<PieceColor, Record<PieceKind, PieceType>> = {
  white: {
    pawn: 'WHITE_PAWN',
    knight: 'WHITE_KNIGHT',
    bishop: 'WHITE_BISHOP',
    rook: 'WHITE_ROOK',
    queen: 'WHITE_QUEEN',
    king: 'WHITE_KING',
  },
  black: {
    pawn: 'BLACK_PAWN',
    knight: 'BLACK_KNIGHT',
    bishop: 'BLACK_BISHOP',
    rook: 'BLACK_ROOK',
    queen: 'BLACK_QUEEN',
    king: 'BLACK_KING',
  },
};

// ============================================================================
// Emptiness and colour
// ============================================================================

/**
 * Weighted evidence that a square is empty, 0–1. Each rule contributes
 * independently: few edges +0.4, low variance +0.3, light centre +0.3.
 */
export function emptinessScore(features: FeatureVector): number {
  let score = 0;
  if (features.edgeDensity < 0.1) score += 0.4;
  if (features.brightnessVariance < 500) score += 0.3;
  if (features.centerDarkness < 0.3) score += 0.3;
  return Math.min(1, score);
}

export interface ColorEstimate {
  color: PieceColor;
  confidence: number;
}

/** Piece colour from the brightness of the square's centre window */
export function estimateColor(features: FeatureVector): ColorEstimate {
  const b = features.centerBrightness;
  if (b > 150) return { color: 'white', confidence: 0.7 };
  if (b < 100) return { color: 'black', confidence: 0.7 };
  return { color: b > 125 ? 'white' : 'black', confidence: 0.5 };
}

// ============================================================================
// Piece-type estimation
// ============================================================================

export interface TypeEstimate {
  pieceType: PieceType;
  confidence: number;
  /** Other candidates, best first */
  alternatives: RankedPiece[];
}

/** Picks a piece type for an occupied square of known colour */
export interface PieceTypeEstimator {
  readonly name: string;
  estimate(features: FeatureVector, color: PieceColor): TypeEstimate;
}

/**
 * Edge-density bands → pawn / rook / knight / queen at a flat 0.4.
 * A deliberately coarse stand-in until prototypes have been learned.
 */
export class HeuristicTypeEstimator implements PieceTypeEstimator {
  readonly name = 'heuristic';

  estimate(features: FeatureVector, color: PieceColor): TypeEstimate {
    const e = features.edgeDensity;
    let kind: PieceKind;
    if (e < 0.15) kind = 'pawn';
    else if (e < 0.25) kind = 'rook';
    else if (e < 0.35) kind = 'knight';
    else kind = 'queen';
    return { pieceType: PIECES[color][kind], confidence: 0.4, alternatives: [] };
  }
}

/** Nearest learned prototype among the pieces of the estimated colour */
export class PrototypeTypeEstimator implements PieceTypeEstimator {
  readonly name = 'prototype';

  constructor(private readonly model: ClassModelStore) {}

  estimate(features: FeatureVector, color: PieceColor): TypeEstimate {
    const ranked = this.model
      .prototypes()
      .filter(p => pieceColor(p.pieceType) === color)
      .map(p => ({
        pieceType: p.pieceType,
        confidence: 1 / (1 + featureDistance(features, p.features)),
      }))
      .sort((a, b) => b.confidence - a.confidence);

    const [best, ...rest] = ranked;
    if (!best) {
      throw new Error(`No learned prototype for ${color} pieces`);
    }
    return { pieceType: best.pieceType, confidence: best.confidence, alternatives: rest };
  }
}

// ============================================================================
// Classifier
// ============================================================================

export interface ClassifierOptions {
  /** Results below this confidence are reported as Unknown (default 0.5) */
  minConfidence?: number;
  /** Learned prototypes; consulted on every call, so later retraining takes effect */
  model?: ClassModelStore;
  /** Enable debug logging */
  debug?: boolean;
}

export class PieceClassifier {
  readonly minConfidence: number;
  readonly model: ClassModelStore;
  private debugEnabled: boolean;
  private heuristic = new HeuristicTypeEstimator();
  private learned: PrototypeTypeEstimator;

  constructor(options: ClassifierOptions = {}) {
    const { minConfidence = 0.5, model = new ClassModelStore(), debug = false } = options;
    this.minConfidence = minConfidence;
    this.model = model;
    this.debugEnabled = debug;
    this.learned = new PrototypeTypeEstimator(model);
  }

  private debugLog(message: string, payload?: Record<string, unknown>): void {
    if (!this.debugEnabled) return;
    if (payload) {
      console.log('[PieceClassifier][debug]', message, payload);
    } else {
      console.log('[PieceClassifier][debug]', message);
    }
  }

  /** Learned prototypes win for a colour as soon as one exists */
  estimatorFor(color: PieceColor): PieceTypeEstimator {
    return this.model.hasColor(color) ? this.learned : this.heuristic;
  }

  classify(features: FeatureVector, pieceColorHint?: PieceColor): RecognitionResult {
    const empty = emptinessScore(features);
    if (empty > 0.5) {
      return { pieceType: 'EMPTY', confidence: empty, alternatives: [] };
    }

    const color: ColorEstimate = pieceColorHint
      ? { color: pieceColorHint, confidence: 1 }
      : estimateColor(features);
    const estimator = this.estimatorFor(color.color);
    const type = estimator.estimate(features, color.color);
    const confidence = (color.confidence + type.confidence) / 2;

    if (confidence < this.minConfidence) {
      this.debugLog(`Low confidence recognition: ${confidence.toFixed(2)}`, {
        estimator: estimator.name,
        guess: type.pieceType,
        occupancyConfidence: 1 - empty,
      });
      return {
        pieceType: null,
        confidence,
        alternatives: [{ pieceType: type.pieceType, confidence: type.confidence }, ...type.alternatives],
      };
    }

    return { pieceType: type.pieceType, confidence, alternatives: type.alternatives };
  }

  classifySquare(square: RawImage, pieceColorHint?: PieceColor): RecognitionResult {
    return this.classify(extractFeatures(square), pieceColorHint);
  }

  /**
   * Classify all 64 squares independently. No cross-square check is made:
   * two squares may both claim the same unique piece.
   */
  classifyBoard(squares: Grid<RawImage>): Grid<RecognitionResult> {
    assertBoardGrid(squares);
    return this.classifyFeatures(mapGrid(squares, square => extractFeatures(square)));
  }

  /** `classifyBoard` for descriptors that were already extracted */
  classifyFeatures(features: Grid<FeatureVector>): Grid<RecognitionResult> {
    assertBoardGrid(features);
    const results = mapGrid(features, (f, row, col) => {
      const result = this.classify(f);
      this.debugLog(
        `${squareName(row, col, 'white')}: ${result.pieceType ?? 'UNKNOWN'} (${result.confidence.toFixed(2)})`
      );
      return result;
    });
    this.debugLog('Board recognition complete');
    return results;
  }
}
