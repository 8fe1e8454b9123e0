import { z } from 'zod';
import { PIECE_TYPES } from './types';
import type { ClassPrototype, PieceColor, PieceType } from './types';

// ============================================================================
// Snapshot schema
// ============================================================================

const featureVectorSchema = z.object({
  avgBrightness: z.number(),
  brightnessVariance: z.number(),
  edgeDensity: z.number(),
  darkPixelRatio: z.number(),
  avgSaturation: z.number(),
  centerDarkness: z.number(),
  centerBrightness: z.number(),
});

const prototypeSchema = z.object({
  pieceType: z.enum(PIECE_TYPES),
  features: featureVectorSchema,
  sampleCount: z.number().int().positive(),
  trainedAt: z.string(),
});

const snapshotSchema = z.object({
  version: z.literal(1),
  prototypes: z.array(prototypeSchema),
});

export type ModelSnapshot = z.infer<typeof snapshotSchema>;

export function pieceColor(type: PieceType): PieceColor | null {
  if (type === 'EMPTY') return null;
  return type.startsWith('WHITE_') ? 'white' : 'black';
}

// ============================================================================
// Store
// ============================================================================

/**
 * Learned per-piece-type prototypes.
 *
 * Only retraining writes here (`merge`); entries persist across retraining
 * calls until `reset()`.
 */
export class ClassModelStore {
  private entries = new Map<PieceType, ClassPrototype>();

  get size(): number {
    return this.entries.size;
  }

  get(type: PieceType): ClassPrototype | undefined {
    return this.entries.get(type);
  }

  has(type: PieceType): boolean {
    return this.entries.has(type);
  }

  /** Whether any prototype exists for a piece of `color` */
  hasColor(color: PieceColor): boolean {
    for (const type of this.entries.keys()) {
      if (pieceColor(type) === color) return true;
    }
    return false;
  }

  prototypes(): ClassPrototype[] {
    return [...this.entries.values()];
  }

  pieceTypes(): PieceType[] {
    return [...this.entries.keys()];
  }

  /** Insert a prototype, replacing any existing one for the same type */
  merge(prototype: ClassPrototype): void {
    this.entries.set(prototype.pieceType, prototype);
  }

  reset(): void {
    this.entries.clear();
  }

  statistics(): {
    trained: boolean;
    pieceTypes: PieceType[];
    numPieceTypes: number;
    totalSamples: number;
  } {
    const pieceTypes = this.pieceTypes();
    return {
      trained: pieceTypes.length > 0,
      pieceTypes,
      numPieceTypes: pieceTypes.length,
      totalSamples: this.prototypes().reduce((s, p) => s + p.sampleCount, 0),
    };
  }

  toSnapshot(): ModelSnapshot {
    return { version: 1, prototypes: this.prototypes() };
  }

  /** Rebuild a store from `toSnapshot()` output; throws on a malformed snapshot */
  static fromSnapshot(json: unknown): ClassModelStore {
    const snapshot = snapshotSchema.parse(json);
    const store = new ClassModelStore();
    for (const p of snapshot.prototypes) store.merge(p);
    return store;
  }
}
