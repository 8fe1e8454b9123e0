import type { FeatureVector, PieceType, TrainingSample } from './types';
import type { ClassModelStore } from './model';
import { extractFeatures, meanFeatures } from './features';

export type RetrainResult =
  | {
      status: 'success';
      samplesProcessed: number;
      distinctLabels: number;
      perLabelCount: Partial<Record<PieceType, number>>;
    }
  | { status: 'failed'; reason: 'EmptyDataset' };

/**
 * Fold labelled square images into the model.
 *
 * Samples are grouped by label and each label's prototype becomes the mean
 * descriptor of this batch, replacing whatever the label held before.
 * Labels absent from the batch keep their earlier prototypes.
 */
export function retrainFromFeedback(
  samples: TrainingSample[],
  model: ClassModelStore,
  now: () => Date = () => new Date()
): RetrainResult {
  if (samples.length === 0) return { status: 'failed', reason: 'EmptyDataset' };

  const byLabel = new Map<PieceType, FeatureVector[]>();
  for (const { image, label } of samples) {
    const group = byLabel.get(label);
    const features = extractFeatures(image);
    if (group) group.push(features);
    else byLabel.set(label, [features]);
  }

  const trainedAt = now().toISOString();
  const perLabelCount: Partial<Record<PieceType, number>> = {};
  for (const [pieceType, vectors] of byLabel) {
    model.merge({ pieceType, features: meanFeatures(vectors), sampleCount: vectors.length, trainedAt });
    perLabelCount[pieceType] = vectors.length;
  }

  return {
    status: 'success',
    samplesProcessed: samples.length,
    distinctLabels: byLabel.size,
    perLabelCount,
  };
}
