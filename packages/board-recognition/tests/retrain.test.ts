import { describe, test, expect } from 'vitest';
import type { TrainingSample } from '../src/types';
import { extractFeatures, meanFeatures } from '../src/features';
import { ClassModelStore, pieceColor } from '../src/model';
import { retrainFromFeedback } from '../src/retrain';
import { LIGHT_SQUARE, pieceSquare, solidSquare } from './fixtures';

const fixedNow = () => new Date('2024-05-01T12:00:00.000Z');

describe('Retraining', () => {
  test('empty dataset fails', () => {
    const model = new ClassModelStore();
    expect(retrainFromFeedback([], model)).toEqual({ status: 'failed', reason: 'EmptyDataset' });
    expect(model.size).toBe(0);
  });

  test('counts samples per label', () => {
    const samples: TrainingSample[] = [
      { image: pieceSquare(40, LIGHT_SQUARE, 'black'), label: 'BLACK_KNIGHT' },
      { image: pieceSquare(40, 180, 'black'), label: 'BLACK_KNIGHT' },
      { image: solidSquare(40, LIGHT_SQUARE), label: 'EMPTY' },
    ];
    const result = retrainFromFeedback(samples, new ClassModelStore(), fixedNow);
    expect(result).toEqual({
      status: 'success',
      samplesProcessed: 3,
      distinctLabels: 2,
      perLabelCount: { BLACK_KNIGHT: 2, EMPTY: 1 },
    });
  });

  test('each prototype is the mean descriptor of its label', () => {
    const a = pieceSquare(40, LIGHT_SQUARE, 'black');
    const b = pieceSquare(40, 180, 'black');
    const model = new ClassModelStore();
    retrainFromFeedback(
      [
        { image: a, label: 'BLACK_KNIGHT' },
        { image: b, label: 'BLACK_KNIGHT' },
      ],
      model,
      fixedNow
    );
    expect(model.get('BLACK_KNIGHT')).toEqual({
      pieceType: 'BLACK_KNIGHT',
      features: meanFeatures([extractFeatures(a), extractFeatures(b)]),
      sampleCount: 2,
      trainedAt: '2024-05-01T12:00:00.000Z',
    });
  });

  test('a later batch replaces its labels and keeps the rest', () => {
    const model = new ClassModelStore();
    retrainFromFeedback(
      [
        { image: pieceSquare(40, LIGHT_SQUARE, 'black'), label: 'BLACK_KNIGHT' },
        { image: pieceSquare(40, 180, 'black'), label: 'BLACK_KNIGHT' },
        { image: pieceSquare(40, 90, 'white'), label: 'WHITE_KING' },
      ],
      model
    );
    retrainFromFeedback([{ image: pieceSquare(40, 200, 'black'), label: 'BLACK_KNIGHT' }], model);

    expect(model.get('BLACK_KNIGHT')?.sampleCount).toBe(1);
    expect(model.get('WHITE_KING')?.sampleCount).toBe(1);
    expect(model.statistics()).toEqual({
      trained: true,
      pieceTypes: ['BLACK_KNIGHT', 'WHITE_KING'],
      numPieceTypes: 2,
      totalSamples: 2,
    });
  });
});

describe('ClassModelStore', () => {
  test('untrained statistics', () => {
    expect(new ClassModelStore().statistics()).toEqual({
      trained: false,
      pieceTypes: [],
      numPieceTypes: 0,
      totalSamples: 0,
    });
  });

  test('hasColor looks at the prototype colours', () => {
    const model = new ClassModelStore();
    retrainFromFeedback([{ image: solidSquare(16, 90), label: 'WHITE_QUEEN' }], model);
    expect(model.hasColor('white')).toBe(true);
    expect(model.hasColor('black')).toBe(false);
  });

  test('an EMPTY prototype belongs to neither colour', () => {
    const model = new ClassModelStore();
    retrainFromFeedback([{ image: solidSquare(16, 90), label: 'EMPTY' }], model);
    expect(model.hasColor('white')).toBe(false);
    expect(model.hasColor('black')).toBe(false);
    expect(pieceColor('EMPTY')).toBeNull();
    expect(pieceColor('BLACK_KING')).toBe('black');
  });

  test('reset forgets every prototype', () => {
    const model = new ClassModelStore();
    retrainFromFeedback([{ image: solidSquare(16, 90), label: 'WHITE_QUEEN' }], model);
    model.reset();
    expect(model.size).toBe(0);
  });

  test('snapshot survives a JSON round trip', () => {
    const model = new ClassModelStore();
    retrainFromFeedback(
      [
        { image: pieceSquare(40, LIGHT_SQUARE, 'black'), label: 'BLACK_PAWN' },
        { image: pieceSquare(40, 90, 'white'), label: 'WHITE_PAWN' },
      ],
      model,
      fixedNow
    );
    const restored = ClassModelStore.fromSnapshot(JSON.parse(JSON.stringify(model.toSnapshot())));
    expect(restored.prototypes()).toEqual(model.prototypes());
  });

  test('malformed snapshot is rejected', () => {
    expect(() => ClassModelStore.fromSnapshot({ version: 2, prototypes: [] })).toThrow();
    expect(() =>
      ClassModelStore.fromSnapshot({ version: 1, prototypes: [{ pieceType: 'WHITE_DRAGON' }] })
    ).toThrow();
  });
});
