/**
 * Inference pipeline: scale, classify, decode
 */

import { ComputationError, NotReadyError } from '../errors.js';
import type { ArtifactBundle, ArtifactStore } from './artifacts.js';
import { argMax } from './classifier.js';
import type { BatchResult, FeatureMatrix, FeatureVector, PredictionResult } from './types.js';

interface RawPrediction {
  predicted: number;
  probabilities: number[];
}

export class InferencePipeline {
  private readonly store: ArtifactStore;

  constructor(store: ArtifactStore) {
    this.store = store;
  }

  /**
   * Predict one vector.
   *
   * When several classes share the top probability the lowest class index
   * wins, and `confidence` is read from the distribution at that index.
   *
   * @throws NotReadyError if no model is loaded (no load is attempted)
   * @throws ComputationError if the vector is the wrong size or holds a non-finite value
   */
  predict(vector: FeatureVector): PredictionResult {
    const bundle = this.requireBundle();
    const { predicted, probabilities } = this.run(bundle, vector);

    const confidenceScores: Record<string, number> = {};
    probabilities.forEach((probability, index) => {
      confidenceScores[bundle.encoder.inverseTransform(index)] = probability;
    });

    return {
      activityClass: bundle.encoder.inverseTransform(predicted),
      confidence: probabilities[predicted],
      confidenceScores,
    };
  }

  /**
   * Predict every row. Output order and `index` match the input order.
   * The bundle is taken once, so a reload mid-call cannot mix artifacts.
   */
  predictBatch(matrix: FeatureMatrix): BatchResult[] {
    const bundle = this.requireBundle();

    return matrix.map((vector, index) => {
      const { predicted, probabilities } = this.run(bundle, vector, index);
      return {
        index,
        activityClass: bundle.encoder.inverseTransform(predicted),
        confidence: probabilities[predicted],
      };
    });
  }

  private requireBundle(): ArtifactBundle {
    const bundle = this.store.current();
    if (!bundle) {
      throw new NotReadyError();
    }
    return bundle;
  }

  private run(bundle: ArtifactBundle, vector: FeatureVector, row?: number): RawPrediction {
    const schema = this.store.schema;
    const where = row === undefined ? '' : ` (row ${row})`;

    if (vector.length !== schema.length) {
      throw new ComputationError(
        `Expected ${schema.length} features, got ${vector.length}${where}`
      );
    }
    vector.forEach((value, i) => {
      if (!Number.isFinite(value)) {
        throw new ComputationError(
          `Feature "${schema[i]}" is not a finite number${where}`,
          schema[i]
        );
      }
    });

    const scaled = bundle.scaler.transform(vector);
    const probabilities = bundle.classifier.predictProba(scaled);
    return { predicted: argMax(probabilities), probabilities };
  }
}
