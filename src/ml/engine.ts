/**
 * Prediction engine: one explicit handle owning the artifact store, the
 * inference pipeline and the lifecycle controller
 */

import { resolve } from 'node:path';
import { NotReadyError } from '../errors.js';
import { extractFeatures } from '../fhir.js';
import { createLogger, type AppLogger } from '../logger.js';
import { ArtifactStore, DirectoryArtifactSource, type ArtifactSource } from './artifacts.js';
import { LifecycleController } from './lifecycle.js';
import { InferencePipeline } from './pipeline.js';
import { FEATURE_SCHEMA, type FeatureSchema } from './schema.js';
import type {
  BatchResult,
  FeatureReading,
  HealthStatus,
  ModelInfo,
  PredictionResult,
} from './types.js';
import { vectorize, vectorizeBatch } from './vectorize.js';

export type {
  BatchResult,
  FeatureReading,
  HealthStatus,
  ModelInfo,
  PredictionResult,
} from './types.js';
export { FEATURE_SCHEMA } from './schema.js';

export const DEFAULT_MODEL_DIR = './models';

export interface PredictionEngineOptions {
  /** Directory holding the artifacts; ignored when `source` is given */
  modelDir?: string;
  source?: ArtifactSource;
  logger?: AppLogger;
  schema?: FeatureSchema;
}

export class PredictionEngine {
  readonly store: ArtifactStore;
  readonly pipeline: InferencePipeline;
  readonly lifecycle: LifecycleController;
  private readonly logger: AppLogger;
  private readonly schema: FeatureSchema;

  constructor(options: PredictionEngineOptions = {}) {
    this.logger = options.logger ?? createLogger();
    this.schema = options.schema ?? FEATURE_SCHEMA;
    const source = options.source
      ?? new DirectoryArtifactSource(resolve(options.modelDir ?? DEFAULT_MODEL_DIR));

    this.store = new ArtifactStore(source, this.logger, this.schema);
    this.pipeline = new InferencePipeline(this.store);
    this.lifecycle = new LifecycleController(this.store, this.logger);
  }

  ensureReady(): Promise<boolean> {
    return this.lifecycle.ensureReady();
  }

  reload(): Promise<boolean> {
    return this.lifecycle.reload();
  }

  isLoaded(): boolean {
    return this.store.isLoaded();
  }

  predict(reading: FeatureReading): PredictionResult {
    const result = this.pipeline.predict(vectorize(reading, this.schema));
    this.logger.debug(
      { event: 'prediction', activityClass: result.activityClass, confidence: result.confidence },
      'Prediction made'
    );
    return result;
  }

  predictBatch(readings: readonly FeatureReading[]): BatchResult[] {
    const results = this.pipeline.predictBatch(vectorizeBatch(readings, this.schema));
    this.logger.debug({ event: 'batch_prediction', size: results.length }, 'Batch prediction made');
    return results;
  }

  /**
   * Classify a FHIR Observation, deriving time-of-day fields from `now`
   */
  classifyObservation(observation: unknown, now: Date = new Date()): PredictionResult {
    return this.predict(extractFeatures(observation, now));
  }

  /**
   * Stored metadata, class labels and feature order, as loaded.
   * Callers get copies; the published bundle stays untouched.
   *
   * @throws NotReadyError if no model is loaded
   */
  info(): ModelInfo {
    const bundle = this.store.current();
    if (!bundle) {
      throw new NotReadyError();
    }
    return {
      modelLoaded: true,
      metadata: structuredClone(bundle.metadata),
      classes: [...bundle.encoder.classes],
      features: [...this.schema],
    };
  }

  /**
   * Liveness probe. Never triggers a load.
   */
  health(): HealthStatus {
    const lastError = this.lifecycle.getLastError();
    return {
      status: 'healthy',
      modelLoaded: this.store.isLoaded(),
      state: this.lifecycle.getState(),
      ...(lastError ? { lastError: lastError.message } : {}),
      timestamp: new Date().toISOString(),
    };
  }
}

export function createPredictionEngine(options: PredictionEngineOptions = {}): PredictionEngine {
  return new PredictionEngine(options);
}
