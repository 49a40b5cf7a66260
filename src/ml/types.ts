/**
 * TypeScript interfaces for the activity classifier
 */

/**
 * Raw reading keyed by feature name. Any subset of the schema may be present;
 * unknown keys are ignored.
 */
export type FeatureReading = Readonly<Record<string, unknown>>;

/** Numeric vector in schema order */
export type FeatureVector = readonly number[];

export type FeatureMatrix = readonly FeatureVector[];

/**
 * Single prediction result
 */
export interface PredictionResult {
  /** Decoded label of the predicted class */
  activityClass: string;

  /** Probability of the predicted class (the maximum of the distribution) */
  confidence: number;

  /** Probability for every known class label */
  confidenceScores: Record<string, number>;
}

/**
 * Batch prediction result, without the full distribution
 */
export interface BatchResult {
  /** Position of the reading in the input batch */
  index: number;
  activityClass: string;
  confidence: number;
}

export interface VectorizeReport {
  vector: number[];

  /** Schema fields that were missing and filled with the default */
  filledDefaults: string[];
}

/** Opaque training metadata, returned to callers untouched */
export type ModelMetadata = Record<string, unknown>;

export interface ModelInfo {
  modelLoaded: true;
  metadata: ModelMetadata;
  classes: string[];
  features: string[];
}

export type LifecycleState = 'not_loaded' | 'loading' | 'ready';

export interface HealthStatus {
  status: 'healthy';
  modelLoaded: boolean;
  state: LifecycleState;
  lastError?: string;
  timestamp: string;
}
