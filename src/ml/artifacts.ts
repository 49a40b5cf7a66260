/**
 * Artifact store: reads the four trained artifacts and publishes them together
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { LoadError } from '../errors.js';
import type { AppLogger } from '../logger.js';
import { ClassifierParamsSchema, TreeEnsembleClassifier, type Classifier } from './classifier.js';
import {
  EncoderParamsSchema,
  LabelEncoder,
  ScalerParamsSchema,
  StandardScaler,
} from './preprocessing.js';
import { FEATURE_SCHEMA, type FeatureSchema } from './schema.js';
import type { ModelMetadata } from './types.js';

/** File name of each artifact inside a model directory */
export const ARTIFACT_FILES = {
  classifier: 'activity_classifier.json',
  encoder: 'label_encoder.json',
  scaler: 'scaler.json',
  metadata: 'model_metadata.json',
} as const;

export type ArtifactName = keyof typeof ARTIFACT_FILES;

export const ARTIFACT_NAMES: readonly ArtifactName[] = ['classifier', 'encoder', 'scaler', 'metadata'];

/**
 * Where serialized artifacts come from
 */
export interface ArtifactSource {
  read(name: ArtifactName): Promise<string>;

  /** Human-readable location of an artifact, for logs and errors */
  describe(name: ArtifactName): string;
}

export class DirectoryArtifactSource implements ArtifactSource {
  readonly dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  describe(name: ArtifactName): string {
    return join(this.dir, ARTIFACT_FILES[name]);
  }

  async read(name: ArtifactName): Promise<string> {
    return readFile(this.describe(name), 'utf-8');
  }
}

/**
 * Everything inference needs, published as one immutable unit
 */
export interface ArtifactBundle {
  readonly classifier: Classifier;
  readonly encoder: LabelEncoder;
  readonly scaler: StandardScaler;
  readonly metadata: Readonly<ModelMetadata>;
  readonly loadedAt: string;
}

const MetadataSchema = z.record(z.unknown());

function describeCause(error: unknown): string {
  if (error instanceof z.ZodError) {
    return error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
  }
  return error instanceof Error ? error.message : String(error);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export class ArtifactStore {
  private bundle: ArtifactBundle | null = null;
  private readonly source: ArtifactSource;
  private readonly logger: AppLogger;
  readonly schema: FeatureSchema;

  constructor(source: ArtifactSource, logger: AppLogger, schema: FeatureSchema = FEATURE_SCHEMA) {
    this.source = source;
    this.logger = logger;
    this.schema = schema;
  }

  isLoaded(): boolean {
    return this.bundle !== null;
  }

  /**
   * The committed bundle, or null. Readers take this reference once and use
   * it for the whole operation.
   */
  current(): ArtifactBundle | null {
    return this.bundle;
  }

  clear(): void {
    this.bundle = null;
  }

  /**
   * Read, validate and cross-check all four artifacts, then swap them in.
   *
   * On any failure nothing is published and the previous bundle is dropped
   * as well, so the store reads as not loaded. Callers serialize loads; the
   * store itself takes no lock.
   *
   * @throws LoadError naming the artifact that failed
   */
  async load(): Promise<ArtifactBundle> {
    try {
      const next = await this.readBundle();
      this.bundle = next;
      return next;
    } catch (error) {
      this.bundle = null;
      throw error;
    }
  }

  private async readBundle(): Promise<ArtifactBundle> {
    const classifier = await this.readArtifact('classifier', (raw) =>
      TreeEnsembleClassifier.fromParams(ClassifierParamsSchema.parse(raw))
    );
    const encoder = await this.readArtifact('encoder', (raw) =>
      new LabelEncoder(EncoderParamsSchema.parse(raw))
    );
    const scaler = await this.readArtifact('scaler', (raw) =>
      new StandardScaler(ScalerParamsSchema.parse(raw))
    );
    const metadata = await this.readArtifact('metadata', (raw) => MetadataSchema.parse(raw));

    this.checkConsistency(classifier, encoder, scaler);

    return Object.freeze({
      classifier,
      encoder,
      scaler,
      metadata: deepFreeze(metadata),
      loadedAt: new Date().toISOString(),
    });
  }

  private async readArtifact<T>(name: ArtifactName, build: (raw: unknown) => T): Promise<T> {
    const location = this.source.describe(name);
    try {
      const text = await this.source.read(name);
      const artifact = build(JSON.parse(text));
      this.logger.info({ event: 'artifact_loaded', artifact: name, location }, `Loaded ${name}`);
      return artifact;
    } catch (error) {
      const reason = describeCause(error);
      this.logger.error(
        { event: 'artifact_failed', artifact: name, location, reason },
        `Failed to load ${name}`
      );
      throw new LoadError(name, `Failed to load ${name} from ${location}: ${reason}`, { cause: error });
    }
  }

  private checkConsistency(classifier: Classifier, encoder: LabelEncoder, scaler: StandardScaler): void {
    const problems: string[] = [];
    const width = this.schema.length;

    if (classifier.nFeatures !== width) {
      problems.push(`classifier expects ${classifier.nFeatures} features, schema has ${width}`);
    }
    if (scaler.size !== width) {
      problems.push(`scaler covers ${scaler.size} features, schema has ${width}`);
    }
    if (classifier.nClasses !== encoder.size) {
      problems.push(`classifier has ${classifier.nClasses} classes, encoder has ${encoder.size}`);
    }

    if (problems.length > 0) {
      const reason = problems.join('; ');
      this.logger.error({ event: 'artifact_failed', artifact: 'bundle', reason }, 'Artifacts disagree');
      throw new LoadError('bundle', `Artifacts disagree: ${reason}`);
    }
  }
}
