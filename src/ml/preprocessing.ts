/**
 * Fitted preprocessing artifacts: the feature scaler and the label encoder
 */

import { z } from 'zod';

export const ScalerParamsSchema = z.object({
  mean: z.array(z.number()),
  scale: z.array(z.number()),
  var: z.array(z.number()).optional(),
});

export const EncoderParamsSchema = z.object({
  classes: z
    .array(z.string().min(1))
    .min(1)
    .refine((classes) => new Set(classes).size === classes.length, {
      message: 'class labels must be unique',
    }),
});

export type ScalerParams = z.infer<typeof ScalerParamsSchema>;
export type EncoderParams = z.infer<typeof EncoderParamsSchema>;

/**
 * Per-field affine normalization: (x - mean) / scale.
 * Parameters are fixed at training time and never refitted.
 */
export class StandardScaler {
  private readonly mean: readonly number[];
  private readonly scale: readonly number[];

  constructor(params: ScalerParams) {
    if (params.mean.length !== params.scale.length) {
      throw new Error(
        `Scaler mean has ${params.mean.length} entries but scale has ${params.scale.length}`
      );
    }
    this.mean = [...params.mean];
    // A zero scale means the feature was constant during training
    this.scale = params.scale.map((s) => (s === 0 ? 1 : s));
  }

  get size(): number {
    return this.mean.length;
  }

  transform(row: readonly number[]): number[] {
    if (row.length !== this.size) {
      throw new Error(`Scaler expects ${this.size} features, got ${row.length}`);
    }
    return row.map((x, i) => (x - this.mean[i]) / this.scale[i]);
  }
}

/**
 * Bidirectional mapping between class index and class label
 */
export class LabelEncoder {
  readonly classes: readonly string[];

  constructor(params: EncoderParams) {
    this.classes = [...params.classes];
  }

  get size(): number {
    return this.classes.length;
  }

  inverseTransform(index: number): string {
    const label = this.classes[index];
    if (label === undefined) {
      throw new Error(`Class index ${index} out of range (0-${this.classes.length - 1})`);
    }
    return label;
  }

  transform(label: string): number {
    const index = this.classes.indexOf(label);
    if (index === -1) {
      throw new Error(`Unknown class label: ${label}`);
    }
    return index;
  }
}
