/**
 * Feature vectorization: unordered readings to schema-ordered vectors.
 *
 * Vectorization is total. A missing field becomes 0 and a present value is
 * passed through `Number()`, so a malformed field degrades that one entry
 * (NaN, rejected later by the pipeline) instead of the whole request.
 */

import { FEATURE_SCHEMA, type FeatureSchema } from './schema.js';
import type { FeatureReading, VectorizeReport } from './types.js';

export const DEFAULT_FEATURE_VALUE = 0;

function toNumber(value: unknown): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'number') {
    return value;
  }
  try {
    return Number(value);
  } catch {
    // Symbols and objects that cannot become primitives
    return Number.NaN;
  }
}

/**
 * Vectorize a reading and report which fields were defaulted
 */
export function vectorizeWithReport(
  reading: FeatureReading,
  schema: FeatureSchema = FEATURE_SCHEMA
): VectorizeReport {
  const vector: number[] = [];
  const filledDefaults: string[] = [];

  for (const field of schema) {
    const value = Object.prototype.hasOwnProperty.call(reading, field)
      ? toNumber(reading[field])
      : undefined;

    if (value === undefined) {
      vector.push(DEFAULT_FEATURE_VALUE);
      filledDefaults.push(field);
    } else {
      vector.push(value);
    }
  }

  return { vector, filledDefaults };
}

export function vectorize(reading: FeatureReading, schema: FeatureSchema = FEATURE_SCHEMA): number[] {
  return vectorizeWithReport(reading, schema).vector;
}

/**
 * Rows are independent: no feature is derived across readings here.
 * `motion_trend` must already be computed by the caller.
 */
export function vectorizeBatch(
  readings: readonly FeatureReading[],
  schema: FeatureSchema = FEATURE_SCHEMA
): number[][] {
  return readings.map((reading) => vectorize(reading, schema));
}
