/**
 * Canonical feature order. The scaler and the classifier were fitted against
 * exactly this order, so every vector handed to the pipeline follows it.
 */
export const FEATURE_SCHEMA = [
  'temperature',
  'motion_level',
  'sound_level',
  'hour_of_day',
  'is_night',
  'motion_trend',
] as const;

export type FeatureName = (typeof FEATURE_SCHEMA)[number];

/** Any ordered list of field names; the default is FEATURE_SCHEMA */
export type FeatureSchema = readonly string[];
