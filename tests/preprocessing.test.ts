/**
 * Tests for the scaler and label encoder (ml/preprocessing.ts)
 */

import { describe, it, expect } from 'vitest';
import {
  EncoderParamsSchema,
  LabelEncoder,
  ScalerParamsSchema,
  StandardScaler,
} from '../src/ml/preprocessing.js';
import { fixtureJson } from './helpers.js';

describe('StandardScaler', () => {
  it('should apply (x - mean) / scale per field', () => {
    const scaler = new StandardScaler({ mean: [10, 0], scale: [2, 4] });

    expect(scaler.transform([14, -2])).toEqual([2, -0.5]);
  });

  it('should load the fixture scaler with its variance', () => {
    const scaler = new StandardScaler(ScalerParamsSchema.parse(fixtureJson('scaler')));

    expect(scaler.size).toBe(6);
    expect(scaler.transform([23, 40, 90, 12, 0.3, 0])).toEqual([0, 0, 0, 0, 0, 0]);
  });

  it('should leave constant features unscaled', () => {
    const scaler = new StandardScaler({ mean: [5], scale: [0] });

    expect(scaler.transform([8])).toEqual([3]);
  });

  it('should reject mismatched mean and scale', () => {
    expect(() => new StandardScaler({ mean: [1, 2], scale: [1] })).toThrow(
      'Scaler mean has 2 entries but scale has 1'
    );
  });

  it('should reject rows of the wrong width', () => {
    const scaler = new StandardScaler({ mean: [0, 0], scale: [1, 1] });

    expect(() => scaler.transform([1])).toThrow('Scaler expects 2 features, got 1');
  });
});

describe('LabelEncoder', () => {
  const encoder = new LabelEncoder({ classes: ['ACTIVE', 'RESTING', 'SLEEPING'] });

  it('should map indices to labels and back', () => {
    expect(encoder.size).toBe(3);
    expect(encoder.inverseTransform(2)).toBe('SLEEPING');
    expect(encoder.transform('RESTING')).toBe(1);
  });

  it('should reject indices outside the class list', () => {
    expect(() => encoder.inverseTransform(3)).toThrow('Class index 3 out of range (0-2)');
  });

  it('should reject unknown labels', () => {
    expect(() => encoder.transform('FALL_DETECTED')).toThrow('Unknown class label: FALL_DETECTED');
  });

  it('should require unique, non-empty class lists', () => {
    expect(EncoderParamsSchema.safeParse({ classes: [] }).success).toBe(false);
    expect(EncoderParamsSchema.safeParse({ classes: ['A', 'A'] }).success).toBe(false);
    expect(EncoderParamsSchema.safeParse(fixtureJson('encoder')).success).toBe(true);
  });
});
