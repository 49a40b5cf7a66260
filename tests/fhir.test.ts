/**
 * Tests for FHIR Observation extraction (fhir.ts)
 */

import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { join } from 'path';
import { InputError } from '../src/errors.js';
import { extractFeatures, MOTION_CODE, SOUND_CODE, TEMPERATURE_CODE, timeFeatures } from '../src/fhir.js';
import { FIXTURE_DIR } from './helpers.js';

const AFTERNOON = new Date(2026, 2, 10, 14, 30);

function component(code: string, value: Record<string, unknown>) {
  return { code: { coding: [{ code }] }, ...value };
}

describe('timeFeatures', () => {
  it('should use the local hour', () => {
    expect(timeFeatures(AFTERNOON)).toEqual({ hour_of_day: 14, is_night: 0 });
  });

  it('should mark 22:00 through 05:59 as night', () => {
    const nightFlags = Array.from({ length: 24 }, (_, hour) =>
      timeFeatures(new Date(2026, 2, 10, hour, 0)).is_night
    );

    expect(nightFlags.map((flag, hour) => (flag === 1 ? hour : null)).filter((h) => h !== null)).toEqual([
      0, 1, 2, 3, 4, 5, 22, 23,
    ]);
  });
});

describe('extractFeatures', () => {
  it('should map coded components to feature fields', () => {
    const observation = JSON.parse(readFileSync(join(FIXTURE_DIR, 'input', 'observation.json'), 'utf-8'));

    expect(extractFeatures(observation, AFTERNOON)).toEqual({
      temperature: 22.4,
      motion_level: 5,
      sound_level: 30,
      hour_of_day: 14,
      is_night: 0,
      motion_trend: 0,
    });
  });

  it('should leave absent components out of the reading', () => {
    const observation = {
      resourceType: 'Observation',
      component: [component(SOUND_CODE, { valueInteger: 55 })],
    };

    expect(extractFeatures(observation, AFTERNOON)).toEqual({
      sound_level: 55,
      hour_of_day: 14,
      is_night: 0,
      motion_trend: 0,
    });
  });

  it('should default a coded component without a value to 0', () => {
    const observation = {
      component: [component(TEMPERATURE_CODE, {}), component(MOTION_CODE, { valueQuantity: { value: 7 } })],
    };

    const reading = extractFeatures(observation, AFTERNOON);

    expect(reading.temperature).toBe(0);
    expect(reading.motion_level).toBe(0);
  });

  it('should match a code anywhere in the coding list', () => {
    const observation = {
      component: [
        {
          code: { coding: [{ system: 'urn:local', code: 'room-motion' }, { code: MOTION_CODE }] },
          valueInteger: 12,
        },
      ],
    };

    expect(extractFeatures(observation, AFTERNOON).motion_level).toBe(12);
  });

  it('should pass malformed component values through to their own field', () => {
    const observation = {
      component: [
        component(TEMPERATURE_CODE, { valueQuantity: { value: '22.4' } }),
        component(MOTION_CODE, { valueInteger: null }),
        component(SOUND_CODE, { valueInteger: 'loud' }),
      ],
    };

    expect(extractFeatures(observation, AFTERNOON)).toEqual({
      temperature: '22.4',
      motion_level: 0,
      sound_level: 'loud',
      hour_of_day: 14,
      is_night: 0,
      motion_trend: 0,
    });
  });

  it('should only match codes listed in the coding array', () => {
    const observation = { component: [{ code: { text: 'Motion 52821000' }, valueInteger: 12 }] };

    expect(extractFeatures(observation, AFTERNOON)).not.toHaveProperty('motion_level');
  });

  it('should ignore components with unknown codes', () => {
    const observation = { component: [component('9279-1', { valueInteger: 18 })] };

    expect(extractFeatures(observation, AFTERNOON)).toEqual({ hour_of_day: 14, is_night: 0, motion_trend: 0 });
  });

  it('should accept an observation without components', () => {
    expect(extractFeatures({ resourceType: 'Observation' }, new Date(2026, 2, 10, 23, 0))).toEqual({
      hour_of_day: 23,
      is_night: 1,
      motion_trend: 0,
    });
  });

  it('should reject payloads that are not observations', () => {
    expect(() => extractFeatures({ resourceType: 'Patient' })).toThrow(InputError);
    expect(() => extractFeatures('not an object')).toThrow('Invalid FHIR Observation');
    expect(() => extractFeatures({ component: [42] })).toThrow('Invalid FHIR Observation: component.0');
  });
});
