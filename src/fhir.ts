/**
 * FHIR Observation to feature reading
 *
 * Sensor values arrive as components of a single Observation, identified by
 * a code in `code.coding[]`. Components that are absent are left out of the
 * reading; the vectorizer fills them in. Component values are passed through
 * as given, so a malformed value affects only its own feature.
 */

import { z } from 'zod';
import { InputError } from './errors.js';
import type { FeatureReading } from './ml/types.js';

/** LOINC body temperature */
export const TEMPERATURE_CODE = '8310-5';
/** SNOMED CT motion */
export const MOTION_CODE = '52821000';
/** LOINC sound level */
export const SOUND_CODE = '89020-2';

const NIGHT_START_HOUR = 22;
const NIGHT_END_HOUR = 6;

const CodingSchema = z
  .object({
    system: z.string().optional(),
    code: z.string().optional(),
    display: z.string().optional(),
  })
  .passthrough();

const ComponentSchema = z
  .object({
    code: z
      .object({
        coding: z.array(CodingSchema).optional(),
        text: z.string().optional(),
      })
      .passthrough()
      .optional(),
    valueQuantity: z
      .object({
        value: z.unknown(),
        unit: z.string().optional(),
      })
      .passthrough()
      .optional(),
    valueInteger: z.unknown(),
  })
  .passthrough();

export const ObservationSchema = z
  .object({
    resourceType: z.literal('Observation').optional(),
    component: z.array(ComponentSchema).optional(),
  })
  .passthrough();

export type Observation = z.infer<typeof ObservationSchema>;
type ObservationComponent = z.infer<typeof ComponentSchema>;

export interface TimeFeatures {
  hour_of_day: number;
  is_night: 0 | 1;
}

/**
 * Time-of-day features for a moment, in local time
 */
export function timeFeatures(date: Date): TimeFeatures {
  const hour = date.getHours();
  return {
    hour_of_day: hour,
    is_night: hour >= NIGHT_START_HOUR || hour < NIGHT_END_HOUR ? 1 : 0,
  };
}

function hasCode(component: ObservationComponent, code: string): boolean {
  return component.code?.coding?.some((coding) => coding.code === code) ?? false;
}

/**
 * Map an Observation payload to a feature reading.
 *
 * `motion_trend` needs reading history, which a single Observation does not
 * carry, so it is always 0 here.
 *
 * @throws InputError if the payload is not an Observation shape
 */
export function extractFeatures(observation: unknown, now: Date = new Date()): FeatureReading {
  const parsed = ObservationSchema.safeParse(observation);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new InputError(`Invalid FHIR Observation: ${detail}`, { cause: parsed.error });
  }

  const features: Record<string, unknown> = {};

  for (const component of parsed.data.component ?? []) {
    if (hasCode(component, TEMPERATURE_CODE)) {
      features.temperature = component.valueQuantity?.value ?? 0;
    } else if (hasCode(component, MOTION_CODE)) {
      features.motion_level = component.valueInteger ?? 0;
    } else if (hasCode(component, SOUND_CODE)) {
      features.sound_level = component.valueInteger ?? 0;
    }
  }

  return {
    ...features,
    ...timeFeatures(now),
    motion_trend: 0,
  };
}
