/**
 * Reading CLI input files: single readings, batches and FHIR payloads
 */

import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { z } from 'zod';
import { InputError } from './errors.js';
import type { FeatureReading } from './ml/types.js';

const ReadingSchema = z.record(z.unknown());

const BatchSchema = z.union([
  z.array(ReadingSchema),
  z.object({ readings: z.array(ReadingSchema) }).transform((body) => body.readings),
]);

async function readText(file: string): Promise<string> {
  const fullPath = resolve(file);
  try {
    return await readFile(fullPath, 'utf-8');
  } catch (error) {
    throw new InputError(`Cannot read ${fullPath}: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }
}

function parseJson(text: string, file: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new InputError(`${file} is not valid JSON`, { cause: error });
  }
}

function toReading(value: unknown, file: string): FeatureReading {
  const parsed = ReadingSchema.safeParse(value);
  if (!parsed.success) {
    throw new InputError(`${file} must contain a JSON object of feature values`);
  }
  return parsed.data;
}

function isEnvelope(value: unknown): boolean {
  return typeof value === 'object' && value !== null && 'readings' in value;
}

/**
 * Parse a single reading: a JSON object of feature name to value
 */
export function parseReading(text: string, file: string = 'input'): FeatureReading {
  return toReading(parseJson(text, file), file);
}

/**
 * Parse a batch: a JSON array, an object with a `readings` array, or one
 * object per line. The whole text is tried as one JSON document first.
 */
export function parseBatch(text: string, file: string = 'input'): FeatureReading[] {
  const trimmed = text.trim();
  if (trimmed === '') {
    return [];
  }

  let whole: unknown;
  try {
    whole = JSON.parse(trimmed);
  } catch {
    // Not a single document: JSONL
    return trimmed
      .split('\n')
      .map((line, i) => ({ line: line.trim(), lineNumber: i + 1 }))
      .filter(({ line }) => line !== '')
      .map(({ line, lineNumber }) => parseReading(line, `${file}:${lineNumber}`));
  }

  if (Array.isArray(whole) || isEnvelope(whole)) {
    const parsed = BatchSchema.safeParse(whole);
    if (!parsed.success) {
      throw new InputError(`${file} must contain an array of readings`);
    }
    return parsed.data;
  }

  return [toReading(whole, file)];
}

export async function readReadingFile(file: string): Promise<FeatureReading> {
  return parseReading(await readText(file), file);
}

export async function readBatchFile(file: string): Promise<FeatureReading[]> {
  return parseBatch(await readText(file), file);
}

export async function readJsonFile(file: string): Promise<unknown> {
  return parseJson(await readText(file), file);
}
