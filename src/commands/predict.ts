/**
 * Predict command - classify a single reading
 */

import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import { readReadingFile } from '../input.js';
import type { FeatureReading } from '../ml/types.js';
import { vectorizeWithReport } from '../ml/vectorize.js';
import { divider, outputJSON, renderFeatures, renderPrediction } from '../ui/render.js';
import { createContext, requireReady, type GlobalOptions } from './context.js';

export type PredictCommandOptions = GlobalOptions & {
  temperature?: number;
  motion?: number;
  sound?: number;
  hour?: number;
  night?: number;
  trend?: number;
};

/**
 * commander argument parser for numeric flags
 */
export function parseNumberOption(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

/**
 * Build a reading from flags; flags that were not given stay absent
 */
export function readingFromOptions(options: PredictCommandOptions): FeatureReading {
  const pairs: Array<[string, number | undefined]> = [
    ['temperature', options.temperature],
    ['motion_level', options.motion],
    ['sound_level', options.sound],
    ['hour_of_day', options.hour],
    ['is_night', options.night],
    ['motion_trend', options.trend],
  ];
  return Object.fromEntries(pairs.filter(([, value]) => value !== undefined));
}

export async function predictCommand(file: string | undefined, options: PredictCommandOptions): Promise<void> {
  const context = await createContext(options);
  const reading = file
    ? { ...(await readReadingFile(file)), ...readingFromOptions(options) }
    : readingFromOptions(options);

  await requireReady(context);

  const { engine, config } = context;
  const result = engine.predict(reading);
  const { vector, filledDefaults } = vectorizeWithReport(reading);

  if (config.json) {
    outputJSON({ ...result, filledDefaults });
    return;
  }

  if (!config.quiet) {
    console.log(chalk.bold('\nFeatures'));
    console.log(renderFeatures(engine.info().features, vector));
    console.log(divider());
  }
  console.log(renderPrediction(result, filledDefaults));
}
