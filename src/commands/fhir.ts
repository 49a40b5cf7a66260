/**
 * FHIR command - classify a FHIR Observation payload
 */

import { extractFeatures } from '../fhir.js';
import { readJsonFile } from '../input.js';
import { vectorizeWithReport } from '../ml/vectorize.js';
import { outputJSON, renderPrediction } from '../ui/render.js';
import { createContext, requireReady, type GlobalOptions } from './context.js';

export async function fhirCommand(file: string, options: GlobalOptions): Promise<void> {
  const context = await createContext(options);
  const reading = extractFeatures(await readJsonFile(file));

  await requireReady(context);
  const result = context.engine.predict(reading);
  const { filledDefaults } = vectorizeWithReport(reading);

  if (context.config.json) {
    outputJSON({ ...result, features: reading, filledDefaults });
    return;
  }
  console.log(renderPrediction(result, filledDefaults));
}
