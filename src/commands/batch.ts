/**
 * Batch command - classify every reading in a file
 */

import { readBatchFile } from '../input.js';
import { outputJSON, renderBatch } from '../ui/render.js';
import { createContext, requireReady, type GlobalOptions } from './context.js';

export async function batchCommand(file: string, options: GlobalOptions): Promise<void> {
  const context = await createContext(options);
  const readings = await readBatchFile(file);

  await requireReady(context);
  const predictions = context.engine.predictBatch(readings);

  if (context.config.json) {
    outputJSON({ predictions });
    return;
  }
  console.log(renderBatch(predictions));
}
