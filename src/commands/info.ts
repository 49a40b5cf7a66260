/**
 * Info command - show model metadata, classes and feature order
 */

import { outputJSON, renderModelInfo } from '../ui/render.js';
import { createContext, requireReady, type GlobalOptions } from './context.js';

export async function infoCommand(options: GlobalOptions): Promise<void> {
  const context = await createContext(options);
  await requireReady(context);

  const info = context.engine.info();
  if (context.config.json) {
    outputJSON(info);
    return;
  }
  console.log(renderModelInfo(info));
}
