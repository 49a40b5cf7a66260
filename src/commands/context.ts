/**
 * Shared command setup: config, logger, and a ready prediction engine
 */

import ora from 'ora';
import { resolveConfig, type ResolvedConfig, type RoomsenseConfig } from '../config.js';
import { NotReadyError } from '../errors.js';
import { createLogger } from '../logger.js';
import { createPredictionEngine, type PredictionEngine } from '../ml/engine.js';

export type GlobalOptions = {
  config?: string;
  modelDir?: string;
  logLevel?: RoomsenseConfig['logLevel'];
  prettyLogs?: boolean;
  json?: boolean;
  quiet?: boolean;
};

export interface CommandContext {
  config: ResolvedConfig;
  engine: PredictionEngine;
}

/**
 * Resolve config and create an engine, without loading the model
 */
export async function createContext(options: GlobalOptions): Promise<CommandContext> {
  const config = await resolveConfig(
    {
      modelDir: options.modelDir,
      logLevel: options.logLevel,
      prettyLogs: options.prettyLogs,
      json: options.json,
      quiet: options.quiet,
    },
    { configPath: options.config }
  );

  const logger = createLogger({ level: config.logLevel, pretty: config.prettyLogs });
  const engine = createPredictionEngine({ modelDir: config.modelDir, logger });

  return { config, engine };
}

/**
 * Load the model if needed, with a spinner for interactive use
 *
 * @throws NotReadyError carrying the load failure when the model cannot be loaded
 */
export async function requireReady(context: CommandContext): Promise<void> {
  const { engine, config } = context;
  if (engine.isLoaded()) {
    return;
  }

  const interactive = !config.json && !config.quiet;
  const spinner = interactive ? ora(`Loading model from ${config.modelDir}`).start() : null;

  const ready = await engine.ensureReady();
  if (ready) {
    spinner?.succeed('Model loaded');
    return;
  }

  spinner?.fail('Model failed to load');
  const reason = engine.lifecycle.getLastError()?.message ?? 'unknown error';
  throw new NotReadyError(`Model not loaded: ${reason}`);
}
