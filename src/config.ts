/**
 * Configuration file support for roomsense
 * Loads config from .roomsense.json, .roomsense.yaml, or package.json
 * Environment variables override the file; CLI flags override both
 */

import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';
import path from 'path';
import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from './logger.js';
import { DEFAULT_MODEL_DIR } from './ml/engine.js';

export const ConfigFileSchema = z
  .object({
    modelDir: z.string().min(1).optional(),
    logLevel: z.enum(LOG_LEVELS).optional(),
    prettyLogs: z.boolean().optional(),
    json: z.boolean().optional(),
    quiet: z.boolean().optional(),
  })
  .strict();

export type RoomsenseConfig = z.infer<typeof ConfigFileSchema>;

export interface ResolvedConfig {
  modelDir: string;
  logLevel: LogLevel;
  prettyLogs: boolean;
  json: boolean;
  quiet: boolean;
}

const explorer = cosmiconfig('roomsense', {
  searchPlaces: [
    'package.json',
    '.roomsense.json',
    '.roomsense.yaml',
    '.roomsense.yml',
    'roomsense.config.json',
    'roomsense.config.yaml',
    'roomsense.config.yml',
  ],
});

/**
 * Load configuration from file system
 * Returns null if no config file found
 *
 * @param searchFrom - Directory to start searching from, or an explicit file
 */
export async function loadConfig(searchFrom?: string): Promise<RoomsenseConfig | null> {
  let result: CosmiconfigResult;
  try {
    const isFile = searchFrom !== undefined && path.extname(searchFrom) !== '';
    result = isFile ? await explorer.load(searchFrom) : await explorer.search(searchFrom);
  } catch (error) {
    // Config file exists but is malformed
    if (error instanceof Error) {
      throw new Error(`Failed to load config: ${error.message}`);
    }
    throw error;
  }

  if (!result || result.isEmpty) {
    return null;
  }

  const parsed = ConfigFileSchema.safeParse(result.config);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid config in ${result.filepath}: ${detail}`);
  }

  return resolveConfigPaths(parsed.data, path.dirname(result.filepath));
}

/**
 * Read overrides from the environment
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): RoomsenseConfig {
  const config: RoomsenseConfig = {};

  if (env.ROOMSENSE_MODEL_DIR) {
    config.modelDir = env.ROOMSENSE_MODEL_DIR;
  }

  const level = env.ROOMSENSE_LOG_LEVEL;
  if (level) {
    const parsed = z.enum(LOG_LEVELS).safeParse(level.toLowerCase());
    if (!parsed.success) {
      throw new Error(`Invalid ROOMSENSE_LOG_LEVEL: ${level}`);
    }
    config.logLevel = parsed.data;
  }

  return config;
}

/**
 * Merge two config layers
 * Values from `overrides` win whenever they are defined
 */
export function mergeConfig(
  base: RoomsenseConfig | null,
  overrides: RoomsenseConfig
): RoomsenseConfig {
  if (!base) {
    return { ...overrides };
  }

  return {
    modelDir: overrides.modelDir ?? base.modelDir,
    logLevel: overrides.logLevel ?? base.logLevel,
    prettyLogs: overrides.prettyLogs ?? base.prettyLogs,
    json: overrides.json ?? base.json,
    quiet: overrides.quiet ?? base.quiet,
  };
}

/**
 * Resolve file paths in config relative to config file location
 */
export function resolveConfigPaths(
  config: RoomsenseConfig,
  configDir: string
): RoomsenseConfig {
  const resolved = { ...config };

  if (resolved.modelDir && !path.isAbsolute(resolved.modelDir)) {
    resolved.modelDir = path.resolve(configDir, resolved.modelDir);
  }

  return resolved;
}

/**
 * Fill in defaults for anything no layer set
 */
export function finalizeConfig(config: RoomsenseConfig): ResolvedConfig {
  return {
    modelDir: path.resolve(config.modelDir ?? DEFAULT_MODEL_DIR),
    logLevel: config.logLevel ?? 'warn',
    prettyLogs: config.prettyLogs ?? false,
    json: config.json ?? false,
    quiet: config.quiet ?? false,
  };
}

/**
 * Build the effective config: file, then environment, then CLI flags
 */
export async function resolveConfig(
  cliOptions: RoomsenseConfig,
  options: { configPath?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<ResolvedConfig> {
  const fileConfig = await loadConfig(options.configPath);
  const withEnv = mergeConfig(fileConfig, configFromEnv(options.env));
  return finalizeConfig(mergeConfig(withEnv, cliOptions));
}
