#!/usr/bin/env node

/**
 * roomsense CLI entry point
 */

import chalk from 'chalk';
import { Command, Option } from 'commander';
import { toErrorResponse } from './errors.js';
import { LOG_LEVELS } from './logger.js';
import { batchCommand } from './commands/batch.js';
import type { GlobalOptions } from './commands/context.js';
import { fhirCommand } from './commands/fhir.js';
import { infoCommand } from './commands/info.js';
import { mcpCommand } from './commands/mcp.js';
import { parseNumberOption, predictCommand, type PredictCommandOptions } from './commands/predict.js';
import { renderWelcomeBanner } from './ui/render.js';

const program = new Command();

program
  .name('roomsense')
  .description('Classify patient-room activity from sensor readings')
  .version('1.0.0')
  .option('--config <path>', 'Path to config file')
  .option('--modelDir <dir>', 'Directory holding the model artifacts (default: ./models)')
  .addOption(new Option('--logLevel <level>', 'Log level (logs go to stderr)').choices(LOG_LEVELS))
  .option('--prettyLogs', 'Pretty-print logs instead of JSON lines')
  .option('--json', 'Output results as JSON (disables colors/spinners)')
  .option('--quiet', 'Suppress non-essential output');

function reportFailure(error: unknown): never {
  const response = toErrorResponse(error);
  const label = response.status === 'unavailable' ? 'Service unavailable:' : 'Error:';
  console.error(chalk.red(label), response.message);
  process.exit(1);
}

function globalOptions(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

// Predict command (single reading)
program
  .command('predict [file]')
  .description('Classify one reading, from a JSON file and/or flags')
  .option('--temperature <celsius>', 'Room temperature', parseNumberOption)
  .option('--motion <level>', 'Motion level', parseNumberOption)
  .option('--sound <level>', 'Sound level', parseNumberOption)
  .option('--hour <hour>', 'Hour of day (0-23)', parseNumberOption)
  .option('--night <flag>', '1 at night (22:00-06:00), else 0', parseNumberOption)
  .option('--trend <delta>', 'Motion trend', parseNumberOption)
  .action(async (file: string | undefined, _options: unknown, command: Command) => {
    try {
      await predictCommand(file, command.optsWithGlobals<PredictCommandOptions>());
    } catch (error) {
      reportFailure(error);
    }
  });

// Batch command (many readings)
program
  .command('batch <file>')
  .description('Classify readings from a JSON array, {"readings": [...]} or JSONL file')
  .action(async (file: string, _options: unknown, command: Command) => {
    try {
      await batchCommand(file, globalOptions(command));
    } catch (error) {
      reportFailure(error);
    }
  });

// FHIR command (Observation payload)
program
  .command('fhir <file>')
  .description('Classify a FHIR Observation JSON file')
  .action(async (file: string, _options: unknown, command: Command) => {
    try {
      await fhirCommand(file, globalOptions(command));
    } catch (error) {
      reportFailure(error);
    }
  });

// Info command (model metadata)
program
  .command('info')
  .description('Show model metadata, class labels and feature order')
  .action(async (_options: unknown, command: Command) => {
    try {
      await infoCommand(globalOptions(command));
    } catch (error) {
      reportFailure(error);
    }
  });

// MCP server command
program
  .command('mcp')
  .description('Start a stdio-based MCP server exposing prediction tools')
  .action(async (_options: unknown, command: Command) => {
    try {
      await mcpCommand(globalOptions(command));
    } catch (error) {
      // Write to stderr: stdout must stay clean for the MCP JSON-RPC stream
      process.stderr.write(`MCP server error: ${toErrorResponse(error).message}\n`);
      process.exit(1);
    }
  });

// Show welcome banner if no command provided
if (process.argv.length === 2) {
  console.log(renderWelcomeBanner());
  process.exit(0);
}

await program.parseAsync();
