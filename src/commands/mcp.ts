/**
 * MCP (Model Context Protocol) server command
 *
 * Exposes the prediction engine to AI assistants over stdio.
 *
 * Start with:  roomsense mcp --modelDir ./models
 * Then add to the client's MCP settings:
 *   { "command": "npx", "args": ["roomsense", "mcp"] }
 *
 * Every tool except `health` makes sure the model is loaded first. A model
 * that cannot be loaded is reported as "unavailable", other failures as
 * "error"; results are returned as the engine produced them.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { NotReadyError, toErrorResponse } from '../errors.js';
import type { PredictionEngine } from '../ml/engine.js';
import type { FeatureReading } from '../ml/types.js';
import { createContext, type GlobalOptions } from './context.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

type ToolResult = { content: Array<{ type: 'text'; text: string }>; isError?: boolean };

function textResult(payload: unknown): ToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
  };
}

function errorResult(error: unknown): ToolResult {
  return { ...textResult(toErrorResponse(error)), isError: true };
}

/**
 * Run a tool body against a ready engine, translating failures
 */
async function withReadyEngine(
  engine: PredictionEngine,
  body: () => unknown
): Promise<ToolResult> {
  try {
    if (!(await engine.ensureReady())) {
      const reason = engine.lifecycle.getLastError()?.message ?? 'unknown error';
      throw new NotReadyError(`Model not loaded: ${reason}`);
    }
    return textResult(body());
  } catch (error) {
    return errorResult(error);
  }
}

const readingShape = {
  temperature: z.number().optional().describe('Room temperature in °C'),
  motion_level: z.number().optional().describe('Motion sensor level (0-100)'),
  sound_level: z.number().optional().describe('Sound level'),
  hour_of_day: z.number().optional().describe('Hour of day (0-23)'),
  is_night: z.number().optional().describe('1 between 22:00 and 06:00, else 0'),
  motion_trend: z.number().optional().describe('Change in motion versus recent readings'),
};

// ---------------------------------------------------------------------------
// Tool handlers
// ---------------------------------------------------------------------------

export function handlePredictActivity(engine: PredictionEngine, reading: FeatureReading): Promise<ToolResult> {
  return withReadyEngine(engine, () => engine.predict(reading));
}

export function handlePredictBatch(
  engine: PredictionEngine,
  args: { readings: FeatureReading[] }
): Promise<ToolResult> {
  return withReadyEngine(engine, () => ({ predictions: engine.predictBatch(args.readings) }));
}

export function handleClassifyObservation(
  engine: PredictionEngine,
  args: { observation: unknown }
): Promise<ToolResult> {
  return withReadyEngine(engine, () => engine.classifyObservation(args.observation));
}

export function handleModelInfo(engine: PredictionEngine): Promise<ToolResult> {
  return withReadyEngine(engine, () => engine.info());
}

export async function handleHealth(engine: PredictionEngine): Promise<ToolResult> {
  return textResult(engine.health());
}

// ---------------------------------------------------------------------------
// Server assembly
// ---------------------------------------------------------------------------

export function buildMcpServer(engine: PredictionEngine): McpServer {
  const server = new McpServer({
    name: 'roomsense',
    version: '1.0.0',
  });

  server.registerTool(
    'predict_activity',
    {
      title: 'Predict Activity',
      description: [
        'Classify one sensor reading into an activity class.',
        'Missing fields default to 0.',
        'Returns the class, its confidence and the probability of every class.',
      ].join(' '),
      inputSchema: readingShape,
    },
    async (args) => handlePredictActivity(engine, args),
  );

  server.registerTool(
    'predict_batch',
    {
      title: 'Predict Batch',
      description: [
        'Classify several readings at once.',
        'Results come back in input order, each with its index, class and confidence.',
      ].join(' '),
      inputSchema: {
        readings: z.array(z.object(readingShape)).describe('Sensor readings to classify'),
      },
    },
    async (args) => handlePredictBatch(engine, args),
  );

  server.registerTool(
    'classify_observation',
    {
      title: 'Classify FHIR Observation',
      description: [
        'Classify a FHIR Observation whose components carry temperature (LOINC 8310-5),',
        'motion (SNOMED 52821000) and sound (LOINC 89020-2) values.',
        'Time-of-day features are taken from the current time.',
      ].join(' '),
      inputSchema: {
        observation: z.record(z.unknown()).describe('FHIR Observation resource'),
      },
    },
    async (args) => handleClassifyObservation(engine, args),
  );

  server.registerTool(
    'model_info',
    {
      title: 'Model Info',
      description: 'Return the model metadata, class labels and feature order.',
    },
    async () => handleModelInfo(engine),
  );

  server.registerTool(
    'health',
    {
      title: 'Health',
      description: 'Liveness check. Reports whether the model is loaded without loading it.',
    },
    async () => handleHealth(engine),
  );

  return server;
}

export async function mcpCommand(options: GlobalOptions): Promise<void> {
  // Logs go to stderr; stdout carries the JSON-RPC stream
  const { engine } = await createContext({ ...options, json: true, quiet: true });
  const ready = await engine.ensureReady();
  if (!ready) {
    process.stderr.write('Model not loaded yet; tools will retry on each call\n');
  }

  const server = buildMcpServer(engine);
  const transport = new StdioServerTransport();
  await server.connect(transport);

  // Keep the process alive until the transport closes
  await new Promise<void>((resolve) => {
    server.server.onclose = resolve;
  });
}
