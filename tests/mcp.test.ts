import { describe, expect, it, vi, afterEach } from 'vitest';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  buildMcpServer,
  handleClassifyObservation,
  handleHealth,
  handleModelInfo,
  handlePredictActivity,
  handlePredictBatch,
} from '../src/commands/mcp.js';
import { createPredictionEngine } from '../src/ml/engine.js';
import { ACTIVE_READING, MemoryArtifactSource, silentLogger, SLEEPING_READING } from './helpers.js';

function setup() {
  const source = new MemoryArtifactSource();
  const engine = createPredictionEngine({ source, logger: silentLogger() });
  return { source, engine };
}

function payload(result: { content: Array<{ text: string }> }): unknown {
  return JSON.parse(result.content[0].text);
}

describe('MCP tools', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('builds a server with the engine tools', () => {
    expect(buildMcpServer(setup().engine)).toBeInstanceOf(McpServer);
  });

  it('loads the model on first use and predicts', async () => {
    const { engine } = setup();

    const result = await handlePredictActivity(engine, ACTIVE_READING);

    expect(result.isError).toBeUndefined();
    expect(payload(result)).toMatchObject({ activityClass: 'ACTIVE' });
    expect(engine.isLoaded()).toBe(true);
  });

  it('returns batch predictions in input order', async () => {
    const { engine } = setup();

    const result = await handlePredictBatch(engine, { readings: [SLEEPING_READING, {}, ACTIVE_READING] });

    expect(payload(result)).toMatchObject({
      predictions: [
        { index: 0, activityClass: 'SLEEPING' },
        { index: 1, activityClass: 'RESTING' },
        { index: 2, activityClass: 'ACTIVE' },
      ],
    });
  });

  it('classifies observations using the current time', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date(2026, 0, 5, 14, 0));
    const { engine } = setup();

    const result = await handleClassifyObservation(engine, {
      observation: {
        resourceType: 'Observation',
        component: [
          { code: { coding: [{ code: '52821000' }] }, valueInteger: 5 },
          { code: { coding: [{ code: '89020-2' }] }, valueInteger: 30 },
        ],
      },
    });

    expect(payload(result)).toMatchObject({ activityClass: 'RESTING' });
  });

  it('returns model info', async () => {
    const { engine } = setup();

    const result = await handleModelInfo(engine);

    expect(payload(result)).toMatchObject({
      modelLoaded: true,
      classes: ['ACTIVE', 'RESTING', 'SLEEPING'],
      features: ['temperature', 'motion_level', 'sound_level', 'hour_of_day', 'is_night', 'motion_trend'],
    });
  });

  it('reports health without loading the model', async () => {
    const { engine, source } = setup();

    const result = await handleHealth(engine);

    expect(payload(result)).toMatchObject({ status: 'healthy', modelLoaded: false, state: 'not_loaded' });
    expect(source.totalReads()).toBe(0);
  });

  it('reports an unloadable model as unavailable', async () => {
    const { engine, source } = setup();
    source.remove('classifier');

    const result = await handlePredictActivity(engine, ACTIVE_READING);

    expect(result.isError).toBe(true);
    expect(payload(result)).toEqual({
      status: 'unavailable',
      code: 'NOT_READY',
      message:
        'Model not loaded: Failed to load classifier from memory://activity_classifier.json: ' +
        'ENOENT: no such artifact activity_classifier.json',
    });
  });

  it('reports computation failures as errors', async () => {
    const { engine } = setup();

    const result = await handlePredictActivity(engine, { temperature: Number.NaN });

    expect(result.isError).toBe(true);
    expect(payload(result)).toEqual({
      status: 'error',
      code: 'COMPUTATION_FAILED',
      message: 'Feature "temperature" is not a finite number',
    });
  });
});
