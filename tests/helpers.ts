/**
 * Shared test fixtures: in-memory artifact source and loggers
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { fileURLToPath } from 'url';
import pino from 'pino';
import { ARTIFACT_FILES, ARTIFACT_NAMES, type ArtifactName, type ArtifactSource } from '../src/ml/artifacts.js';
import type { AppLogger } from '../src/logger.js';

export const FIXTURE_DIR = fileURLToPath(new URL('./fixtures', import.meta.url));
export const FIXTURE_MODEL_DIR = join(FIXTURE_DIR, 'model');

/** Scenario reading: a daytime, active patient */
export const ACTIVE_READING = {
  temperature: 23.5,
  motion_level: 45,
  sound_level: 120,
  hour_of_day: 14,
  is_night: 0,
  motion_trend: 5.2,
};

/** Quiet room at night */
export const SLEEPING_READING = { motion_level: 5, sound_level: 30, is_night: 1 };

export function fixtureArtifacts(): Record<ArtifactName, string> {
  const read = (name: ArtifactName) =>
    readFileSync(join(FIXTURE_MODEL_DIR, ARTIFACT_FILES[name]), 'utf-8');
  return {
    classifier: read('classifier'),
    encoder: read('encoder'),
    scaler: read('scaler'),
    metadata: read('metadata'),
  };
}

export function fixtureJson(name: ArtifactName): Record<string, unknown> {
  return JSON.parse(fixtureArtifacts()[name]);
}

/**
 * Artifact source backed by strings, counting reads.
 * `hold()` pauses every read until the returned release function is called.
 */
export class MemoryArtifactSource implements ArtifactSource {
  readonly reads: Record<ArtifactName, number> = { classifier: 0, encoder: 0, scaler: 0, metadata: 0 };
  private readonly contents: Partial<Record<ArtifactName, string>>;
  private gate: Promise<void> | null = null;

  constructor(contents: Partial<Record<ArtifactName, string>> = fixtureArtifacts()) {
    this.contents = { ...contents };
  }

  set(name: ArtifactName, text: string): void {
    this.contents[name] = text;
  }

  remove(name: ArtifactName): void {
    delete this.contents[name];
  }

  hold(): () => void {
    let release: () => void = () => {};
    this.gate = new Promise<void>((resolve) => {
      release = () => {
        this.gate = null;
        resolve();
      };
    });
    return release;
  }

  totalReads(): number {
    return ARTIFACT_NAMES.reduce((sum, name) => sum + this.reads[name], 0);
  }

  describe(name: ArtifactName): string {
    return `memory://${ARTIFACT_FILES[name]}`;
  }

  async read(name: ArtifactName): Promise<string> {
    this.reads[name]++;
    if (this.gate) {
      await this.gate;
    }
    const text = this.contents[name];
    if (text === undefined) {
      throw new Error(`ENOENT: no such artifact ${ARTIFACT_FILES[name]}`);
    }
    return text;
  }
}

export function silentLogger(): AppLogger {
  return pino({ level: 'silent' });
}

/**
 * Logger that keeps every entry as a parsed object
 */
export function captureLogger(): { logger: AppLogger; entries: Array<Record<string, unknown>> } {
  const entries: Array<Record<string, unknown>> = [];
  const logger = pino(
    {
      level: 'debug',
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    {
      write(message: string) {
        entries.push(JSON.parse(message));
      },
    }
  );
  return { logger, entries };
}
