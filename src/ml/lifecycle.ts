/**
 * Lifecycle controller: decides when the artifact store is (re)loaded
 */

import { LoadError } from '../errors.js';
import { ExclusiveLock } from '../lock.js';
import type { AppLogger } from '../logger.js';
import type { ArtifactStore } from './artifacts.js';
import type { LifecycleState } from './types.js';

export class LifecycleController {
  private readonly store: ArtifactStore;
  private readonly logger: AppLogger;
  private readonly lock = new ExclusiveLock();
  private state: LifecycleState = 'not_loaded';
  private lastError: LoadError | null = null;
  private loadCount = 0;

  constructor(store: ArtifactStore, logger: AppLogger) {
    this.store = store;
    this.logger = logger;
  }

  /**
   * Make sure the model is loaded.
   *
   * Returns immediately when the store is already ready. Otherwise one load
   * runs under the lock; callers that queued behind it re-check and return
   * its outcome without loading again. A failed load is reported as false,
   * never retried here.
   */
  async ensureReady(): Promise<boolean> {
    if (this.store.isLoaded()) {
      return true;
    }

    return this.lock.runExclusive(async () => {
      if (this.store.isLoaded()) {
        return true;
      }
      return this.loadLocked();
    });
  }

  /**
   * Force a fresh load even when a model is already published.
   * Readers keep the old bundle until the new one is swapped in; a failure
   * leaves the store not loaded.
   */
  async reload(): Promise<boolean> {
    return this.lock.runExclusive(() => this.loadLocked());
  }

  getState(): LifecycleState {
    return this.state;
  }

  getLastError(): LoadError | null {
    return this.lastError;
  }

  /**
   * Number of load attempts made so far
   */
  getLoadCount(): number {
    return this.loadCount;
  }

  private async loadLocked(): Promise<boolean> {
    this.state = 'loading';
    this.loadCount++;
    const startedAt = Date.now();
    this.logger.info({ event: 'model_loading', attempt: this.loadCount }, 'Loading model');

    try {
      await this.store.load();
    } catch (error) {
      this.state = 'not_loaded';
      if (!(error instanceof LoadError)) {
        throw error;
      }
      this.lastError = error;
      this.logger.error(
        { event: 'model_load_failed', artifact: error.artifact, reason: error.message },
        'Model failed to load'
      );
      return false;
    }

    this.state = 'ready';
    this.lastError = null;
    this.logger.info(
      { event: 'model_ready', durationMs: Date.now() - startedAt },
      'Model ready'
    );
    return true;
  }
}
