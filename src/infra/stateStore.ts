/**
 * State persistence with optimistic concurrency.
 *
 * The store owns `revision`. A writer loads a snapshot, runs a transition
 * and saves with the revision it loaded. If anyone saved in between, the
 * save fails with ConcurrencyConflictError and nothing is written, so a
 * credit check and the append it guards can never interleave with another
 * writer's.
 */

import { readFile, rename, writeFile } from 'node:fs/promises';
import type { GameState } from '../domain/state.js';
import { ConcurrencyConflictError } from '../domain/errors.js';
import { deserializeState, serializeState } from '../http/state-serialization.js';
import type { Logger } from './logger.js';

export interface StateStore {
  /** Latest committed state, or null when nothing was ever saved */
  load(): Promise<GameState | null>;
  /**
   * Commits `state` if the stored revision still equals `expectedRevision`.
   * Returns the committed state, whose revision is one higher.
   */
  save(state: GameState, expectedRevision: number): Promise<GameState>;
}

function conflict(expected: number, actual: number): ConcurrencyConflictError {
  return new ConcurrencyConflictError(
    `State changed since it was loaded (expected revision ${expected}, found ${actual})`
  );
}

// ============================================================================
// In-memory
// ============================================================================

/**
 * Keeps a serialized copy so callers can never mutate the stored state.
 */
export class MemoryStateStore implements StateStore {
  private stored: string | null = null;
  private revision = 0;

  constructor(initial?: GameState) {
    if (initial) {
      this.stored = serializeState(initial);
      this.revision = initial.revision;
    }
  }

  async load(): Promise<GameState | null> {
    return this.stored === null ? null : deserializeState(this.stored);
  }

  async save(state: GameState, expectedRevision: number): Promise<GameState> {
    if (expectedRevision !== this.revision) {
      throw conflict(expectedRevision, this.revision);
    }
    const committed: GameState = { ...state, revision: this.revision + 1 };
    this.stored = serializeState(committed);
    this.revision = committed.revision;
    return committed;
  }
}

// ============================================================================
// JSON file
// ============================================================================

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

/**
 * One JSON document on disk. Saves are serialized in-process and written
 * to a temp file first, then renamed over the old one.
 */
export class FileStateStore implements StateStore {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly path: string,
    private readonly logger: Logger
  ) {}

  async load(): Promise<GameState | null> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
    return deserializeState(text);
  }

  save(state: GameState, expectedRevision: number): Promise<GameState> {
    const run = this.queue.then(() => this.compareAndWrite(state, expectedRevision));
    // Keep the chain alive after a failed save; the caller still sees the error
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async compareAndWrite(state: GameState, expectedRevision: number): Promise<GameState> {
    const current = await this.load();
    const currentRevision = current?.revision ?? 0;
    if (currentRevision !== expectedRevision) {
      this.logger.warn('store', 'Rejected stale save', {
        expected: expectedRevision,
        found: currentRevision,
      });
      throw conflict(expectedRevision, currentRevision);
    }

    const committed: GameState = { ...state, revision: currentRevision + 1 };
    const tmp = `${this.path}.tmp`;
    await writeFile(tmp, serializeState(committed), 'utf8');
    await rename(tmp, this.path);

    this.logger.debug('store', `Saved revision ${committed.revision}`);
    return committed;
  }
}
