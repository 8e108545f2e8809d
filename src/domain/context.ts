import type { Rng } from './rng.js';

/**
 * EngineContext: The outside world as a transition sees it.
 *
 * Callers pin `nowMs` once per command so every step of one transition
 * agrees on the time.
 */
export interface EngineContext {
  nowMs: number;
  rng: Rng;
  newId: () => string;
}
