/**
 * Developer smoke test for the mission cycle engine.
 *
 * Walks one skill through a full cycle on a simulated clock:
 * - a new skill starts NOT_READY
 * - eight missions make the next window ACTIVE with a hidden target
 * - completing the target pays the cycle bonus once
 * - the Navigator reports on what it sees
 *
 * Run with:
 *   npm run smoke
 */

import {
  analyze,
  completeMission,
  createInitialState,
  createMission,
  createSkill,
  tick,
  type EngineContext,
} from '../domain/engine.js';
import { DAY_MS } from '../domain/clock.js';
import { cycleStatus } from '../domain/cycles.js';
import { summarize } from '../domain/narrative.js';
import { createSeededRng } from '../domain/rng.js';
import type { GameState } from '../domain/state.js';
import { createLogger } from '../infra/logger.js';

const log = createLogger('debug');
const rng = createSeededRng(42);
let counter = 0;
let nowMs = Date.UTC(2024, 0, 3, 12); // a Wednesday

function ctx(): EngineContext {
  return { nowMs, rng, newId: () => `id-${++counter}` };
}

function report(label: string, state: GameState): void {
  for (const skill of state.skills) {
    log.info('smoke', `${label}: ${skill.name} L${skill.level} ${skill.xp}xp ${cycleStatus(skill, nowMs)}`);
  }
  log.info('smoke', `${label}: player L${state.player.level} ${state.player.xp}xp ${state.player.coins} coins`);
}

// -----------------------------------------------------------------------------
// Setup
// -----------------------------------------------------------------------------

let state = createInitialState({ displayName: 'Smoke' }, ctx());

const skillResult = createSkill(state, { name: 'Writing', cadence: { kind: 'weekly' } }, ctx());
state = skillResult.state;
const skillId = skillResult.skill.id;
report('after createSkill', state);

for (let i = 1; i <= 8; i++) {
  state = createMission(
    state,
    { title: `Writing drill ${i}`, skillIds: [skillId], difficulty: (i % 5) + 1, energy: 2 },
    ctx()
  ).state;
}
report('after 8 missions', state);

// -----------------------------------------------------------------------------
// Next window
// -----------------------------------------------------------------------------

nowMs += 7 * DAY_MS;
const tickResult = tick(state, ctx());
state = tickResult.state;
log.debug('smoke', 'tick events', tickResult.events);
report('after tick', state);

// -----------------------------------------------------------------------------
// Complete every mission once
// -----------------------------------------------------------------------------

for (const mission of state.missions) {
  nowMs += 60 * 60 * 1000;
  const result = completeMission(state, mission.id, ctx());
  state = result.state;
  const narrative = summarize(result.events, state);
  log.info('smoke', `${mission.title}: ${narrative?.line ?? '(nothing to say)'}`);
}
report('after completions', state);

// -----------------------------------------------------------------------------
// Navigator
// -----------------------------------------------------------------------------

for (const suggestion of analyze(state, nowMs)) {
  log.info('smoke', `[${suggestion.priority}] ${suggestion.title}: ${suggestion.message}`);
}
