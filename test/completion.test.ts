/**
 * Completion processor tests.
 */

import { describe, it, expect } from 'vitest';
import {
  MAX_TOKENS_PER_DAY,
  MAX_TOKENS_PER_SKILL_CYCLE,
  processCompletion,
} from '../src/domain/completion.js';
import { DAY_MS, MINUTE_MS } from '../src/domain/clock.js';
import { isEngineError } from '../src/domain/errors.js';
import type { EngineContext } from '../src/domain/context.js';
import type { Rng } from '../src/domain/rng.js';
import type { GameState, Mission, Skill } from '../src/domain/state.js';

// ============================================================================
// Test Helpers
// ============================================================================

const NOW = Date.UTC(2024, 0, 10, 12);
const WEEK_START = Date.UTC(2024, 0, 8);
const WEEK_END = Date.UTC(2024, 0, 15);

function constantRng(value: number): Rng {
  return { next: () => value };
}

function ctxAt(nowMs: number, rng: Rng = constantRng(0.99)): EngineContext {
  let counter = 0;
  return { nowMs, rng, newId: () => `c${++counter}` };
}

function skill(id: string, overrides: Partial<Skill> = {}): Skill {
  return {
    id,
    name: id,
    level: 1,
    xp: 0,
    cadence: { kind: 'weekly' },
    cycleStartMs: WEEK_START,
    cycleEndMs: WEEK_END,
    targetMissionId: 'm3',
    hasHitTargetThisCycle: false,
    isFocus: false,
    isArchived: false,
    notReadySinceMs: null,
    createdAtMs: 0,
    ...overrides,
  };
}

function missions(skillIds: string[]): Mission[] {
  return Array.from({ length: 8 }, (_, i) => ({
    id: `m${i}`,
    title: `Mission ${i}`,
    skillIds,
    difficulty: 3,
    energy: 2,
    isArchived: false,
    createdAtMs: 0,
  }));
}

function baseState(skills: Skill[] = [skill('writing')]): GameState {
  return {
    revision: 3,
    settings: { dayStartHour: 0, utcOffsetMinutes: 0 },
    player: { id: 'p', displayName: 'Test', level: 1, xp: 0, coins: 0, createdAtMs: 0 },
    skills,
    missions: missions(skills.map((s) => s.id)),
    completions: [],
    cycleLog: [],
    rewards: [],
    redemptions: [],
    journal: [],
    capsules: [],
  };
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return isEngineError(error) ? error.code : undefined;
  }
  return undefined;
}

// ============================================================================
// Rewards
// ============================================================================

describe('processCompletion rewards', () => {
  it('pays the cycle bonus on the first target completion', () => {
    const result = processCompletion(baseState(), 'm3', ctxAt(NOW));
    const { player, skills } = result.state;

    expect(player).toMatchObject({ level: 2, xp: 12, coins: 6 });
    expect(skills[0]).toMatchObject({ level: 2, xp: 144, hasHitTargetThisCycle: true });
    expect(result.completion.award).toEqual({
      basePlayerXp: 12,
      cyclePlayerXp: 120,
      coins: 6,
      skills: [
        {
          skillId: 'writing',
          cycleId: 'writing:2024-01-08T00:00:00.000Z',
          baseXp: 24,
          cycleXp: 240,
          levelBefore: 1,
          levelAfter: 2,
        },
      ],
      playerLevelBefore: 1,
      playerLevelAfter: 2,
    });
    expect(result.events.map((e) => e.type)).toEqual([
      'mission_completed',
      'cycle_bonus_awarded',
      'skill_leveled_up',
      'player_leveled_up',
    ]);
  });

  it('pays only the base reward on the second target completion', () => {
    const first = processCompletion(baseState(), 'm3', ctxAt(NOW));
    const second = processCompletion(first.state, 'm3', ctxAt(NOW + MINUTE_MS));

    expect(second.state.player).toMatchObject({ level: 2, xp: 24, coins: 12 });
    expect(second.state.skills[0]).toMatchObject({ level: 2, xp: 168 });
    expect(second.completion.award.cyclePlayerXp).toBe(0);
    expect(second.completion.award.skills[0].cycleXp).toBe(0);
    expect(second.events.map((e) => e.type)).toEqual(['mission_completed']);
  });

  it('pays only the base reward for a non-target mission', () => {
    const result = processCompletion(baseState(), 'm5', ctxAt(NOW));

    expect(result.state.player).toMatchObject({ level: 1, xp: 12, coins: 6 });
    expect(result.state.skills[0]).toMatchObject({ xp: 24, hasHitTargetThisCycle: false });
  });

  it('holds focus skills to the doubled threshold', () => {
    const result = processCompletion(
      baseState([skill('writing', { isFocus: true })]),
      'm3',
      ctxAt(NOW)
    );
    expect(result.state.skills[0]).toMatchObject({ level: 2, xp: 24 });
  });

  it('pays a separate bonus to each skill a two-skill mission targets', () => {
    const state = baseState([skill('writing'), skill('fitness')]);
    const result = processCompletion(state, 'm3', ctxAt(NOW));

    // 12 base + 2 × 120 bonus = 252 → level 2 with 132 over
    expect(result.state.player).toMatchObject({ level: 2, xp: 132 });
    expect(result.state.skills.map((s) => [s.level, s.xp])).toEqual([
      [2, 144],
      [2, 144],
    ]);
    expect(result.events.filter((e) => e.type === 'cycle_bonus_awarded')).toHaveLength(2);
  });

  it('pays no bonus in a NOT_READY window', () => {
    const state = baseState([skill('writing', { targetMissionId: null })]);
    const result = processCompletion(state, 'm3', ctxAt(NOW));
    expect(result.completion.award.skills[0].cycleXp).toBe(0);
  });

  it('skips archived skills', () => {
    const state = baseState([skill('writing'), skill('fitness', { isArchived: true })]);
    const result = processCompletion(state, 'm3', ctxAt(NOW));

    expect(result.completion.award.skills.map((s) => s.skillId)).toEqual(['writing']);
    expect(result.state.skills[1]).toMatchObject({ level: 1, xp: 0 });
  });

  it('rolls over first, then pays against the new window', () => {
    const later = WEEK_END + DAY_MS;
    // One value drives both the target draw (floor(0.5 × 8) = m4) and the token draw
    const result = processCompletion(baseState(), 'm4', ctxAt(later, constantRng(0.5)));

    expect(result.events.map((e) => e.type)).toEqual([
      'cycle_closed',
      'cycle_opened',
      'mission_completed',
      'cycle_bonus_awarded',
      'skill_leveled_up',
      'player_leveled_up',
    ]);
    expect(result.state.cycleLog).toHaveLength(1);
    expect(result.completion.award.skills[0].cycleId).toBe('writing:2024-01-15T00:00:00.000Z');
  });
});

// ============================================================================
// Validation and Records
// ============================================================================

describe('processCompletion validation', () => {
  it('rejects unknown missions', () => {
    expect(codeOf(() => processCompletion(baseState(), 'nope', ctxAt(NOW)))).toBe(
      'mission_not_found'
    );
  });

  it('rejects archived missions', () => {
    const state = baseState();
    const archived: GameState = {
      ...state,
      missions: state.missions.map((m) => (m.id === 'm3' ? { ...m, isArchived: true } : m)),
    };
    expect(codeOf(() => processCompletion(archived, 'm3', ctxAt(NOW)))).toBe('mission_archived');
  });

  it('appends exactly one record per call and leaves the input alone', () => {
    const state = baseState();
    const result = processCompletion(state, 'm1', ctxAt(NOW));

    expect(result.state.completions).toHaveLength(1);
    expect(result.state.completions[0]).toBe(result.completion);
    expect(result.completion).toMatchObject({ id: 'c1', missionId: 'm1', completedAtMs: NOW, difficulty: 3 });
    expect(state.completions).toHaveLength(0);
    expect(state.player.xp).toBe(0);
    expect(result.state.revision).toBe(3);
  });
});

// ============================================================================
// Reflection Tokens
// ============================================================================

describe('reflection tokens', () => {
  it('issues a token when the draw is under 0.1', () => {
    const result = processCompletion(baseState(), 'm1', ctxAt(NOW, constantRng(0.05)));

    expect(result.completion.reflectionTokenIssued).toBe(true);
    expect(result.events[result.events.length - 1]).toEqual({
      type: 'reflection_token_issued',
      completionId: 'c1',
      missionId: 'm1',
    });
  });

  it('issues nothing for a draw of exactly 0.1', () => {
    const result = processCompletion(baseState(), 'm1', ctxAt(NOW, constantRng(0.1)));
    expect(result.completion.reflectionTokenIssued).toBe(false);
  });

  it(`caps tokens at ${MAX_TOKENS_PER_DAY} per day`, () => {
    let state = baseState();
    const ctx = ctxAt(NOW, constantRng(0));
    for (let i = 0; i < 100; i++) {
      state = processCompletion(state, 'm1', { ...ctx, nowMs: NOW + i * MINUTE_MS }).state;
    }

    expect(state.completions.filter((c) => c.reflectionTokenIssued)).toHaveLength(MAX_TOKENS_PER_DAY);
  });

  it(`caps tokens at ${MAX_TOKENS_PER_SKILL_CYCLE} per skill cycle`, () => {
    let state = baseState();
    const ctx = ctxAt(WEEK_START, constantRng(0));
    // 90-minute spacing keeps all 100 inside the Jan 8 - Jan 15 week
    for (let i = 0; i < 100; i++) {
      state = processCompletion(state, 'm1', { ...ctx, nowMs: WEEK_START + i * 90 * MINUTE_MS }).state;
    }

    expect(state.cycleLog).toHaveLength(0);
    expect(state.completions.filter((c) => c.reflectionTokenIssued)).toHaveLength(
      MAX_TOKENS_PER_SKILL_CYCLE
    );
  });
});
