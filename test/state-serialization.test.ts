import { describe, it, expect } from 'vitest';
import {
  deserializeState,
  parseStoredState,
  serializeState,
} from '../src/http/state-serialization.js';
import { completeMission, createInitialState, createMission, createSkill } from '../src/domain/engine.js';
import { isEngineError } from '../src/domain/errors.js';
import type { EngineContext } from '../src/domain/context.js';
import type { GameState } from '../src/domain/state.js';

function sampleState(): GameState {
  let counter = 0;
  const ctx: EngineContext = {
    nowMs: Date.UTC(2024, 0, 10),
    rng: { next: () => 0.05 },
    newId: () => `id-${++counter}`,
  };

  let state = createInitialState({ displayName: 'Test' }, ctx);
  const skill = createSkill(state, { name: 'Writing', cadence: { kind: 'custom', intervalDays: 3 } }, ctx);
  state = skill.state;
  const mission = createMission(
    state,
    { title: 'Draft', note: 'one page', skillIds: [skill.skill.id], difficulty: 2, energy: 1 },
    ctx
  );
  return completeMission(mission.state, mission.mission.id, ctx).state;
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return isEngineError(error) ? error.code : undefined;
  }
  return undefined;
}

describe('state serialization', () => {
  it('reads back exactly what it wrote', () => {
    const state = sampleState();
    expect(deserializeState(serializeState(state))).toEqual(state);
  });

  it('rejects text that is not JSON', () => {
    expect(codeOf(() => deserializeState('{not json'))).toBe('invalid_stored_state');
  });

  it('names the offending fields', () => {
    const state = sampleState();
    const broken = {
      ...state,
      player: { ...state.player, level: 0 },
      missions: state.missions.map((m) => ({ ...m, difficulty: 9 })),
    };

    try {
      parseStoredState(broken);
      expect.unreachable('parseStoredState should have thrown');
    } catch (error) {
      expect(isEngineError(error) && error.code).toBe('invalid_stored_state');
      const message = error instanceof Error ? error.message : '';
      expect(message).toContain('player.level');
      expect(message).toContain('missions.0.difficulty');
    }
  });

  it('rejects an unknown cadence', () => {
    const state = sampleState();
    const broken = {
      ...state,
      skills: state.skills.map((s) => ({ ...s, cadence: { kind: 'hourly' } })),
    };
    expect(codeOf(() => parseStoredState(broken))).toBe('invalid_stored_state');
  });

  it('rejects records that point at nothing or share an id', () => {
    const state = sampleState();
    const [skill] = state.skills;
    const broken = {
      ...state,
      skills: [{ ...skill, targetMissionId: 'ghost' }, { ...skill }],
      missions: [...state.missions, { ...state.missions[0], id: 'stray', skillIds: ['nope'] }],
      cycleLog: [
        { skillId: 'gone', cycleId: 'gone:x', startMs: 0, endMs: 1, targetMissionId: null, hit: false },
      ],
    };

    expect(() => parseStoredState(broken)).toThrow(
      'Stored state is invalid: ' +
        'skills.1.id: Duplicate id id-2; ' +
        'missions.1.skillIds.0: Unknown skill nope; ' +
        'skills.0.targetMissionId: Target ghost is not a live mission of skill id-2; ' +
        'cycleLog.0.skillId: Unknown skill gone'
    );
  });

  it('rejects a target that is archived or belongs to another skill', () => {
    const state = sampleState();
    const [skill] = state.skills;
    const [mission] = state.missions;

    const archived = {
      ...state,
      skills: [{ ...skill, targetMissionId: mission.id }],
      missions: [{ ...mission, isArchived: true }],
    };
    expect(codeOf(() => parseStoredState(archived))).toBe('invalid_stored_state');

    const foreign = {
      ...state,
      skills: [...state.skills, { ...skill, id: 'other', targetMissionId: mission.id }],
    };
    expect(codeOf(() => parseStoredState(foreign))).toBe('invalid_stored_state');
    const valid = { ...state, skills: [{ ...skill, targetMissionId: mission.id }] };
    expect(codeOf(() => parseStoredState(valid))).toBeUndefined();
  });
});
