/**
 * Cycle manager: per-skill cycle state machine and one-credit-per-cycle checks.
 *
 * States are derived, never stored:
 * - AWAITING_ROLLOVER: no window yet, or the clock has reached cycleEnd
 * - NOT_READY: window open, no target (fewer than 8 missions when it opened)
 * - ACTIVE: window open with a target
 *
 * Readiness is evaluated only when a window opens. A skill that drops below
 * the threshold mid-cycle keeps its target until the next rollover.
 *
 * Non-goals (not included):
 * - Reward math (belongs in progression.ts)
 * - Completion bookkeeping (belongs in completion.ts)
 */

import type {
  CompletionRecord,
  CycleId,
  CycleRecord,
  CycleStatus,
  GameState,
  Mission,
  MissionId,
  Settings,
  Skill,
  SkillId,
} from './state.js';
import type {
  CycleClosedEvent,
  CycleOpenedEvent,
  EngineEvent,
  TransitionResult,
} from './events.js';
import { cycleWindow } from './clock.js';
import { StateViolationError } from './errors.js';
import { pickIndex, type Rng } from './rng.js';

export const READINESS_THRESHOLD = 8;

// ============================================================================
// Derived Values
// ============================================================================

export function cycleIdFor(skillId: SkillId, cycleStartMs: number): CycleId {
  return `${skillId}:${new Date(cycleStartMs).toISOString()}`;
}

export function currentCycleId(skill: Skill): CycleId | null {
  return skill.cycleStartMs === null
    ? null
    : cycleIdFor(skill.id, skill.cycleStartMs);
}

/**
 * Non-archived missions that list the skill, in mission order.
 */
export function assignedMissionIds(
  missions: Mission[],
  skillId: SkillId
): MissionId[] {
  return missions
    .filter((m) => !m.isArchived && m.skillIds.includes(skillId))
    .map((m) => m.id);
}

export function cycleStatus(skill: Skill, nowMs: number): CycleStatus {
  if (skill.cycleEndMs === null || nowMs >= skill.cycleEndMs) {
    return 'AWAITING_ROLLOVER';
  }
  return skill.targetMissionId === null ? 'NOT_READY' : 'ACTIVE';
}

// ============================================================================
// Credit Enforcement
// ============================================================================

/**
 * True when history already holds a cycle award for this exact
 * (mission, skill, cycle) triple. Repeated calls give the same answer.
 */
export function alreadyCreditedThisCycle(
  completions: CompletionRecord[],
  missionId: MissionId,
  skillId: SkillId,
  cycleId: CycleId
): boolean {
  return completions.some(
    (c) =>
      c.missionId === missionId &&
      c.award.skills.some(
        (s) => s.skillId === skillId && s.cycleId === cycleId && s.cycleXp > 0
      )
  );
}

/**
 * True when any mission took the cycle bonus for the skill in this cycle,
 * or at any time since `sinceMs`.
 *
 * The time test covers windows of another cadence that overlap this one.
 */
export function hasCycleAward(
  completions: CompletionRecord[],
  skillId: SkillId,
  cycleId: CycleId,
  sinceMs = Number.POSITIVE_INFINITY
): boolean {
  return completions.some((c) =>
    c.award.skills.some(
      (s) =>
        s.skillId === skillId &&
        s.cycleXp > 0 &&
        (s.cycleId === cycleId || c.completedAtMs >= sinceMs)
    )
  );
}

// ============================================================================
// Target Selection
// ============================================================================

/**
 * Uniform pick from the skill's assigned missions.
 *
 * Fails for a skill that is not ready; readiness gates every seeding.
 */
export function seedTarget(
  skill: Skill,
  assigned: MissionId[],
  rng: Rng
): MissionId {
  if (assigned.length < READINESS_THRESHOLD) {
    throw new StateViolationError(
      'skill_not_ready',
      `Skill ${skill.id} has ${assigned.length}/${READINESS_THRESHOLD} missions; no target can be seeded`
    );
  }
  return assigned[pickIndex(rng, assigned.length)];
}

// ============================================================================
// Window Transitions
// ============================================================================

/**
 * Opens the window containing `nowMs` and evaluates readiness.
 */
export function openCycle(
  skill: Skill,
  missions: Mission[],
  completions: CompletionRecord[],
  settings: Settings,
  nowMs: number,
  rng: Rng,
  carryHit = false
): { skill: Skill; event: CycleOpenedEvent } {
  const window = cycleWindow(skill.cadence, nowMs, settings);
  const cycleId = cycleIdFor(skill.id, window.startMs);
  const assigned = assignedMissionIds(missions, skill.id);
  const ready = assigned.length >= READINESS_THRESHOLD;

  const targetMissionId = ready ? seedTarget(skill, assigned, rng) : null;

  const opened: Skill = {
    ...skill,
    cycleStartMs: window.startMs,
    cycleEndMs: window.endMs,
    targetMissionId,
    // A bonus already paid inside this window counts against it
    hasHitTargetThisCycle:
      ready && (carryHit || hasCycleAward(completions, skill.id, cycleId, window.startMs)),
    notReadySinceMs: ready
      ? null
      : skill.notReadySinceMs ?? Math.max(window.startMs, skill.createdAtMs),
  };

  return {
    skill: opened,
    event: {
      type: 'cycle_opened',
      skillId: skill.id,
      cycleId,
      startMs: window.startMs,
      endMs: window.endMs,
      ready,
      targetMissionId,
    },
  };
}

/**
 * Snapshot of the window being left, or null if none was open.
 */
export function closeCycle(
  skill: Skill,
  nowMs: number
): { record: CycleRecord; event: CycleClosedEvent } | null {
  if (skill.cycleStartMs === null || skill.cycleEndMs === null) {
    return null;
  }

  const cycleId = cycleIdFor(skill.id, skill.cycleStartMs);
  return {
    record: {
      skillId: skill.id,
      cycleId,
      startMs: skill.cycleStartMs,
      endMs: Math.min(skill.cycleEndMs, nowMs),
      targetMissionId: skill.targetMissionId,
      hit: skill.hasHitTargetThisCycle,
    },
    event: {
      type: 'cycle_closed',
      skillId: skill.id,
      cycleId,
      hit: skill.hasHitTargetThisCycle,
    },
  };
}

/**
 * Closes the skill's current window (if any) and opens a fresh one.
 *
 * With `carryHit`, a hit in the closed window also counts for the new one.
 */
function cycleSkill(
  state: GameState,
  skill: Skill,
  nowMs: number,
  rng: Rng,
  carryHit: boolean
): { skill: Skill; record: CycleRecord | null; events: EngineEvent[] } {
  const events: EngineEvent[] = [];
  const closed = closeCycle(skill, nowMs);
  if (closed) {
    events.push(closed.event);
  }

  const opened = openCycle(
    skill,
    state.missions,
    state.completions,
    state.settings,
    nowMs,
    rng,
    carryHit && skill.hasHitTargetThisCycle
  );
  events.push(opened.event);

  return { skill: opened.skill, record: closed?.record ?? null, events };
}

/**
 * Processes every skill whose window has ended (or never opened).
 *
 * Deterministic given the clock, the skills, the missions and the RNG.
 * Skills are visited in state order, so target draws happen in that order.
 */
export function rolloverDueCycles(
  state: GameState,
  nowMs: number,
  rng: Rng
): TransitionResult {
  const events: EngineEvent[] = [];
  const records: CycleRecord[] = [];

  const skills = state.skills.map((skill) => {
    if (skill.isArchived || cycleStatus(skill, nowMs) !== 'AWAITING_ROLLOVER') {
      return skill;
    }
    const result = cycleSkill(state, skill, nowMs, rng, false);
    events.push(...result.events);
    if (result.record) {
      records.push(result.record);
    }
    return result.skill;
  });

  if (events.length === 0) {
    return { state, events };
  }

  return {
    state: { ...state, skills, cycleLog: [...state.cycleLog, ...records] },
    events,
  };
}

/**
 * Ends the current window early and opens a new one now.
 *
 * Used when the cadence changes: the new cadence defines a new window.
 * The new window starts out hit when the window it replaces was hit, or
 * when any bonus for the skill landed inside its bounds, so switching
 * cadence never pays a second bonus for the same stretch of time.
 */
export function restartCycle(
  state: GameState,
  skillId: SkillId,
  nowMs: number,
  rng: Rng
): TransitionResult {
  const events: EngineEvent[] = [];
  const records: CycleRecord[] = [];

  const skills = state.skills.map((skill) => {
    if (skill.id !== skillId) {
      return skill;
    }
    const result = cycleSkill(state, skill, nowMs, rng, true);
    events.push(...result.events);
    if (result.record) {
      records.push(result.record);
    }
    return result.skill;
  });

  return {
    state: { ...state, skills, cycleLog: [...state.cycleLog, ...records] },
    events,
  };
}

/**
 * Replaces a target that is no longer assigned (mission archived).
 *
 * The window and the hit flag are untouched. With no missions left the
 * target is cleared and the skill sits NOT_READY from now until the next
 * rollover.
 */
export function reseedRemovedTarget(
  state: GameState,
  removedMissionId: MissionId,
  nowMs: number,
  rng: Rng
): TransitionResult {
  const events: EngineEvent[] = [];

  const skills = state.skills.map((skill) => {
    if (skill.targetMissionId !== removedMissionId || skill.cycleStartMs === null) {
      return skill;
    }

    const remaining = assignedMissionIds(state.missions, skill.id).filter(
      (id) => id !== removedMissionId
    );
    const targetMissionId =
      remaining.length > 0 ? remaining[pickIndex(rng, remaining.length)] : null;

    events.push({
      type: 'target_reseeded',
      skillId: skill.id,
      cycleId: cycleIdFor(skill.id, skill.cycleStartMs),
      targetMissionId,
    });

    return {
      ...skill,
      targetMissionId,
      notReadySinceMs: targetMissionId === null ? nowMs : skill.notReadySinceMs,
    };
  });

  return events.length === 0
    ? { state, events }
    : { state: { ...state, skills }, events };
}
