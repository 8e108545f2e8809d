/**
 * Completion processor: one mission completion, start to finish.
 *
 * Steps, in order:
 * 1. Validate the mission
 * 2. Roll over any skill whose window has ended
 * 3. Base rewards, then the cycle bonus for each skill the mission targets
 * 4. Level-ups for every attached skill and the player
 * 5. One reflection draw, gated by the daily and per-skill-cycle caps
 * 6. Append exactly one completion record
 *
 * Token caps are recounted from completion history on every call, so an
 * imported history enforces them the same way a live one does.
 */

import type {
  CompletionAward,
  CompletionRecord,
  CycleId,
  GameState,
  Mission,
  MissionId,
  SkillAward,
  SkillId,
} from './state.js';
import type { EngineEvent, TransitionResult } from './events.js';
import type { EngineContext } from './context.js';
import type { TimeWindow } from './clock.js';
import { dayWindow } from './clock.js';
import {
  alreadyCreditedThisCycle,
  currentCycleId,
  cycleStatus,
  rolloverDueCycles,
} from './cycles.js';
import { NotFoundError, StateViolationError } from './errors.js';
import { baseReward, cycleBonus, resolveLevelUps } from './progression.js';

export const REFLECTION_PROBABILITY = 0.1;
export const MAX_TOKENS_PER_DAY = 2;
export const MAX_TOKENS_PER_SKILL_CYCLE = 7;

export interface CompletionResult extends TransitionResult {
  completion: CompletionRecord;
}

// ============================================================================
// Lookups
// ============================================================================

export function findMission(
  state: GameState,
  missionId: MissionId
): Mission | undefined {
  return state.missions.find((m) => m.id === missionId);
}

export function requireMission(state: GameState, missionId: MissionId): Mission {
  const mission = findMission(state, missionId);
  if (!mission) {
    throw new NotFoundError('mission_not_found', `Unknown mission: ${missionId}`);
  }
  return mission;
}

// ============================================================================
// Token Counting
// ============================================================================

export function tokensIssuedInWindow(
  completions: CompletionRecord[],
  window: TimeWindow
): number {
  return completions.filter(
    (c) =>
      c.reflectionTokenIssued &&
      c.completedAtMs >= window.startMs &&
      c.completedAtMs < window.endMs
  ).length;
}

export function tokensIssuedForSkillCycle(
  completions: CompletionRecord[],
  skillId: SkillId,
  cycleId: CycleId
): number {
  return completions.filter(
    (c) =>
      c.reflectionTokenIssued &&
      c.award.skills.some((s) => s.skillId === skillId && s.cycleId === cycleId)
  ).length;
}

function tokenAllowed(
  state: GameState,
  skills: SkillAward[],
  nowMs: number
): boolean {
  const day = dayWindow(nowMs, state.settings);
  if (tokensIssuedInWindow(state.completions, day) >= MAX_TOKENS_PER_DAY) {
    return false;
  }
  return skills.every(
    (s) =>
      s.cycleId === null ||
      tokensIssuedForSkillCycle(state.completions, s.skillId, s.cycleId) <
        MAX_TOKENS_PER_SKILL_CYCLE
  );
}

// ============================================================================
// Completion
// ============================================================================

/**
 * Completes a mission.
 *
 * Each (mission, skill) pair is judged on its own: a mission attached to
 * two skills can take the bonus for both in one completion.
 *
 * @throws NotFoundError when the mission does not exist
 * @throws StateViolationError when the mission is archived
 */
export function processCompletion(
  state: GameState,
  missionId: MissionId,
  ctx: EngineContext
): CompletionResult {
  const mission = requireMission(state, missionId);
  if (mission.isArchived) {
    throw new StateViolationError(
      'mission_archived',
      `Mission ${missionId} is archived`
    );
  }

  const rolled = rolloverDueCycles(state, ctx.nowMs, ctx.rng);
  const events: EngineEvent[] = [];
  const current = rolled.state;

  const base = baseReward(mission.difficulty);
  const bonus = cycleBonus(mission.difficulty);

  let cyclePlayerXp = 0;
  const skillAwards: SkillAward[] = [];

  const skills = current.skills.map((skill) => {
    if (skill.isArchived || !mission.skillIds.includes(skill.id)) {
      return skill;
    }

    const cycleId = currentCycleId(skill);
    const earnsBonus =
      cycleId !== null &&
      cycleStatus(skill, ctx.nowMs) === 'ACTIVE' &&
      skill.targetMissionId === mission.id &&
      !skill.hasHitTargetThisCycle &&
      !alreadyCreditedThisCycle(current.completions, mission.id, skill.id, cycleId);

    const cycleXp = earnsBonus ? bonus.skillXp : 0;
    const resolved = resolveLevelUps(
      { level: skill.level, xp: skill.xp },
      base.skillXp + cycleXp,
      skill.isFocus
    );

    skillAwards.push({
      skillId: skill.id,
      cycleId,
      baseXp: base.skillXp,
      cycleXp,
      levelBefore: skill.level,
      levelAfter: resolved.level,
    });

    if (earnsBonus && cycleId !== null) {
      cyclePlayerXp += bonus.playerXp;
      events.push({
        type: 'cycle_bonus_awarded',
        skillId: skill.id,
        missionId: mission.id,
        cycleId,
        playerXp: bonus.playerXp,
        skillXp: bonus.skillXp,
      });
    }
    if (resolved.levelsGained > 0) {
      events.push({
        type: 'skill_leveled_up',
        skillId: skill.id,
        fromLevel: skill.level,
        toLevel: resolved.level,
      });
    }

    return {
      ...skill,
      level: resolved.level,
      xp: resolved.xp,
      hasHitTargetThisCycle: skill.hasHitTargetThisCycle || earnsBonus,
    };
  });

  const player = current.player;
  const playerResolved = resolveLevelUps(
    { level: player.level, xp: player.xp },
    base.playerXp + cyclePlayerXp
  );
  if (playerResolved.levelsGained > 0) {
    events.push({
      type: 'player_leveled_up',
      fromLevel: player.level,
      toLevel: playerResolved.level,
    });
  }

  // Always draw, so the RNG stream does not depend on the caps
  const draw = ctx.rng.next();
  const reflectionTokenIssued =
    draw < REFLECTION_PROBABILITY && tokenAllowed(current, skillAwards, ctx.nowMs);

  const award: CompletionAward = {
    basePlayerXp: base.playerXp,
    cyclePlayerXp,
    coins: base.coins,
    skills: skillAwards,
    playerLevelBefore: player.level,
    playerLevelAfter: playerResolved.level,
  };

  const completion: CompletionRecord = {
    id: ctx.newId(),
    missionId: mission.id,
    completedAtMs: ctx.nowMs,
    difficulty: mission.difficulty,
    award,
    reflectionTokenIssued,
  };

  events.unshift(...rolled.events, {
    type: 'mission_completed',
    completionId: completion.id,
    missionId: mission.id,
    award,
  });
  if (reflectionTokenIssued) {
    events.push({
      type: 'reflection_token_issued',
      completionId: completion.id,
      missionId: mission.id,
    });
  }

  return {
    state: {
      ...current,
      player: {
        ...player,
        level: playerResolved.level,
        xp: playerResolved.xp,
        coins: player.coins + base.coins,
      },
      skills,
      completions: [...current.completions, completion],
    },
    events,
    completion,
  };
}
