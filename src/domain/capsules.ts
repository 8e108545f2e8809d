/**
 * Capsule trigger: unlock evaluation for time capsules.
 *
 * Stateless. Each trigger is checked against every pending capsule; a
 * capsule unlocks at most once and re-evaluating an unlocked one is a no-op.
 *
 * Non-goals (not included):
 * - Capsule body encryption (body is opaque here)
 * - Scheduling of date ticks (callers tick)
 */

import type { Capsule, CapsuleCondition, GameState, MissionId, SkillId } from './state.js';
import type { CapsuleUnlockedEvent, EngineEvent } from './events.js';

// ============================================================================
// Triggers
// ============================================================================

/**
 * CapsuleTrigger: One of the four occasions a capsule can open on.
 *
 * The date tick carries a level snapshot so that a level capsule created
 * after the level was already reached still opens.
 */
export type CapsuleTrigger =
  | {
      type: 'date';
      nowMs: number;
      playerLevel: number;
      skillLevels: Record<SkillId, number>;
    }
  | { type: 'mission_completed'; missionId: MissionId }
  | { type: 'skill_level_up'; skillId: SkillId; level: number }
  | { type: 'player_level_up'; level: number };

export function dateTrigger(state: GameState, nowMs: number): CapsuleTrigger {
  const skillLevels: Record<SkillId, number> = {};
  for (const skill of state.skills) {
    skillLevels[skill.id] = skill.level;
  }
  return { type: 'date', nowMs, playerLevel: state.player.level, skillLevels };
}

/**
 * Capsule triggers implied by a batch of engine events.
 */
export function triggersFromEvents(events: EngineEvent[]): CapsuleTrigger[] {
  const triggers: CapsuleTrigger[] = [];
  for (const event of events) {
    switch (event.type) {
      case 'mission_completed':
        triggers.push({ type: 'mission_completed', missionId: event.missionId });
        break;
      case 'skill_leveled_up':
        triggers.push({
          type: 'skill_level_up',
          skillId: event.skillId,
          level: event.toLevel,
        });
        break;
      case 'player_leveled_up':
        triggers.push({ type: 'player_level_up', level: event.toLevel });
        break;
    }
  }
  return triggers;
}

// ============================================================================
// Evaluation
// ============================================================================

export function isSatisfied(
  condition: CapsuleCondition,
  trigger: CapsuleTrigger
): boolean {
  switch (condition.type) {
    case 'date':
      return trigger.type === 'date' && trigger.nowMs >= condition.unlockAtMs;

    case 'mission_completion':
      return (
        trigger.type === 'mission_completed' &&
        trigger.missionId === condition.missionId
      );

    case 'skill_level':
      if (trigger.type === 'skill_level_up') {
        return trigger.skillId === condition.skillId && trigger.level >= condition.level;
      }
      if (trigger.type === 'date') {
        const level = trigger.skillLevels[condition.skillId];
        return level !== undefined && level >= condition.level;
      }
      return false;

    case 'player_level':
      if (trigger.type === 'player_level_up' || trigger.type === 'date') {
        const level = trigger.type === 'date' ? trigger.playerLevel : trigger.level;
        return level >= condition.level;
      }
      return false;
  }
}

/**
 * Unlocks every pending capsule the trigger satisfies.
 */
export function evaluateCapsules(
  capsules: Capsule[],
  trigger: CapsuleTrigger,
  nowMs: number
): { capsules: Capsule[]; events: CapsuleUnlockedEvent[] } {
  const events: CapsuleUnlockedEvent[] = [];

  const next = capsules.map((capsule) => {
    if (capsule.unlockedAtMs !== null || !isSatisfied(capsule.condition, trigger)) {
      return capsule;
    }
    events.push({ type: 'capsule_unlocked', capsuleId: capsule.id, title: capsule.title });
    return { ...capsule, unlockedAtMs: nowMs };
  });

  return { capsules: events.length === 0 ? capsules : next, events };
}
