/**
 * Narrative layer: converts engine events into a player-facing summary.
 *
 * Pure. Picks the single most notable event of a batch and renders one
 * short line for it. A reflection token adds a prompt to whatever line
 * was chosen.
 *
 * Never names a cycle target that has not been hit yet.
 */

import type { EngineEvent } from './events.js';
import type { GameState, SkillId } from './state.js';

export type NarrativeTone = 'calm' | 'warm' | 'bright';

/**
 * NarrativeSummary: Minimal player-facing response.
 */
export interface NarrativeSummary {
  tone: NarrativeTone;
  title: string; // <= 32 chars
  line: string; // <= 140 chars
  reflectionPrompt?: string;
}

export const REFLECTION_PROMPT =
  'A reflection token appeared. What did this mission teach you?';

/**
 * Summarizes events, or returns null when none are worth telling.
 *
 * Priority order:
 * 1. cycle_bonus_awarded
 * 2. player_leveled_up
 * 3. skill_leveled_up
 * 4. capsule_unlocked
 * 5. mission_completed
 * 6. reward_redeemed
 * 7. cycle_opened
 */
export function summarize(
  events: EngineEvent[],
  state: GameState
): NarrativeSummary | null {
  const summary = pickSummary(events, state);
  if (!summary) {
    return null;
  }

  const tokenIssued = events.some((e) => e.type === 'reflection_token_issued');
  return tokenIssued ? { ...summary, reflectionPrompt: REFLECTION_PROMPT } : summary;
}

function pickSummary(
  events: EngineEvent[],
  state: GameState
): NarrativeSummary | null {
  for (const event of events) {
    if (event.type === 'cycle_bonus_awarded') {
      return {
        tone: 'bright',
        title: 'Cycle target hit',
        line: `${skillName(state, event.skillId)} hit its target this cycle. +${event.skillXp} skill XP, +${event.playerXp} XP.`,
      };
    }
  }

  for (const event of events) {
    if (event.type === 'player_leveled_up') {
      return {
        tone: 'bright',
        title: 'Level up',
        line: `You reached level ${event.toLevel}.`,
      };
    }
  }

  for (const event of events) {
    if (event.type === 'skill_leveled_up') {
      return {
        tone: 'warm',
        title: 'Skill level up',
        line: `${skillName(state, event.skillId)} reached level ${event.toLevel}.`,
      };
    }
  }

  for (const event of events) {
    if (event.type === 'capsule_unlocked') {
      return {
        tone: 'warm',
        title: 'Capsule opened',
        line: `"${truncate(event.title, 80)}" is ready to read.`,
      };
    }
  }

  for (const event of events) {
    if (event.type === 'mission_completed') {
      const xp = event.award.basePlayerXp + event.award.cyclePlayerXp;
      return {
        tone: 'warm',
        title: 'Mission complete',
        line: `+${xp} XP, +${event.award.coins} coins.`,
      };
    }
  }

  for (const event of events) {
    if (event.type === 'reward_redeemed') {
      return {
        tone: 'calm',
        title: 'Reward redeemed',
        line: `${event.coinsSpent} coins spent. ${event.coinsRemaining} left.`,
      };
    }
  }

  for (const event of events) {
    if (event.type === 'cycle_opened') {
      const name = skillName(state, event.skillId);
      return {
        tone: 'calm',
        title: 'New cycle',
        line: event.ready
          ? `A new ${name} cycle has begun. One of its missions is the target.`
          : `${name} needs more missions before cycle bonuses apply.`,
      };
    }
  }

  return null;
}

function skillName(state: GameState, skillId: SkillId): string {
  const skill = state.skills.find((s) => s.id === skillId);
  return truncate(skill?.name ?? 'A skill', 40);
}

function truncate(text: string, max: number): string {
  return text.length <= max ? text : `${text.slice(0, max - 1)}…`;
}
