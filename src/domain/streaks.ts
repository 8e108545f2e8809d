/**
 * Streaks: runs of consecutive aligned days with at least one completion.
 *
 * Derived from completion history on every read, overall and per skill.
 * A completion counts for a skill when its award names that skill.
 *
 * Non-goals (not included):
 * - Streak freezes or repair
 * - Rewards for streak length
 */

import type { GameState, SkillId } from './state.js';
import { alignedDayIndex, alignToDayStart } from './clock.js';

// ============================================================================
// Types
// ============================================================================

export interface Streak {
  /** null for the overall streak */
  skillId: SkillId | null;
  /** Days in the running streak; 0 once it is broken */
  current: number;
  longest: number;
  /** Start of the last aligned day with a completion */
  lastCompletionDayMs: number | null;
  /** Completed today or yesterday */
  isActive: boolean;
  /** Completed yesterday but not yet today */
  atRisk: boolean;
}

export interface StreakStatus {
  overall: Streak;
  skills: Streak[];
  skillsActive: number;
  skillsAtRisk: number;
}

interface DayRuns {
  /** Length of the run ending at the last day */
  last: number;
  longest: number;
}

// ============================================================================
// Computation
// ============================================================================

/**
 * Run lengths over sorted, distinct day indexes.
 */
function dayRuns(days: number[]): DayRuns {
  let run = 0;
  let longest = 0;
  let prev: number | null = null;

  for (const day of days) {
    run = prev !== null && day === prev + 1 ? run + 1 : 1;
    longest = Math.max(longest, run);
    prev = day;
  }

  return { last: run, longest };
}

export function computeStreak(
  state: GameState,
  skillId: SkillId | null,
  nowMs: number
): Streak {
  const counted = state.completions.filter(
    (c) =>
      c.completedAtMs <= nowMs &&
      (skillId === null || c.award.skills.some((s) => s.skillId === skillId))
  );

  if (counted.length === 0) {
    return {
      skillId,
      current: 0,
      longest: 0,
      lastCompletionDayMs: null,
      isActive: false,
      atRisk: false,
    };
  }

  const days = [...new Set(counted.map((c) => alignedDayIndex(c.completedAtMs, state.settings)))]
    .sort((a, b) => a - b);
  const runs = dayRuns(days);
  const lastDay = days[days.length - 1];
  const today = alignedDayIndex(nowMs, state.settings);
  const isActive = today - lastDay <= 1;
  const lastMs = Math.max(...counted.map((c) => c.completedAtMs));

  return {
    skillId,
    current: isActive ? runs.last : 0,
    longest: runs.longest,
    lastCompletionDayMs: alignToDayStart(lastMs, state.settings),
    isActive,
    atRisk: today - lastDay === 1,
  };
}

/**
 * Overall streak plus one per non-archived skill.
 */
export function streakStatus(state: GameState, nowMs: number): StreakStatus {
  const skills = state.skills
    .filter((s) => !s.isArchived)
    .map((s) => computeStreak(state, s.id, nowMs));

  return {
    overall: computeStreak(state, null, nowMs),
    skills,
    skillsActive: skills.filter((s) => s.isActive).length,
    skillsAtRisk: skills.filter((s) => s.atRisk).length,
  };
}
