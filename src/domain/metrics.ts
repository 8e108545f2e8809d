/**
 * Per-skill metrics: Variety and Consistency.
 *
 * - Variety: how evenly the current cycle's completions spread over the
 *   skill's assigned missions (normalized Shannon entropy)
 * - Consistency: share of recent targeted cycles whose target was hit
 *
 * Both are read-only views over history. Neither feeds rewards.
 */

import type { GameState, Skill } from './state.js';
import { assignedMissionIds, currentCycleId } from './cycles.js';

// ============================================================================
// Types
// ============================================================================

export type VarietyRating = 'none' | 'low' | 'fair' | 'good';
export type ConsistencyRating = 'poor' | 'needs work' | 'good' | 'excellent';

export interface VarietyScore {
  /** 0..1 */
  score: number;
  rating: VarietyRating;
  completedMissions: number;
  assignedMissions: number;
  totalCompletions: number;
}

export interface ConsistencyScore {
  /** 0..1 */
  score: number;
  rating: ConsistencyRating;
  cyclesHit: number;
  cyclesCounted: number;
}

export interface SkillMetrics {
  variety: VarietyScore | null;
  consistency: ConsistencyScore | null;
}

export const VARIETY_MIN_MISSIONS = 2;
export const CONSISTENCY_LOOKBACK_CYCLES = 6;

// ============================================================================
// Ratings
// ============================================================================

function varietyRating(score: number): VarietyRating {
  if (score >= 0.7) return 'good';
  if (score >= 0.4) return 'fair';
  return 'low';
}

function consistencyRating(score: number): ConsistencyRating {
  if (score >= 0.8) return 'excellent';
  if (score >= 0.6) return 'good';
  if (score >= 0.3) return 'needs work';
  return 'poor';
}

// ============================================================================
// Metrics
// ============================================================================

/**
 * Variety over the current cycle. Null before the first window or with
 * fewer than two assigned missions.
 */
export function varietyScore(state: GameState, skill: Skill): VarietyScore | null {
  const cycleId = currentCycleId(skill);
  const assigned = assignedMissionIds(state.missions, skill.id);
  if (cycleId === null || assigned.length < VARIETY_MIN_MISSIONS) {
    return null;
  }

  const counts = new Map<string, number>();
  for (const c of state.completions) {
    if (
      assigned.includes(c.missionId) &&
      c.award.skills.some((s) => s.skillId === skill.id && s.cycleId === cycleId)
    ) {
      counts.set(c.missionId, (counts.get(c.missionId) ?? 0) + 1);
    }
  }

  let total = 0;
  for (const n of counts.values()) total += n;

  if (total === 0) {
    return {
      score: 0,
      rating: 'none',
      completedMissions: 0,
      assignedMissions: assigned.length,
      totalCompletions: 0,
    };
  }

  let entropy = 0;
  for (const n of counts.values()) {
    const p = n / total;
    entropy -= p * Math.log2(p);
  }
  const score = entropy / Math.log2(assigned.length);

  return {
    score,
    rating: varietyRating(score),
    completedMissions: counts.size,
    assignedMissions: assigned.length,
    totalCompletions: total,
  };
}

/**
 * Hit rate over the last logged cycles that had a target. An open cycle
 * counts once its target is hit; a miss is only known when it closes.
 * Null with nothing to count.
 */
export function consistencyScore(
  state: GameState,
  skill: Skill,
  lookback = CONSISTENCY_LOOKBACK_CYCLES
): ConsistencyScore | null {
  const closed = state.cycleLog.filter(
    (r) => r.skillId === skill.id && r.targetMissionId !== null
  );
  const outcomes = closed.map((r) => r.hit);
  if (skill.hasHitTargetThisCycle && skill.targetMissionId !== null) {
    outcomes.push(true);
  }

  const recent = outcomes.slice(-lookback);
  if (recent.length === 0) {
    return null;
  }

  const cyclesHit = recent.filter(Boolean).length;
  const score = cyclesHit / recent.length;
  return {
    score,
    rating: consistencyRating(score),
    cyclesHit,
    cyclesCounted: recent.length,
  };
}

export function skillMetrics(state: GameState, skill: Skill): SkillMetrics {
  return {
    variety: varietyScore(state, skill),
    consistency: consistencyScore(state, skill),
  };
}
