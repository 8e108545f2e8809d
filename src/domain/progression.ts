/**
 * Progression calculator: XP thresholds, reward math and level-up resolution.
 *
 * Pure functions only. Callers pass the current level/xp and get new values
 * back; nothing here reads or writes GameState.
 */

import { InvalidInputError } from './errors.js';

// ============================================================================
// Constants
// ============================================================================

const THRESHOLD_BASE = 120;

const BASE_PLAYER_XP_PER_DIFFICULTY = 4;
const BASE_SKILL_XP_PER_DIFFICULTY = 8;
const COINS_PER_DIFFICULTY = 2;
const CYCLE_PLAYER_XP_PER_DIFFICULTY = 40;
const CYCLE_SKILL_XP_PER_DIFFICULTY = 80;

export const MIN_DIFFICULTY = 1;
export const MAX_DIFFICULTY = 5;

// ============================================================================
// Types
// ============================================================================

export interface RewardAmounts {
  playerXp: number;
  /** Per attached skill for base rewards; targeted skill only for the bonus */
  skillXp: number;
  coins: number;
}

/**
 * LevelProgress: A level with the XP accumulated toward the next one.
 */
export interface LevelProgress {
  level: number;
  xp: number;
}

export interface LevelResolution extends LevelProgress {
  levelsGained: number;
}

// ============================================================================
// Validation
// ============================================================================

export function assertDifficulty(difficulty: number): void {
  if (
    !Number.isInteger(difficulty) ||
    difficulty < MIN_DIFFICULTY ||
    difficulty > MAX_DIFFICULTY
  ) {
    throw new InvalidInputError(
      'invalid_difficulty',
      `Difficulty must be an integer from ${MIN_DIFFICULTY} to ${MAX_DIFFICULTY}, got ${difficulty}`
    );
  }
}

function assertLevel(level: number): void {
  if (!Number.isInteger(level) || level < 1) {
    throw new InvalidInputError(
      'invalid_level',
      `Level must be a positive integer, got ${level}`
    );
  }
}

// ============================================================================
// Thresholds
// ============================================================================

/**
 * XP needed to clear `level`: ceil(120 × level^1.5).
 *
 * Written as level × sqrt(level) so perfect squares stay exact.
 */
export function xpThreshold(level: number): number {
  assertLevel(level);
  return Math.ceil(THRESHOLD_BASE * level * Math.sqrt(level));
}

/**
 * Focus skills climb a doubled bar at every level.
 */
export function effectiveThreshold(level: number, isFocus: boolean): number {
  const base = xpThreshold(level);
  return isFocus ? base * 2 : base;
}

// ============================================================================
// Rewards
// ============================================================================

export function baseReward(difficulty: number): RewardAmounts {
  assertDifficulty(difficulty);
  return {
    playerXp: BASE_PLAYER_XP_PER_DIFFICULTY * difficulty,
    skillXp: BASE_SKILL_XP_PER_DIFFICULTY * difficulty,
    coins: COINS_PER_DIFFICULTY * difficulty,
  };
}

/**
 * Bonus for hitting a skill's cycle target. Never pays coins.
 */
export function cycleBonus(difficulty: number): RewardAmounts {
  assertDifficulty(difficulty);
  return {
    playerXp: CYCLE_PLAYER_XP_PER_DIFFICULTY * difficulty,
    skillXp: CYCLE_SKILL_XP_PER_DIFFICULTY * difficulty,
    coins: 0,
  };
}

// ============================================================================
// Level Resolution
// ============================================================================

/**
 * Adds `award` XP and resolves every level-up it pays for.
 *
 * Cascades: one large award can clear several levels, each against the
 * threshold of the level being cleared.
 */
export function resolveLevelUps(
  current: LevelProgress,
  award: number,
  isFocus = false
): LevelResolution {
  assertLevel(current.level);

  let level = current.level;
  let xp = current.xp + award;
  let threshold = effectiveThreshold(level, isFocus);

  while (xp >= threshold) {
    xp -= threshold;
    level += 1;
    threshold = effectiveThreshold(level, isFocus);
  }

  return { level, xp, levelsGained: level - current.level };
}

/**
 * Progress toward the next level, for display.
 */
export function progressToNextLevel(
  current: LevelProgress,
  isFocus = false
): { needed: number; fraction: number } {
  const needed = effectiveThreshold(current.level, isFocus);
  return { needed, fraction: Math.min(1, current.xp / needed) };
}
