/**
 * Progression calculator unit tests.
 *
 * Thresholds, reward amounts and the level-up cascade.
 */

import { describe, it, expect } from 'vitest';
import {
  baseReward,
  cycleBonus,
  effectiveThreshold,
  progressToNextLevel,
  resolveLevelUps,
  xpThreshold,
} from '../src/domain/progression.js';
import { InvalidInputError, isEngineError } from '../src/domain/errors.js';

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return isEngineError(error) ? error.code : undefined;
  }
  return undefined;
}

describe('xpThreshold', () => {
  it('matches ceil(120 × level^1.5) for the first levels', () => {
    expect(xpThreshold(1)).toBe(120);
    expect(xpThreshold(2)).toBe(340);
    expect(xpThreshold(3)).toBe(624);
    expect(xpThreshold(4)).toBe(960);
  });

  it('is strictly increasing', () => {
    for (let level = 1; level < 60; level++) {
      expect(xpThreshold(level + 1)).toBeGreaterThan(xpThreshold(level));
    }
  });

  it('rejects levels below 1 and non-integers', () => {
    for (const bad of [0, -1, 1.5, Number.NaN]) {
      expect(() => xpThreshold(bad)).toThrow(InvalidInputError);
    }
    expect(codeOf(() => xpThreshold(0))).toBe('invalid_level');
  });

  it('doubles for focus skills', () => {
    expect(effectiveThreshold(1, true)).toBe(240);
    expect(effectiveThreshold(2, true)).toBe(680);
    expect(effectiveThreshold(2, false)).toBe(340);
  });
});

describe('rewards', () => {
  it('pays base rewards linear in difficulty', () => {
    expect(baseReward(1)).toEqual({ playerXp: 4, skillXp: 8, coins: 2 });
    expect(baseReward(3)).toEqual({ playerXp: 12, skillXp: 24, coins: 6 });
    expect(baseReward(5)).toEqual({ playerXp: 20, skillXp: 40, coins: 10 });
  });

  it('pays the cycle bonus without coins', () => {
    expect(cycleBonus(3)).toEqual({ playerXp: 120, skillXp: 240, coins: 0 });
    expect(cycleBonus(5)).toEqual({ playerXp: 200, skillXp: 400, coins: 0 });
  });

  it('keeps coins at 2D and the cycle bonus at ten times the base for every difficulty', () => {
    for (let d = 1; d <= 5; d++) {
      const base = baseReward(d);
      const bonus = cycleBonus(d);

      expect(base).toEqual({ playerXp: 4 * d, skillXp: 8 * d, coins: 2 * d });
      expect(bonus).toEqual({ playerXp: 40 * d, skillXp: 80 * d, coins: 0 });
      expect(bonus.playerXp).toBe(10 * base.playerXp);
      expect(bonus.skillXp).toBe(10 * base.skillXp);
    }
  });

  it('rejects difficulty outside 1-5', () => {
    for (const bad of [0, 6, 2.5, -3]) {
      expect(codeOf(() => baseReward(bad))).toBe('invalid_difficulty');
      expect(codeOf(() => cycleBonus(bad))).toBe('invalid_difficulty');
    }
  });
});

describe('resolveLevelUps', () => {
  it('carries the remainder over a level-up', () => {
    expect(resolveLevelUps({ level: 1, xp: 0 }, 132)).toEqual({
      level: 2,
      xp: 12,
      levelsGained: 1,
    });
  });

  it('cascades through several levels in one award', () => {
    expect(resolveLevelUps({ level: 1, xp: 0 }, 120 + 340 + 10)).toEqual({
      level: 3,
      xp: 10,
      levelsGained: 2,
    });
  });

  it('levels exactly at the threshold', () => {
    expect(resolveLevelUps({ level: 2, xp: 300 }, 40)).toEqual({
      level: 3,
      xp: 0,
      levelsGained: 1,
    });
  });

  it('holds focus skills to the doubled bar', () => {
    expect(resolveLevelUps({ level: 1, xp: 0 }, 239, true)).toEqual({
      level: 1,
      xp: 239,
      levelsGained: 0,
    });
    expect(resolveLevelUps({ level: 1, xp: 0 }, 264, true)).toEqual({
      level: 2,
      xp: 24,
      levelsGained: 1,
    });
  });

  it('reports progress toward the next level', () => {
    expect(progressToNextLevel({ level: 1, xp: 60 })).toEqual({ needed: 120, fraction: 0.5 });
    expect(progressToNextLevel({ level: 1, xp: 60 }, true)).toEqual({ needed: 240, fraction: 0.25 });
  });
});
