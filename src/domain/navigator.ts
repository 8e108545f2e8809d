/**
 * Navigator: read-only pattern detection and ranked suggestions.
 *
 * Each pattern is an independent detector in a fixed, ordered registry.
 * A detector looks at a state snapshot and returns at most one detection.
 * Ordering of the output is fully determined:
 * priority, then confidence (desc), then relevantAtMs (desc), then
 * registry order.
 *
 * Non-goals (not included):
 * - Persisting suggestions (they are rebuilt on every run)
 * - Gating any engine operation on a suggestion
 */

import type { GameState, Skill, SkillId } from './state.js';
import { cadencePeriodMs, DAY_MS } from './clock.js';
import { assignedMissionIds, READINESS_THRESHOLD } from './cycles.js';

// ============================================================================
// Types
// ============================================================================

export type SuggestionKind =
  | 'readiness_gap'
  | 'cycle_underperformance'
  | 'skill_imbalance'
  | 'reflection_lapse'
  | 'focus_saturation'
  | 'coin_hoarding'
  | 'difficulty_skew';

export type SuggestionPriority = 'high' | 'normal' | 'low';

export interface Suggestion {
  /** `${kind}:${subjectId ?? 'all'}`, stable across runs */
  id: string;
  kind: SuggestionKind;
  priority: SuggestionPriority;
  /** 0..1 */
  confidence: number;
  title: string;
  message: string;
  actionHint: string;
  subjectId: SkillId | null;
  /** When the pattern became relevant; newer wins ties */
  relevantAtMs: number;
}

export type Detection = Omit<Suggestion, 'id' | 'kind' | 'priority'>;

export interface Detector {
  kind: SuggestionKind;
  /** Highest priority this kind may reach */
  maxPriority: SuggestionPriority;
  detect(state: GameState, nowMs: number): Detection | null;
}

export interface NavigatorOptions {
  maxSuggestions?: number;
}

// ============================================================================
// Thresholds
// ============================================================================

export const DEFAULT_MAX_SUGGESTIONS = 3;

const IMBALANCE_MIN_GAP = 3;
const IMBALANCE_FULL_GAP = 5;

const UNDERPERFORMANCE_WINDOW = 4;
const UNDERPERFORMANCE_MIN_CYCLES = 2;
const UNDERPERFORMANCE_MAX_RATE = 0.5;

const REFLECTION_LAPSE_PERIODS = 2;

const FOCUS_MAX = 2;
const FOCUS_NONE_CONFIDENCE = 0.3;

const HOARD_MULTIPLE = 5;
const HOARD_FULL_MULTIPLE = 10;
const HOARD_NO_REWARDS_COINS = 50;
const HOARD_NO_REWARDS_CONFIDENCE = 0.8;
const HOARD_REDEMPTION_LOOKBACK_MS = 30 * DAY_MS;

const SKEW_WINDOW = 20;
const SKEW_MIN_COMPLETIONS = 5;
const SKEW_SHARE = 0.7;

const PRIORITY_RANK: Record<SuggestionPriority, number> = {
  high: 0,
  normal: 1,
  low: 2,
};

// ============================================================================
// Helpers
// ============================================================================

function activeSkills(state: GameState): Skill[] {
  return state.skills.filter((s) => !s.isArchived);
}

/**
 * Keeps the strongest detection; on a tie the earlier one stays.
 */
function strongest(a: Detection | null, b: Detection | null): Detection | null {
  if (a === null) return b;
  if (b === null) return a;
  return b.confidence > a.confidence ? b : a;
}

export function priorityFor(
  confidence: number,
  maxPriority: SuggestionPriority = 'high'
): SuggestionPriority {
  const band: SuggestionPriority =
    confidence >= 0.7 ? 'high' : confidence >= 0.4 ? 'normal' : 'low';
  return PRIORITY_RANK[band] < PRIORITY_RANK[maxPriority] ? maxPriority : band;
}

// ============================================================================
// Detectors
// ============================================================================

const readinessGap: Detector = {
  kind: 'readiness_gap',
  maxPriority: 'high',
  detect(state, nowMs) {
    let best: Detection | null = null;

    for (const skill of activeSkills(state)) {
      if (skill.targetMissionId !== null || skill.notReadySinceMs === null) {
        continue;
      }
      const period = cadencePeriodMs(skill.cadence);
      const elapsed = nowMs - skill.notReadySinceMs;
      if (elapsed <= period) {
        continue;
      }

      const have = assignedMissionIds(state.missions, skill.id).length;
      const needed = Math.max(0, READINESS_THRESHOLD - have);
      best = strongest(best, {
        confidence: 0.5 + 0.5 * Math.min(1, (elapsed - period) / (2 * period)),
        title: `${skill.name} needs missions`,
        message:
          needed > 0
            ? `Add ${needed} more missions to unlock cycle bonuses`
            : `${skill.name} has enough missions; its next cycle will be ready`,
        actionHint: `Each skill needs ${READINESS_THRESHOLD}+ missions to be cycle-ready`,
        subjectId: skill.id,
        relevantAtMs: skill.notReadySinceMs + period,
      });
    }

    return best;
  },
};

const cycleUnderperformance: Detector = {
  kind: 'cycle_underperformance',
  maxPriority: 'high',
  detect(state) {
    let best: Detection | null = null;

    for (const skill of activeSkills(state)) {
      const recent = state.cycleLog
        .filter((r) => r.skillId === skill.id && r.targetMissionId !== null)
        .slice(-UNDERPERFORMANCE_WINDOW);
      if (recent.length < UNDERPERFORMANCE_MIN_CYCLES) {
        continue;
      }

      const hits = recent.filter((r) => r.hit).length;
      const rate = hits / recent.length;
      if (rate >= UNDERPERFORMANCE_MAX_RATE) {
        continue;
      }

      best = strongest(best, {
        confidence:
          (1 - rate) * Math.min(1, recent.length / UNDERPERFORMANCE_WINDOW),
        title: 'Cycle targets',
        message: `${skill.name} hit its target in ${hits} of the last ${recent.length} cycles`,
        actionHint: 'Try to complete a variety of missions for each skill',
        subjectId: skill.id,
        relevantAtMs: recent[recent.length - 1].endMs,
      });
    }

    return best;
  },
};

const skillImbalance: Detector = {
  kind: 'skill_imbalance',
  maxPriority: 'high',
  detect(state, nowMs) {
    const skills = activeSkills(state);
    if (skills.length < 2) {
      return null;
    }

    const levels = skills.map((s) => s.level);
    const max = Math.max(...levels);
    const gap = max - Math.min(...levels);
    if (gap < IMBALANCE_MIN_GAP) {
      return null;
    }

    const leading = skills.find((s) => s.level === max) ?? skills[0];
    return {
      confidence: Math.min(1, gap / IMBALANCE_FULL_GAP),
      title: 'Skill balance',
      message: `Your ${leading.name} skill is ${gap} levels ahead of others`,
      actionHint: 'Consider creating missions for your other skills',
      subjectId: leading.id,
      relevantAtMs: nowMs,
    };
  },
};

const reflectionLapse: Detector = {
  kind: 'reflection_lapse',
  maxPriority: 'high',
  detect(state, nowMs) {
    const skills = activeSkills(state);
    if (skills.length === 0 || state.completions.length === 0) {
      return null;
    }

    const period = Math.min(...skills.map((s) => cadencePeriodMs(s.cadence)));
    const lastEntryMs = state.journal.reduce<number | null>(
      (latest, e) => (latest === null || e.createdAtMs > latest ? e.createdAtMs : latest),
      null
    );

    // Only activity after the last entry counts toward a lapse
    const since = state.completions.filter(
      (c) => lastEntryMs === null || c.completedAtMs > lastEntryMs
    );
    if (since.length === 0) {
      return null;
    }

    const referenceMs = lastEntryMs ?? since[0].completedAtMs;
    const elapsed = nowMs - referenceMs;
    if (elapsed <= REFLECTION_LAPSE_PERIODS * period) {
      return null;
    }

    const days = Math.floor(elapsed / DAY_MS);
    return {
      confidence: Math.min(1, elapsed / (2 * REFLECTION_LAPSE_PERIODS * period)),
      title: 'Time to reflect',
      message:
        lastEntryMs === null
          ? 'Try writing a reflection after completing missions'
          : `It's been ${days} days since your last reflection`,
      actionHint: 'Open the journal to write a new entry',
      subjectId: null,
      relevantAtMs: referenceMs + REFLECTION_LAPSE_PERIODS * period,
    };
  },
};

const focusSaturation: Detector = {
  kind: 'focus_saturation',
  maxPriority: 'normal',
  detect(state, nowMs) {
    const skills = activeSkills(state);
    const count = skills.filter((s) => s.isFocus).length;

    if (count > FOCUS_MAX) {
      return {
        confidence: Math.min(1, 0.4 + 0.2 * (count - FOCUS_MAX)),
        title: 'Too many focus skills',
        message: `You have ${count} Focus skills - consider narrowing your focus`,
        actionHint: `Keep 1-${FOCUS_MAX} skills in Focus`,
        subjectId: null,
        relevantAtMs: nowMs,
      };
    }
    if (count === 0 && skills.length >= 2) {
      return {
        confidence: FOCUS_NONE_CONFIDENCE,
        title: 'Try Focus',
        message: 'Consider marking a skill as Focus for deeper mastery',
        actionHint: 'Focus skills level more slowly but mark what matters most',
        subjectId: null,
        relevantAtMs: nowMs,
      };
    }
    return null;
  },
};

const coinHoarding: Detector = {
  kind: 'coin_hoarding',
  maxPriority: 'high',
  detect(state, nowMs) {
    const coins = state.player.coins;
    const rewards = state.rewards.filter((r) => !r.isArchived);

    if (rewards.length === 0) {
      if (coins < HOARD_NO_REWARDS_COINS) {
        return null;
      }
      return {
        confidence: HOARD_NO_REWARDS_CONFIDENCE,
        title: 'No rewards yet',
        message: `You have ${coins} coins! Create rewards to spend them on`,
        actionHint: 'Rewards turn coins into something you enjoy',
        subjectId: null,
        relevantAtMs: nowMs,
      };
    }

    const cheapest = Math.min(...rewards.map((r) => r.priceCoins));
    if (coins < HOARD_MULTIPLE * cheapest) {
      return null;
    }
    const recentRedemption = state.redemptions.some(
      (r) => r.redeemedAtMs > nowMs - HOARD_REDEMPTION_LOOKBACK_MS
    );
    if (recentRedemption) {
      return null;
    }

    return {
      confidence: Math.min(1, coins / (HOARD_FULL_MULTIPLE * cheapest)),
      title: 'Treat yourself',
      message: `You've accumulated ${coins} coins - treat yourself to a reward!`,
      actionHint: 'Redeem a reward from the shop',
      subjectId: null,
      relevantAtMs: nowMs,
    };
  },
};

const difficultySkew: Detector = {
  kind: 'difficulty_skew',
  maxPriority: 'normal',
  detect(state) {
    const recent = state.completions.slice(-SKEW_WINDOW);
    if (recent.length < SKEW_MIN_COMPLETIONS) {
      return null;
    }

    const easy = recent.filter((c) => c.difficulty === 1).length / recent.length;
    const hard = recent.filter((c) => c.difficulty === 5).length / recent.length;
    const share = Math.max(easy, hard);
    if (share < SKEW_SHARE) {
      return null;
    }

    const percent = Math.round(share * 100);
    return {
      confidence: share,
      title: easy >= hard ? 'Add a challenge' : 'Mind the load',
      message:
        easy >= hard
          ? `${percent}% of your recent completions were difficulty 1 - consider adding some challenges`
          : `${percent}% of your recent completions were difficulty 5 - don't burn out!`,
      actionHint: 'Mix mission difficulties across the week',
      subjectId: null,
      relevantAtMs: recent[recent.length - 1].completedAtMs,
    };
  },
};

/**
 * Registry order is the final tiebreak.
 */
export const DETECTORS: readonly Detector[] = [
  readinessGap,
  cycleUnderperformance,
  skillImbalance,
  reflectionLapse,
  focusSaturation,
  coinHoarding,
  difficultySkew,
];

// ============================================================================
// Analysis
// ============================================================================

/**
 * Every detection, ranked; no truncation.
 */
export function detectAll(
  state: GameState,
  nowMs: number,
  detectors: readonly Detector[] = DETECTORS
): Suggestion[] {
  const ranked: Array<{ suggestion: Suggestion; order: number }> = [];

  detectors.forEach((detector, order) => {
    const detection = detector.detect(state, nowMs);
    if (!detection) {
      return;
    }
    ranked.push({
      order,
      suggestion: {
        ...detection,
        id: `${detector.kind}:${detection.subjectId ?? 'all'}`,
        kind: detector.kind,
        priority: priorityFor(detection.confidence, detector.maxPriority),
      },
    });
  });

  ranked.sort(
    (a, b) =>
      PRIORITY_RANK[a.suggestion.priority] - PRIORITY_RANK[b.suggestion.priority] ||
      b.suggestion.confidence - a.suggestion.confidence ||
      b.suggestion.relevantAtMs - a.suggestion.relevantAtMs ||
      a.order - b.order
  );

  return ranked.map((r) => r.suggestion);
}

/**
 * Top suggestions for the player. Never mutates `state`.
 */
export function analyze(
  state: GameState,
  nowMs: number,
  options: NavigatorOptions = {}
): Suggestion[] {
  const max = options.maxSuggestions ?? DEFAULT_MAX_SUGGESTIONS;
  return detectAll(state, nowMs).slice(0, Math.max(0, max));
}
