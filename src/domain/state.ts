/**
 * Canonical domain state definitions for the mission cycle engine.
 *
 * Every entity here is a plain record (numbers, strings, booleans, arrays,
 * null) so an external serializer can round-trip it without any knowledge
 * of the engine. Timestamps are epoch milliseconds.
 *
 * Non-goals (not included):
 * - Storage schema or versioning
 * - UI state or presentation data
 * - Derived values (cycle status, assigned mission sets, token counts)
 */

// ============================================================================
// Identifiers
// ============================================================================

export type PlayerId = string;
export type SkillId = string;
export type MissionId = string;
export type CompletionId = string;
export type RewardId = string;
export type CapsuleId = string;
export type JournalEntryId = string;

/**
 * CycleId: `${skillId}:${ISO timestamp of cycle start}`.
 */
export type CycleId = string;

// ============================================================================
// Settings
// ============================================================================

/**
 * Settings: Where a "day" begins for cycle windows and daily limits.
 */
export interface Settings {
  /** Hour (0-23) at which a new day starts */
  dayStartHour: number;
  /** Offset of the user's local time from UTC, in minutes */
  utcOffsetMinutes: number;
}

// ============================================================================
// Player
// ============================================================================

/**
 * Player: The single user's character. Created once, never destroyed.
 */
export interface Player {
  id: PlayerId;
  displayName: string;
  level: number;
  /** XP toward the next level; remainder is carried across level-ups */
  xp: number;
  coins: number;
  createdAtMs: number;
}

// ============================================================================
// Skills and Cycles
// ============================================================================

export type CycleCadence =
  | { kind: 'daily' }
  | { kind: 'weekly' }
  | { kind: 'monthly' }
  | { kind: 'custom'; intervalDays: number };

export type CadenceKind = CycleCadence['kind'];

/**
 * CycleStatus: Derived per skill from its window, its target and the clock.
 */
export type CycleStatus = 'NOT_READY' | 'ACTIVE' | 'AWAITING_ROLLOVER';

/**
 * Skill: A user-defined growth area.
 *
 * Cycle fields are written only by the cycle manager; level and xp only by
 * the progression calculator. The assigned mission set is derived from the
 * missions that reference the skill.
 */
export interface Skill {
  id: SkillId;
  name: string;
  level: number;
  xp: number;
  cadence: CycleCadence;
  /** Start of the current window (inclusive); null before the first window */
  cycleStartMs: number | null;
  /** End of the current window (exclusive) */
  cycleEndMs: number | null;
  targetMissionId: MissionId | null;
  hasHitTargetThisCycle: boolean;
  isFocus: boolean;
  isArchived: boolean;
  /** Start of the current uninterrupted NOT_READY stretch */
  notReadySinceMs: number | null;
  createdAtMs: number;
}

/**
 * CycleRecord: A closed cycle, appended when its window is left behind.
 */
export interface CycleRecord {
  skillId: SkillId;
  cycleId: CycleId;
  startMs: number;
  endMs: number;
  targetMissionId: MissionId | null;
  hit: boolean;
}

// ============================================================================
// Missions and Completions
// ============================================================================

export interface Mission {
  id: MissionId;
  title: string;
  note?: string;
  /** 1-2 distinct skills */
  skillIds: SkillId[];
  /** 1-5 */
  difficulty: number;
  /** 1-5 */
  energy: number;
  isArchived: boolean;
  createdAtMs: number;
}

/**
 * SkillAward: What one completion gave one skill.
 */
export interface SkillAward {
  skillId: SkillId;
  /** Cycle the skill was in when the completion landed */
  cycleId: CycleId | null;
  baseXp: number;
  /** Nonzero only when this completion took the cycle bonus */
  cycleXp: number;
  levelBefore: number;
  levelAfter: number;
}

export interface CompletionAward {
  basePlayerXp: number;
  cyclePlayerXp: number;
  coins: number;
  skills: SkillAward[];
  playerLevelBefore: number;
  playerLevelAfter: number;
}

/**
 * CompletionRecord: Append-only history entry, one per completion.
 */
export interface CompletionRecord {
  id: CompletionId;
  missionId: MissionId;
  completedAtMs: number;
  /** Mission difficulty at completion time */
  difficulty: number;
  award: CompletionAward;
  reflectionTokenIssued: boolean;
}

// ============================================================================
// Rewards
// ============================================================================

export interface Reward {
  id: RewardId;
  title: string;
  priceCoins: number;
  isArchived: boolean;
  createdAtMs: number;
}

export interface Redemption {
  id: string;
  rewardId: RewardId;
  coinsSpent: number;
  redeemedAtMs: number;
}

// ============================================================================
// Journal and Capsules
// ============================================================================

/**
 * JournalEntry: Free text is opaque here; only timing and links matter.
 */
export interface JournalEntry {
  id: JournalEntryId;
  text: string;
  createdAtMs: number;
  skillId?: SkillId;
  missionId?: MissionId;
  isReflection: boolean;
}

export type CapsuleCondition =
  | { type: 'date'; unlockAtMs: number }
  | { type: 'mission_completion'; missionId: MissionId }
  | { type: 'skill_level'; skillId: SkillId; level: number }
  | { type: 'player_level'; level: number };

export interface Capsule {
  id: CapsuleId;
  title: string;
  /** Stored as given; encryption is the caller's business */
  body: string;
  condition: CapsuleCondition;
  createdAtMs: number;
  unlockedAtMs: number | null;
}

// ============================================================================
// Game State
// ============================================================================

/**
 * GameState: Everything the engine reads and writes, passed explicitly.
 *
 * `revision` belongs to the persistence adapter; transitions carry it
 * through unchanged.
 */
export interface GameState {
  revision: number;
  settings: Settings;
  player: Player;
  skills: Skill[];
  missions: Mission[];
  completions: CompletionRecord[];
  cycleLog: CycleRecord[];
  rewards: Reward[];
  redemptions: Redemption[];
  journal: JournalEntry[];
  capsules: Capsule[];
}
