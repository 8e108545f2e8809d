/**
 * Canonical domain event types for the mission cycle engine.
 *
 * This file defines TypeScript types only (no logic). Every transition
 * returns the events describing what it changed; presentation, capsule
 * checks and narrative summaries are driven from them.
 *
 * Non-goals (not included):
 * - Event handling or processing logic
 * - Persistence or logging concerns
 * - UI strings or presentation
 */

import type {
  CapsuleId,
  CompletionId,
  CycleCadence,
  CycleId,
  CompletionAward,
  GameState,
  MissionId,
  RewardId,
  SkillId,
} from './state.js';

// ============================================================================
// Setup Events
// ============================================================================

export interface SkillCreatedEvent {
  type: 'skill_created';
  skillId: SkillId;
}

export interface SkillArchivedEvent {
  type: 'skill_archived';
  skillId: SkillId;
}

export interface FocusToggledEvent {
  type: 'focus_toggled';
  skillId: SkillId;
  isFocus: boolean;
}

export interface CadenceChangedEvent {
  type: 'cadence_changed';
  skillId: SkillId;
  cadence: CycleCadence;
}

export interface MissionCreatedEvent {
  type: 'mission_created';
  missionId: MissionId;
}

export interface MissionArchivedEvent {
  type: 'mission_archived';
  missionId: MissionId;
}

export interface RewardCreatedEvent {
  type: 'reward_created';
  rewardId: RewardId;
}

export interface RewardArchivedEvent {
  type: 'reward_archived';
  rewardId: RewardId;
}

export interface JournalEntryRecordedEvent {
  type: 'journal_entry_recorded';
  entryId: string;
  isReflection: boolean;
}

export interface CapsuleCreatedEvent {
  type: 'capsule_created';
  capsuleId: CapsuleId;
}

export interface SettingsUpdatedEvent {
  type: 'settings_updated';
  dayStartHour: number;
  utcOffsetMinutes: number;
}

// ============================================================================
// Cycle Events
// ============================================================================

/**
 * CycleOpenedEvent: A new window opened for a skill.
 *
 * Carries the target plainly; concealing it is the presentation layer's job.
 */
export interface CycleOpenedEvent {
  type: 'cycle_opened';
  skillId: SkillId;
  cycleId: CycleId;
  startMs: number;
  endMs: number;
  ready: boolean;
  targetMissionId: MissionId | null;
}

export interface CycleClosedEvent {
  type: 'cycle_closed';
  skillId: SkillId;
  cycleId: CycleId;
  hit: boolean;
}

/**
 * TargetReseededEvent: The target was archived mid-cycle and replaced.
 */
export interface TargetReseededEvent {
  type: 'target_reseeded';
  skillId: SkillId;
  cycleId: CycleId;
  targetMissionId: MissionId | null;
}

// ============================================================================
// Completion Events
// ============================================================================

export interface MissionCompletedEvent {
  type: 'mission_completed';
  completionId: CompletionId;
  missionId: MissionId;
  award: CompletionAward;
}

export interface CycleBonusAwardedEvent {
  type: 'cycle_bonus_awarded';
  skillId: SkillId;
  missionId: MissionId;
  cycleId: CycleId;
  playerXp: number;
  skillXp: number;
}

export interface SkillLeveledUpEvent {
  type: 'skill_leveled_up';
  skillId: SkillId;
  fromLevel: number;
  toLevel: number;
}

export interface PlayerLeveledUpEvent {
  type: 'player_leveled_up';
  fromLevel: number;
  toLevel: number;
}

export interface ReflectionTokenIssuedEvent {
  type: 'reflection_token_issued';
  completionId: CompletionId;
  missionId: MissionId;
}

// ============================================================================
// Capsule and Reward Events
// ============================================================================

export interface CapsuleUnlockedEvent {
  type: 'capsule_unlocked';
  capsuleId: CapsuleId;
  title: string;
}

export interface RewardRedeemedEvent {
  type: 'reward_redeemed';
  rewardId: RewardId;
  coinsSpent: number;
  coinsRemaining: number;
}

/**
 * EngineEvent: Union of all engine events.
 */
export type EngineEvent =
  | SkillCreatedEvent
  | SkillArchivedEvent
  | FocusToggledEvent
  | CadenceChangedEvent
  | MissionCreatedEvent
  | MissionArchivedEvent
  | RewardCreatedEvent
  | RewardArchivedEvent
  | JournalEntryRecordedEvent
  | CapsuleCreatedEvent
  | SettingsUpdatedEvent
  | CycleOpenedEvent
  | CycleClosedEvent
  | TargetReseededEvent
  | MissionCompletedEvent
  | CycleBonusAwardedEvent
  | SkillLeveledUpEvent
  | PlayerLeveledUpEvent
  | ReflectionTokenIssuedEvent
  | CapsuleUnlockedEvent
  | RewardRedeemedEvent;

/**
 * TransitionResult: What every state-changing operation returns.
 */
export interface TransitionResult {
  state: GameState;
  events: EngineEvent[];
}
