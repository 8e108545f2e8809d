/**
 * Mission Cycle Engine: command entry points.
 *
 * Every command validates its input, then returns a new state and the events
 * describing what changed. The input state is never mutated. Time, randomness
 * and id generation come in through `EngineContext`.
 *
 * Non-goals (not included):
 * - Reward math (progression.ts) and cycle rules (cycles.ts)
 * - Persistence or revision bookkeeping (the store owns `revision`)
 * - HTTP routes
 */

import type {
  Capsule,
  CapsuleCondition,
  CapsuleId,
  CompletionRecord,
  CycleCadence,
  GameState,
  JournalEntry,
  Mission,
  MissionId,
  Redemption,
  Reward,
  RewardId,
  Settings,
  Skill,
  SkillId,
} from './state.js';
import type { EngineEvent, TransitionResult } from './events.js';
import type { EngineContext } from './context.js';
import {
  dateTrigger,
  evaluateCapsules,
  triggersFromEvents,
  type CapsuleTrigger,
} from './capsules.js';
import { processCompletion, requireMission } from './completion.js';
import {
  reseedRemovedTarget,
  restartCycle,
  rolloverDueCycles,
} from './cycles.js';
import {
  InvalidInputError,
  NotFoundError,
  StateViolationError,
} from './errors.js';
import { analyze as analyzeState, type NavigatorOptions, type Suggestion } from './navigator.js';
import { assertDifficulty, resolveLevelUps } from './progression.js';

export type { EngineContext } from './context.js';

// ============================================================================
// Inputs
// ============================================================================

export interface InitialStateInput {
  displayName: string;
  settings?: Partial<Settings>;
}

export interface CreateSkillInput {
  name: string;
  cadence?: CycleCadence;
  isFocus?: boolean;
}

export interface CreateMissionInput {
  title: string;
  note?: string;
  skillIds: SkillId[];
  difficulty: number;
  energy: number;
}

export interface CreateRewardInput {
  title: string;
  priceCoins: number;
}

export interface JournalEntryInput {
  text: string;
  skillId?: SkillId;
  missionId?: MissionId;
  isReflection?: boolean;
}

export interface CreateCapsuleInput {
  title: string;
  body: string;
  condition: CapsuleCondition;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_SETTINGS: Settings = { dayStartHour: 0, utcOffsetMinutes: 0 };
export const DEFAULT_CADENCE: CycleCadence = { kind: 'weekly' };

const MAX_NAME_LENGTH = 120;
const MIN_ENERGY = 1;
const MAX_ENERGY = 5;
const MAX_SKILLS_PER_MISSION = 2;
const MAX_CUSTOM_INTERVAL_DAYS = 365;
const MIN_UTC_OFFSET_MINUTES = -720;
const MAX_UTC_OFFSET_MINUTES = 840;

// ============================================================================
// Validation
// ============================================================================

function requireName(value: string, what: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0 || trimmed.length > MAX_NAME_LENGTH) {
    throw new InvalidInputError(
      'invalid_name',
      `${what} must be 1-${MAX_NAME_LENGTH} characters`
    );
  }
  return trimmed;
}

function assertCadence(cadence: CycleCadence): void {
  if (
    cadence.kind === 'custom' &&
    (!Number.isInteger(cadence.intervalDays) ||
      cadence.intervalDays < 1 ||
      cadence.intervalDays > MAX_CUSTOM_INTERVAL_DAYS)
  ) {
    throw new InvalidInputError(
      'invalid_cadence',
      `Custom cadence needs 1-${MAX_CUSTOM_INTERVAL_DAYS} whole days, got ${cadence.intervalDays}`
    );
  }
}

function sameCadence(a: CycleCadence, b: CycleCadence): boolean {
  if (a.kind === 'custom' && b.kind === 'custom') {
    return a.intervalDays === b.intervalDays;
  }
  return a.kind === b.kind;
}

function assertSettings(settings: Settings): void {
  const { dayStartHour, utcOffsetMinutes } = settings;
  if (!Number.isInteger(dayStartHour) || dayStartHour < 0 || dayStartHour > 23) {
    throw new InvalidInputError(
      'invalid_settings',
      `dayStartHour must be an integer from 0 to 23, got ${dayStartHour}`
    );
  }
  if (
    !Number.isInteger(utcOffsetMinutes) ||
    utcOffsetMinutes < MIN_UTC_OFFSET_MINUTES ||
    utcOffsetMinutes > MAX_UTC_OFFSET_MINUTES
  ) {
    throw new InvalidInputError(
      'invalid_settings',
      `utcOffsetMinutes must be an integer from ${MIN_UTC_OFFSET_MINUTES} to ${MAX_UTC_OFFSET_MINUTES}, got ${utcOffsetMinutes}`
    );
  }
}

function assertEnergy(energy: number): void {
  if (!Number.isInteger(energy) || energy < MIN_ENERGY || energy > MAX_ENERGY) {
    throw new InvalidInputError(
      'invalid_energy',
      `Energy must be an integer from ${MIN_ENERGY} to ${MAX_ENERGY}, got ${energy}`
    );
  }
}

function assertPositiveLevel(level: number): void {
  if (!Number.isInteger(level) || level < 1) {
    throw new InvalidInputError(
      'invalid_capsule_condition',
      `Capsule level must be a positive integer, got ${level}`
    );
  }
}

export function requireSkill(state: GameState, skillId: SkillId): Skill {
  const skill = state.skills.find((s) => s.id === skillId);
  if (!skill) {
    throw new NotFoundError('skill_not_found', `Unknown skill: ${skillId}`);
  }
  return skill;
}

function requireActiveSkill(state: GameState, skillId: SkillId): Skill {
  const skill = requireSkill(state, skillId);
  if (skill.isArchived) {
    throw new StateViolationError('skill_archived', `Skill ${skillId} is archived`);
  }
  return skill;
}

function requireReward(state: GameState, rewardId: RewardId): Reward {
  const reward = state.rewards.find((r) => r.id === rewardId);
  if (!reward) {
    throw new NotFoundError('reward_not_found', `Unknown reward: ${rewardId}`);
  }
  return reward;
}

function replaceSkill(state: GameState, skill: Skill): GameState {
  return {
    ...state,
    skills: state.skills.map((s) => (s.id === skill.id ? skill : s)),
  };
}

// ============================================================================
// Capsules
// ============================================================================

/**
 * Runs capsule triggers in order and folds the unlocks into the state.
 */
export function applyCapsuleTriggers(
  state: GameState,
  triggers: CapsuleTrigger[],
  nowMs: number
): TransitionResult {
  let capsules = state.capsules;
  const events: EngineEvent[] = [];

  for (const trigger of triggers) {
    const result = evaluateCapsules(capsules, trigger, nowMs);
    capsules = result.capsules;
    events.push(...result.events);
  }

  return events.length === 0
    ? { state, events }
    : { state: { ...state, capsules }, events };
}

function withCapsuleChecks(
  result: TransitionResult,
  nowMs: number
): TransitionResult {
  const triggers = triggersFromEvents(result.events);
  if (triggers.length === 0) {
    return result;
  }
  const checked = applyCapsuleTriggers(result.state, triggers, nowMs);
  return { state: checked.state, events: [...result.events, ...checked.events] };
}

// ============================================================================
// Lifecycle
// ============================================================================

/**
 * Fresh state for a new player at level 1 with nothing defined.
 */
export function createInitialState(
  input: InitialStateInput,
  ctx: Pick<EngineContext, 'nowMs' | 'newId'>
): GameState {
  const settings: Settings = {
    dayStartHour: input.settings?.dayStartHour ?? DEFAULT_SETTINGS.dayStartHour,
    utcOffsetMinutes: input.settings?.utcOffsetMinutes ?? DEFAULT_SETTINGS.utcOffsetMinutes,
  };
  assertSettings(settings);

  return {
    revision: 0,
    settings,
    player: {
      id: ctx.newId(),
      displayName: requireName(input.displayName, 'Display name'),
      level: 1,
      xp: 0,
      coins: 0,
      createdAtMs: ctx.nowMs,
    },
    skills: [],
    missions: [],
    completions: [],
    cycleLog: [],
    rewards: [],
    redemptions: [],
    journal: [],
    capsules: [],
  };
}

/**
 * Advances time: rolls over due cycles, then checks date capsules.
 */
export function tick(state: GameState, ctx: EngineContext): TransitionResult {
  const rolled = rolloverDueCycles(state, ctx.nowMs, ctx.rng);
  const checked = applyCapsuleTriggers(
    rolled.state,
    [dateTrigger(rolled.state, ctx.nowMs)],
    ctx.nowMs
  );
  return { state: checked.state, events: [...rolled.events, ...checked.events] };
}

// ============================================================================
// Skills
// ============================================================================

/**
 * Creates a skill and opens its first cycle (NOT_READY until it has
 * enough missions at a boundary).
 */
export function createSkill(
  state: GameState,
  input: CreateSkillInput,
  ctx: EngineContext
): TransitionResult & { skill: Skill } {
  const cadence = input.cadence ?? DEFAULT_CADENCE;
  assertCadence(cadence);

  const created: Skill = {
    id: ctx.newId(),
    name: requireName(input.name, 'Skill name'),
    level: 1,
    xp: 0,
    cadence,
    cycleStartMs: null,
    cycleEndMs: null,
    targetMissionId: null,
    hasHitTargetThisCycle: false,
    isFocus: input.isFocus ?? false,
    isArchived: false,
    notReadySinceMs: null,
    createdAtMs: ctx.nowMs,
  };

  const opened = restartCycle(
    { ...state, skills: [...state.skills, created] },
    created.id,
    ctx.nowMs,
    ctx.rng
  );
  const skill = requireSkill(opened.state, created.id);

  return {
    state: opened.state,
    events: [{ type: 'skill_created', skillId: skill.id }, ...opened.events],
    skill,
  };
}

export function archiveSkill(
  state: GameState,
  skillId: SkillId
): TransitionResult {
  const skill = requireActiveSkill(state, skillId);
  return {
    state: replaceSkill(state, { ...skill, isArchived: true, isFocus: false }),
    events: [{ type: 'skill_archived', skillId }],
  };
}

/**
 * Flips Focus. Leaving Focus lowers the bar, so any level-ups the held XP
 * already pays for are resolved right away.
 */
export function toggleFocus(
  state: GameState,
  skillId: SkillId,
  ctx: Pick<EngineContext, 'nowMs'>
): TransitionResult {
  const skill = requireActiveSkill(state, skillId);
  const isFocus = !skill.isFocus;
  const resolved = resolveLevelUps({ level: skill.level, xp: skill.xp }, 0, isFocus);

  const events: EngineEvent[] = [{ type: 'focus_toggled', skillId, isFocus }];
  if (resolved.levelsGained > 0) {
    events.push({
      type: 'skill_leveled_up',
      skillId,
      fromLevel: skill.level,
      toLevel: resolved.level,
    });
  }

  return withCapsuleChecks(
    {
      state: replaceSkill(state, {
        ...skill,
        isFocus,
        level: resolved.level,
        xp: resolved.xp,
      }),
      events,
    },
    ctx.nowMs
  );
}

/**
 * Changes cadence and restarts the cycle under the new cadence now.
 *
 * Setting the cadence a skill already has changes nothing.
 */
export function setCadence(
  state: GameState,
  skillId: SkillId,
  cadence: CycleCadence,
  ctx: EngineContext
): TransitionResult {
  assertCadence(cadence);
  const skill = requireActiveSkill(state, skillId);
  if (sameCadence(skill.cadence, cadence)) {
    return { state, events: [] };
  }

  const restarted = restartCycle(
    replaceSkill(state, { ...skill, cadence }),
    skillId,
    ctx.nowMs,
    ctx.rng
  );
  return {
    state: restarted.state,
    events: [{ type: 'cadence_changed', skillId, cadence }, ...restarted.events],
  };
}

// ============================================================================
// Missions
// ============================================================================

export function createMission(
  state: GameState,
  input: CreateMissionInput,
  ctx: Pick<EngineContext, 'nowMs' | 'newId'>
): TransitionResult & { mission: Mission } {
  const title = requireName(input.title, 'Mission title');
  assertDifficulty(input.difficulty);
  assertEnergy(input.energy);

  const skillIds = [...new Set(input.skillIds)];
  if (
    skillIds.length !== input.skillIds.length ||
    skillIds.length < 1 ||
    skillIds.length > MAX_SKILLS_PER_MISSION
  ) {
    throw new InvalidInputError(
      'invalid_skill_count',
      `A mission needs 1-${MAX_SKILLS_PER_MISSION} distinct skills`
    );
  }
  for (const skillId of skillIds) {
    requireActiveSkill(state, skillId);
  }

  const note = input.note?.trim();
  const mission: Mission = {
    id: ctx.newId(),
    title,
    ...(note ? { note } : {}),
    skillIds,
    difficulty: input.difficulty,
    energy: input.energy,
    isArchived: false,
    createdAtMs: ctx.nowMs,
  };

  return {
    state: { ...state, missions: [...state.missions, mission] },
    events: [{ type: 'mission_created', missionId: mission.id }],
    mission,
  };
}

/**
 * Retires a mission. A skill whose current target it was gets a new
 * target from its remaining missions for the rest of the window.
 */
export function archiveMission(
  state: GameState,
  missionId: MissionId,
  ctx: EngineContext
): TransitionResult {
  const mission = requireMission(state, missionId);
  if (mission.isArchived) {
    throw new StateViolationError('mission_archived', `Mission ${missionId} is archived`);
  }

  const archived: GameState = {
    ...state,
    missions: state.missions.map((m) =>
      m.id === missionId ? { ...m, isArchived: true } : m
    ),
  };
  const reseeded = reseedRemovedTarget(archived, missionId, ctx.nowMs, ctx.rng);

  return {
    state: reseeded.state,
    events: [{ type: 'mission_archived', missionId }, ...reseeded.events],
  };
}

/**
 * Completes a mission, then checks capsules against what happened.
 */
export function completeMission(
  state: GameState,
  missionId: MissionId,
  ctx: EngineContext
): TransitionResult & { completion: CompletionRecord } {
  const result = processCompletion(state, missionId, ctx);
  const checked = withCapsuleChecks(result, ctx.nowMs);
  return { ...checked, completion: result.completion };
}

// ============================================================================
// Rewards
// ============================================================================

export function createReward(
  state: GameState,
  input: CreateRewardInput,
  ctx: Pick<EngineContext, 'nowMs' | 'newId'>
): TransitionResult & { reward: Reward } {
  const title = requireName(input.title, 'Reward title');
  if (!Number.isInteger(input.priceCoins) || input.priceCoins < 1) {
    throw new InvalidInputError(
      'invalid_price',
      `Price must be a positive whole number of coins, got ${input.priceCoins}`
    );
  }

  const reward: Reward = {
    id: ctx.newId(),
    title,
    priceCoins: input.priceCoins,
    isArchived: false,
    createdAtMs: ctx.nowMs,
  };

  return {
    state: { ...state, rewards: [...state.rewards, reward] },
    events: [{ type: 'reward_created', rewardId: reward.id }],
    reward,
  };
}

export function archiveReward(state: GameState, rewardId: RewardId): TransitionResult {
  const reward = requireReward(state, rewardId);
  if (reward.isArchived) {
    throw new StateViolationError('reward_archived', `Reward ${rewardId} is archived`);
  }
  return {
    state: {
      ...state,
      rewards: state.rewards.map((r) => (r.id === rewardId ? { ...r, isArchived: true } : r)),
    },
    events: [{ type: 'reward_archived', rewardId }],
  };
}

/**
 * Spends coins on a reward. The only way coins go down.
 */
export function redeemReward(
  state: GameState,
  rewardId: RewardId,
  ctx: Pick<EngineContext, 'nowMs' | 'newId'>
): TransitionResult & { redemption: Redemption } {
  const reward = requireReward(state, rewardId);
  if (reward.isArchived) {
    throw new StateViolationError('reward_archived', `Reward ${rewardId} is archived`);
  }
  if (state.player.coins < reward.priceCoins) {
    throw new StateViolationError(
      'insufficient_coins',
      `Reward costs ${reward.priceCoins} coins; balance is ${state.player.coins}`
    );
  }

  const redemption: Redemption = {
    id: ctx.newId(),
    rewardId,
    coinsSpent: reward.priceCoins,
    redeemedAtMs: ctx.nowMs,
  };
  const coins = state.player.coins - reward.priceCoins;

  return {
    state: {
      ...state,
      player: { ...state.player, coins },
      redemptions: [...state.redemptions, redemption],
    },
    events: [
      { type: 'reward_redeemed', rewardId, coinsSpent: reward.priceCoins, coinsRemaining: coins },
    ],
    redemption,
  };
}

// ============================================================================
// Journal and Capsules
// ============================================================================

export function recordJournalEntry(
  state: GameState,
  input: JournalEntryInput,
  ctx: Pick<EngineContext, 'nowMs' | 'newId'>
): TransitionResult & { entry: JournalEntry } {
  if (input.text.trim().length === 0) {
    throw new InvalidInputError('invalid_request', 'Journal entry text is empty');
  }
  if (input.skillId !== undefined) {
    requireSkill(state, input.skillId);
  }
  if (input.missionId !== undefined) {
    requireMission(state, input.missionId);
  }

  const entry: JournalEntry = {
    id: ctx.newId(),
    text: input.text,
    createdAtMs: ctx.nowMs,
    ...(input.skillId !== undefined ? { skillId: input.skillId } : {}),
    ...(input.missionId !== undefined ? { missionId: input.missionId } : {}),
    isReflection: input.isReflection ?? false,
  };

  return {
    state: { ...state, journal: [...state.journal, entry] },
    events: [
      { type: 'journal_entry_recorded', entryId: entry.id, isReflection: entry.isReflection },
    ],
    entry,
  };
}

function assertCapsuleCondition(state: GameState, condition: CapsuleCondition): void {
  switch (condition.type) {
    case 'date':
      if (!Number.isFinite(condition.unlockAtMs)) {
        throw new InvalidInputError(
          'invalid_capsule_condition',
          'Capsule unlock date must be a finite timestamp'
        );
      }
      return;
    case 'mission_completion':
      requireMission(state, condition.missionId);
      return;
    case 'skill_level':
      requireSkill(state, condition.skillId);
      assertPositiveLevel(condition.level);
      return;
    case 'player_level':
      assertPositiveLevel(condition.level);
      return;
  }
}

/**
 * Seals a capsule. It opens on the first trigger that satisfies it.
 */
export function createCapsule(
  state: GameState,
  input: CreateCapsuleInput,
  ctx: Pick<EngineContext, 'nowMs' | 'newId'>
): TransitionResult & { capsule: Capsule } {
  const title = requireName(input.title, 'Capsule title');
  assertCapsuleCondition(state, input.condition);

  const capsule: Capsule = {
    id: ctx.newId(),
    title,
    body: input.body,
    condition: input.condition,
    createdAtMs: ctx.nowMs,
    unlockedAtMs: null,
  };

  return {
    state: { ...state, capsules: [...state.capsules, capsule] },
    events: [{ type: 'capsule_created', capsuleId: capsule.id }],
    capsule,
  };
}

export function requireCapsule(state: GameState, capsuleId: CapsuleId): Capsule {
  const capsule = state.capsules.find((c) => c.id === capsuleId);
  if (!capsule) {
    throw new NotFoundError('capsule_not_found', `Unknown capsule: ${capsuleId}`);
  }
  return capsule;
}

// ============================================================================
// Settings and Analysis
// ============================================================================

/**
 * Windows already open keep their bounds; the new alignment applies from
 * the next rollover and to daily token counting immediately.
 */
export function updateSettings(
  state: GameState,
  patch: Partial<Settings>
): TransitionResult {
  const settings: Settings = {
    dayStartHour: patch.dayStartHour ?? state.settings.dayStartHour,
    utcOffsetMinutes: patch.utcOffsetMinutes ?? state.settings.utcOffsetMinutes,
  };
  assertSettings(settings);

  return {
    state: { ...state, settings },
    events: [
      {
        type: 'settings_updated',
        dayStartHour: settings.dayStartHour,
        utcOffsetMinutes: settings.utcOffsetMinutes,
      },
    ],
  };
}

/**
 * Navigator suggestions for the current state. Read-only.
 */
export function analyze(
  state: GameState,
  nowMs: number,
  options?: NavigatorOptions
): Suggestion[] {
  return analyzeState(state, nowMs, options);
}
