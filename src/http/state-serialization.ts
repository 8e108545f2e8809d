/**
 * State serialization for storage, export and import.
 *
 * GameState is already plain data, so serializing is JSON. Loading goes
 * through a zod schema: anything read from disk or sent by a client is
 * checked field by field before the engine sees it.
 */

import { z } from 'zod';
import type { GameState } from '../domain/state.js';
import { InvalidInputError } from '../domain/errors.js';

// ============================================================================
// Schemas
// ============================================================================

const id = z.string().min(1);
const timestamp = z.number().finite();
const level = z.number().int().min(1);
const nonNegative = z.number().finite().nonnegative();
const scale = z.number().int().min(1).max(5);

export const CadenceSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('daily') }),
  z.object({ kind: z.literal('weekly') }),
  z.object({ kind: z.literal('monthly') }),
  z.object({ kind: z.literal('custom'), intervalDays: z.number().int().min(1).max(365) }),
]);

export const SettingsSchema = z.object({
  dayStartHour: z.number().int().min(0).max(23),
  utcOffsetMinutes: z.number().int().min(-720).max(840),
});

const PlayerSchema = z.object({
  id,
  displayName: z.string(),
  level,
  xp: nonNegative,
  coins: z.number().int().nonnegative(),
  createdAtMs: timestamp,
});

const SkillSchema = z.object({
  id,
  name: z.string(),
  level,
  xp: nonNegative,
  cadence: CadenceSchema,
  cycleStartMs: timestamp.nullable(),
  cycleEndMs: timestamp.nullable(),
  targetMissionId: id.nullable(),
  hasHitTargetThisCycle: z.boolean(),
  isFocus: z.boolean(),
  isArchived: z.boolean(),
  notReadySinceMs: timestamp.nullable(),
  createdAtMs: timestamp,
});

const MissionSchema = z.object({
  id,
  title: z.string(),
  note: z.string().optional(),
  skillIds: z.array(id).min(1).max(2),
  difficulty: scale,
  energy: scale,
  isArchived: z.boolean(),
  createdAtMs: timestamp,
});

const SkillAwardSchema = z.object({
  skillId: id,
  cycleId: z.string().nullable(),
  baseXp: nonNegative,
  cycleXp: nonNegative,
  levelBefore: level,
  levelAfter: level,
});

const CompletionSchema = z.object({
  id,
  missionId: id,
  completedAtMs: timestamp,
  difficulty: scale,
  award: z.object({
    basePlayerXp: nonNegative,
    cyclePlayerXp: nonNegative,
    coins: nonNegative,
    skills: z.array(SkillAwardSchema),
    playerLevelBefore: level,
    playerLevelAfter: level,
  }),
  reflectionTokenIssued: z.boolean(),
});

const CycleRecordSchema = z.object({
  skillId: id,
  cycleId: z.string(),
  startMs: timestamp,
  endMs: timestamp,
  targetMissionId: id.nullable(),
  hit: z.boolean(),
});

const RewardSchema = z.object({
  id,
  title: z.string(),
  priceCoins: z.number().int().min(1),
  isArchived: z.boolean(),
  createdAtMs: timestamp,
});

const RedemptionSchema = z.object({
  id,
  rewardId: id,
  coinsSpent: z.number().int().nonnegative(),
  redeemedAtMs: timestamp,
});

const JournalEntrySchema = z.object({
  id,
  text: z.string(),
  createdAtMs: timestamp,
  skillId: id.optional(),
  missionId: id.optional(),
  isReflection: z.boolean(),
});

export const CapsuleConditionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('date'), unlockAtMs: timestamp }),
  z.object({ type: z.literal('mission_completion'), missionId: id }),
  z.object({ type: z.literal('skill_level'), skillId: id, level }),
  z.object({ type: z.literal('player_level'), level }),
]);

const CapsuleSchema = z.object({
  id,
  title: z.string(),
  body: z.string(),
  condition: CapsuleConditionSchema,
  createdAtMs: timestamp,
  unlockedAtMs: timestamp.nullable(),
});

const GameStateShape = z.object({
  revision: z.number().int().nonnegative(),
  settings: SettingsSchema,
  player: PlayerSchema,
  skills: z.array(SkillSchema),
  missions: z.array(MissionSchema),
  completions: z.array(CompletionSchema),
  cycleLog: z.array(CycleRecordSchema),
  rewards: z.array(RewardSchema),
  redemptions: z.array(RedemptionSchema),
  journal: z.array(JournalEntrySchema),
  capsules: z.array(CapsuleSchema),
});

/**
 * Cross-record checks: ids are unique per collection and every reference
 * points at a record that exists. A skill's target must be one of its own
 * live missions.
 */
function checkReferences(state: z.infer<typeof GameStateShape>, ctx: z.RefinementCtx): void {
  const issue = (path: (string | number)[], message: string) =>
    ctx.addIssue({ code: z.ZodIssueCode.custom, path, message });

  const collections: [string, string[]][] = [
    ['skills', state.skills.map((s) => s.id)],
    ['missions', state.missions.map((m) => m.id)],
    ['completions', state.completions.map((c) => c.id)],
    ['rewards', state.rewards.map((r) => r.id)],
    ['redemptions', state.redemptions.map((r) => r.id)],
    ['journal', state.journal.map((j) => j.id)],
    ['capsules', state.capsules.map((c) => c.id)],
  ];
  for (const [name, ids] of collections) {
    const seen = new Set<string>();
    ids.forEach((recordId, index) => {
      if (seen.has(recordId)) {
        issue([name, index, 'id'], `Duplicate id ${recordId}`);
      }
      seen.add(recordId);
    });
  }

  const skillIds = new Set(state.skills.map((s) => s.id));
  const missionsById = new Map(state.missions.map((m) => [m.id, m]));
  const rewardIds = new Set(state.rewards.map((r) => r.id));

  state.missions.forEach((mission, index) => {
    if (new Set(mission.skillIds).size !== mission.skillIds.length) {
      issue(['missions', index, 'skillIds'], 'Skill ids must be distinct');
    }
    mission.skillIds.forEach((skillId, i) => {
      if (!skillIds.has(skillId)) {
        issue(['missions', index, 'skillIds', i], `Unknown skill ${skillId}`);
      }
    });
  });

  state.skills.forEach((skill, index) => {
    if (skill.targetMissionId === null) return;
    const target = missionsById.get(skill.targetMissionId);
    if (!target || target.isArchived || !target.skillIds.includes(skill.id)) {
      issue(
        ['skills', index, 'targetMissionId'],
        `Target ${skill.targetMissionId} is not a live mission of skill ${skill.id}`
      );
    }
  });

  state.cycleLog.forEach((record, index) => {
    if (!skillIds.has(record.skillId)) {
      issue(['cycleLog', index, 'skillId'], `Unknown skill ${record.skillId}`);
    }
  });

  state.completions.forEach((completion, index) => {
    if (!missionsById.has(completion.missionId)) {
      issue(['completions', index, 'missionId'], `Unknown mission ${completion.missionId}`);
    }
    completion.award.skills.forEach((award, i) => {
      if (!skillIds.has(award.skillId)) {
        issue(
          ['completions', index, 'award', 'skills', i, 'skillId'],
          `Unknown skill ${award.skillId}`
        );
      }
    });
  });

  state.redemptions.forEach((redemption, index) => {
    if (!rewardIds.has(redemption.rewardId)) {
      issue(['redemptions', index, 'rewardId'], `Unknown reward ${redemption.rewardId}`);
    }
  });
}

export const GameStateSchema = GameStateShape.superRefine(checkReferences);

// ============================================================================
// Conversion
// ============================================================================

/**
 * One line per issue: `path: message`.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validates an already-parsed document as a GameState.
 *
 * @throws InvalidInputError (invalid_stored_state) listing every bad field
 */
export function parseStoredState(raw: unknown): GameState {
  const result = GameStateSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidInputError(
      'invalid_stored_state',
      `Stored state is invalid: ${formatIssues(result.error)}`
    );
  }
  return result.data;
}

export function deserializeState(text: string): GameState {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new InvalidInputError(
      'invalid_stored_state',
      `Stored state is not JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseStoredState(raw);
}

export function serializeState(state: GameState): string {
  return JSON.stringify(state, null, 2);
}
