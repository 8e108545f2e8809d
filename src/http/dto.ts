/**
 * HTTP DTOs for API responses.
 *
 * These types represent the external API contract. The cycle target is
 * internal: it is left out of every skill card unless the caller opted in
 * to seeing it. Sealed capsules never carry their body.
 */

import type {
  Capsule,
  CycleCadence,
  CycleStatus,
  GameState,
  Mission,
  Reward,
  Settings,
  Skill,
} from '../domain/state.js';
import type { EngineEvent } from '../domain/events.js';
import { assignedMissionIds, currentCycleId, cycleStatus, READINESS_THRESHOLD } from '../domain/cycles.js';
import { progressToNextLevel } from '../domain/progression.js';
import { computeStreak, streakStatus, type Streak } from '../domain/streaks.js';
import { skillMetrics, type SkillMetrics } from '../domain/metrics.js';

export interface ViewOptions {
  revealTargets: boolean;
}

export type StreakDTO = Omit<Streak, 'skillId'>;

export interface PlayerDTO {
  id: string;
  displayName: string;
  level: number;
  xp: number;
  xpNeeded: number;
  coins: number;
  streak: StreakDTO;
}

/**
 * SkillCardDTO: Skill as shown to the player.
 *
 * `targetMissionId` is present only when targets are revealed.
 */
export interface SkillCardDTO {
  id: string;
  name: string;
  level: number;
  xp: number;
  xpNeeded: number;
  progress: number;
  cadence: CycleCadence;
  status: CycleStatus;
  cycleId: string | null;
  cycleStartMs: number | null;
  cycleEndMs: number | null;
  assignedMissionCount: number;
  missionsUntilReady: number;
  hasHitTargetThisCycle: boolean;
  isFocus: boolean;
  isArchived: boolean;
  streak: StreakDTO;
  metrics: SkillMetrics;
  targetMissionId?: string | null;
}

export interface MissionDTO {
  id: string;
  title: string;
  note?: string;
  skillIds: string[];
  difficulty: number;
  energy: number;
  isArchived: boolean;
  timesCompleted: number;
}

export interface CapsuleDTO {
  id: string;
  title: string;
  condition: Capsule['condition'];
  isUnlocked: boolean;
  unlockedAtMs: number | null;
  body?: string;
}

export interface StateDTO {
  revision: number;
  settings: Settings;
  player: PlayerDTO;
  skills: SkillCardDTO[];
  missions: MissionDTO[];
  rewards: Reward[];
  capsules: CapsuleDTO[];
  completionCount: number;
  reflectionTokens: number;
  skillsWithActiveStreak: number;
  skillsWithStreakAtRisk: number;
}

function toStreakDTO(streak: Streak): StreakDTO {
  const { skillId: _skillId, ...rest } = streak;
  return rest;
}

export function toSkillCardDTO(
  skill: Skill,
  state: GameState,
  nowMs: number,
  options: ViewOptions
): SkillCardDTO {
  const assigned = assignedMissionIds(state.missions, skill.id).length;
  const progress = progressToNextLevel({ level: skill.level, xp: skill.xp }, skill.isFocus);

  const card: SkillCardDTO = {
    id: skill.id,
    name: skill.name,
    level: skill.level,
    xp: skill.xp,
    xpNeeded: progress.needed,
    progress: progress.fraction,
    cadence: skill.cadence,
    status: cycleStatus(skill, nowMs),
    cycleId: currentCycleId(skill),
    cycleStartMs: skill.cycleStartMs,
    cycleEndMs: skill.cycleEndMs,
    assignedMissionCount: assigned,
    missionsUntilReady: Math.max(0, READINESS_THRESHOLD - assigned),
    hasHitTargetThisCycle: skill.hasHitTargetThisCycle,
    isFocus: skill.isFocus,
    isArchived: skill.isArchived,
    streak: toStreakDTO(computeStreak(state, skill.id, nowMs)),
    metrics: skillMetrics(state, skill),
  };

  return options.revealTargets ? { ...card, targetMissionId: skill.targetMissionId } : card;
}

export function toMissionDTO(mission: Mission, state: GameState): MissionDTO {
  return {
    id: mission.id,
    title: mission.title,
    ...(mission.note !== undefined ? { note: mission.note } : {}),
    skillIds: [...mission.skillIds],
    difficulty: mission.difficulty,
    energy: mission.energy,
    isArchived: mission.isArchived,
    timesCompleted: state.completions.filter((c) => c.missionId === mission.id).length,
  };
}

export function toCapsuleDTO(capsule: Capsule): CapsuleDTO {
  const isUnlocked = capsule.unlockedAtMs !== null;
  return {
    id: capsule.id,
    title: capsule.title,
    condition: capsule.condition,
    isUnlocked,
    unlockedAtMs: capsule.unlockedAtMs,
    ...(isUnlocked ? { body: capsule.body } : {}),
  };
}

export function toStateDTO(
  state: GameState,
  nowMs: number,
  options: ViewOptions
): StateDTO {
  const { player } = state;
  const streaks = streakStatus(state, nowMs);

  return {
    revision: state.revision,
    settings: { ...state.settings },
    player: {
      id: player.id,
      displayName: player.displayName,
      level: player.level,
      xp: player.xp,
      xpNeeded: progressToNextLevel({ level: player.level, xp: player.xp }).needed,
      coins: player.coins,
      streak: toStreakDTO(streaks.overall),
    },
    skills: state.skills.map((s) => toSkillCardDTO(s, state, nowMs, options)),
    missions: state.missions.map((m) => toMissionDTO(m, state)),
    rewards: state.rewards.map((r) => ({ ...r })),
    capsules: state.capsules.map(toCapsuleDTO),
    completionCount: state.completions.length,
    reflectionTokens: state.completions.filter((c) => c.reflectionTokenIssued).length,
    skillsWithActiveStreak: streaks.skillsActive,
    skillsWithStreakAtRisk: streaks.skillsAtRisk,
  };
}

// ============================================================================
// Events
// ============================================================================

type CycleOpenedEvent = Extract<EngineEvent, { type: 'cycle_opened' }>;

/**
 * EventDTO: Engine event as sent to a client. Unless targets are revealed,
 * `cycle_opened` loses its target and `target_reseeded` is dropped, since
 * its presence alone says the archived mission was the target.
 */
export type EventDTO = EngineEvent | Omit<CycleOpenedEvent, 'targetMissionId'>;

export function toEventDTOs(events: EngineEvent[], options: ViewOptions): EventDTO[] {
  if (options.revealTargets) {
    return events;
  }

  const dtos: EventDTO[] = [];
  for (const event of events) {
    if (event.type === 'target_reseeded') {
      continue;
    }
    if (event.type === 'cycle_opened') {
      const { targetMissionId: _hidden, ...rest } = event;
      dtos.push(rest);
      continue;
    }
    dtos.push(event);
  }
  return dtos;
}
