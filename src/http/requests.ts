/**
 * Request body schemas for the HTTP API.
 *
 * Shapes only. Range checks that belong to the domain (difficulty, price,
 * names) are left to the engine so both entry points report the same codes.
 */

import { z } from 'zod';
import { InvalidInputError } from '../domain/errors.js';
import {
  CadenceSchema,
  CapsuleConditionSchema,
  formatIssues,
} from './state-serialization.js';

export const CreateSkillBody = z.object({
  name: z.string(),
  cadence: CadenceSchema.optional(),
  isFocus: z.boolean().optional(),
});

export const SetCadenceBody = z.object({
  cadence: CadenceSchema,
});

export const CreateMissionBody = z.object({
  title: z.string(),
  note: z.string().optional(),
  skillIds: z.array(z.string()),
  difficulty: z.number(),
  energy: z.number(),
});

export const CreateRewardBody = z.object({
  title: z.string(),
  priceCoins: z.number(),
});

export const JournalEntryBody = z.object({
  text: z.string(),
  skillId: z.string().optional(),
  missionId: z.string().optional(),
  isReflection: z.boolean().optional(),
});

export const CreateCapsuleBody = z.object({
  title: z.string(),
  body: z.string(),
  condition: CapsuleConditionSchema,
});

export const UpdateSettingsBody = z.object({
  dayStartHour: z.number().optional(),
  utcOffsetMinutes: z.number().optional(),
});

export const RevealPreferenceBody = z.object({
  reveal: z.boolean(),
});

/**
 * Reads a JSON body and validates it.
 *
 * @throws InvalidInputError (invalid_request) for bad JSON or a bad shape
 */
export async function readBody<T extends z.ZodTypeAny>(
  request: Request,
  schema: T
): Promise<z.infer<T>> {
  let raw: unknown;
  try {
    raw = await request.json();
  } catch {
    throw new InvalidInputError('invalid_request', 'Request body must be JSON');
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new InvalidInputError('invalid_request', formatIssues(result.error));
  }
  return result.data;
}
