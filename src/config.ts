/**
 * Runtime configuration from environment variables.
 *
 * PORT                port for the Node server (default 8787)
 * DATA_FILE           JSON file holding the game state; unset keeps it in memory
 * DAY_START_HOUR      hour a new day starts, for a fresh state (default 4)
 * UTC_OFFSET_MINUTES  local offset from UTC, for a fresh state (default 0)
 * RNG_SEED            seeds target draws and reflection rolls (default: unseeded)
 * LOG_LEVEL           debug | info | warn | error | silent (default info)
 */

import { z } from 'zod';
import { formatIssues } from './http/state-serialization.js';

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  DATA_FILE: z.string().min(1).optional(),
  DAY_START_HOUR: z.coerce.number().int().min(0).max(23).default(4),
  UTC_OFFSET_MINUTES: z.coerce.number().int().min(-720).max(840).default(0),
  RNG_SEED: z.coerce.number().int().optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    throw new Error(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}
