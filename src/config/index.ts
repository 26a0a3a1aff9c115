import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_TRIALS } from '../games/blackjack/searchAgent.js';

export type SimConfig = {
  searchTrials: number;
  workers: number;
  seed?: number;
  logLevel: 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';
};

const intFromEnv = z
  .string()
  .trim()
  .regex(/^-?\d+$/, 'must be an integer')
  .transform((s) => parseInt(s, 10));

const envSchema = z.object({
  BJ_SEARCH_TRIALS: intFromEnv.pipe(z.number().int().positive()).optional(),
  BJ_WORKERS: intFromEnv.pipe(z.number().int().min(0)).optional(),
  BJ_SEED: intFromEnv.optional(),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).optional(),
});

/** Reads BJ_* settings; empty strings count as unset. */
export function loadSimConfig(env: NodeJS.ProcessEnv = process.env): SimConfig {
  const picked = Object.fromEntries(
    Object.keys(envSchema.shape)
      .map((k): [string, string | undefined] => [k, env[k]?.trim()])
      .filter(([, v]) => v !== undefined && v !== ''),
  );
  const parsed = envSchema.safeParse(picked);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid environment configuration: ${issues}`);
  }
  const cfg = parsed.data;
  return {
    searchTrials: cfg.BJ_SEARCH_TRIALS ?? DEFAULT_TRIALS,
    workers: cfg.BJ_WORKERS ?? 0,
    seed: cfg.BJ_SEED,
    logLevel: cfg.LOG_LEVEL ?? 'info',
  };
}
