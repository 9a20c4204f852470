/**
 * Config.ts — Runtime configuration read from the environment.
 *
 * Everything gameplay-related lives in `src/data/balance.json`; this module
 * only covers process-level knobs (log level, deterministic seeding).
 *
 * The logger loads this at import time, so by default unusable values fall
 * back to their defaults and are reported as warnings.  Pass
 * `{ strict: true }` to reject them instead.
 */

import { z } from 'zod';

import { ConfigurationError } from '@/engine/errors';
import { createSeededRandom, mathRandom, type RandomSource } from '@/engine/Random';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.string().default('info'),
  COMBAT_SEED: z.string().optional(),
});

const LogLevelSchema = z.enum(LOG_LEVELS);

const SeedSchema = z
  .string()
  .regex(/^\d+$/)
  .transform((value) => Number.parseInt(value, 10));

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  /** Free-form; "development" turns on pretty logs. */
  nodeEnv: string;
  isProduction: boolean;
  isTest: boolean;
  logLevel: LogLevel;
  /** Fixed RNG seed; `undefined` means non-deterministic play. */
  combatSeed: number | undefined;
  /** Values that were ignored in favour of their defaults. */
  warnings: string[];
}

export interface LoadConfigOptions {
  /** Throw `ConfigurationError` instead of falling back. */
  strict?: boolean;
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/**
 * Parse configuration from an environment map (defaults to `process.env`).
 * Empty strings are treated as unset.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  options: LoadConfigOptions = {},
): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') cleaned[key] = value;
  }

  const raw = EnvSchema.parse(cleaned);
  const warnings: string[] = [];

  const level = LogLevelSchema.safeParse(raw.LOG_LEVEL);
  let logLevel: LogLevel = 'info';
  if (level.success) {
    logLevel = level.data;
  } else {
    warnings.push(`LOG_LEVEL "${raw.LOG_LEVEL}" is not a known level`);
  }

  let combatSeed: number | undefined;
  if (raw.COMBAT_SEED !== undefined) {
    const seed = SeedSchema.safeParse(raw.COMBAT_SEED);
    if (seed.success) {
      combatSeed = seed.data;
    } else {
      warnings.push(`COMBAT_SEED "${raw.COMBAT_SEED}" is not a non-negative integer`);
    }
  }

  if (options.strict && warnings.length > 0) {
    throw new ConfigurationError(warnings);
  }

  return {
    nodeEnv: raw.NODE_ENV,
    isProduction: raw.NODE_ENV === 'production',
    isTest: raw.NODE_ENV === 'test',
    logLevel,
    combatSeed,
    warnings,
  };
}

/** Seeded RNG when `COMBAT_SEED` is configured, otherwise `Math.random`. */
export function createRandomFromConfig(config: AppConfig): RandomSource {
  return config.combatSeed === undefined ? mathRandom : createSeededRandom(config.combatSeed);
}
