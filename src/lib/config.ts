/**
 * Planner configuration
 *
 * Score configs are frozen values passed explicitly to the scorer; there is no
 * process-wide mutable default. Environment variables only feed the CLI.
 */

import { z } from 'zod';
import type { ScoreConfig, TransportMode } from './types';
import { TRANSPORT_MODES } from './types';
import {
  DEFAULT_EXCEED_MINUTE_PENALTY,
  DEFAULT_MAX_DAILY_MINUTES,
  DEFAULT_SCORE_CONFIG,
  DEFAULT_SEED,
  DEFAULT_TRIALS,
} from './pipeline/utils/constants';

// ============================================
// Score config
// ============================================

const scoreConfigSchema = z.object({
  maxDailyKm: z.number().positive(),
  exceedKmPenalty: z.number().nonnegative(),
  oneSpotDayPenalty: z.number().nonnegative(),
  minSpotsPerDay: z.number().int().nonnegative(),
  maxDailyMinutes: z
    .object({
      walk: z.number().positive(),
      transit: z.number().positive(),
      taxi: z.number().positive(),
    })
    .optional(),
  exceedMinutePenalty: z.number().nonnegative().optional(),
});

/**
 * Defaults merged with overrides, validated and frozen.
 */
export function createScoreConfig(overrides: Partial<ScoreConfig> = {}): ScoreConfig {
  const parsed = scoreConfigSchema.safeParse({ ...DEFAULT_SCORE_CONFIG, ...overrides });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new RangeError(`Invalid score config: ${issue.path.join('.')} ${issue.message}`);
  }

  const { maxDailyMinutes, ...rest } = parsed.data;
  return Object.freeze({
    ...rest,
    ...(maxDailyMinutes ? { maxDailyMinutes: Object.freeze(maxDailyMinutes) } : {}),
  });
}

/**
 * Score by travel minutes per mode (walk 240, transit 300, taxi 360 by default).
 */
export function createModeAwareScoreConfig(overrides: Partial<ScoreConfig> = {}): ScoreConfig {
  return createScoreConfig({
    maxDailyMinutes: DEFAULT_MAX_DAILY_MINUTES,
    exceedMinutePenalty: DEFAULT_EXCEED_MINUTE_PENALTY,
    ...overrides,
  });
}

// ============================================
// Environment
// ============================================

export interface PlannerEnv {
  dataDir: string;
  dayCount: number;
  trials: number;
  seed: number;
  mode?: TransportMode;
  maxDailyKm: number;
}

type Env = Record<string, string | undefined>;

function readNumber(
  env: Env,
  key: string,
  fallback: number,
  isValid: (n: number) => boolean
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = Number(raw);
  if (!isValid(n)) {
    console.warn(`[Config] Ignoring invalid ${key}="${raw}", using ${fallback}`);
    return fallback;
  }
  return n;
}

function isTransportMode(value: string): value is TransportMode {
  return TRANSPORT_MODES.some(m => m === value);
}

export function getPlannerEnv(env: Env = process.env): PlannerEnv {
  const rawMode = env.PLANNER_MODE?.trim().toLowerCase();
  let mode: TransportMode | undefined;
  if (rawMode) {
    if (isTransportMode(rawMode)) {
      mode = rawMode;
    } else {
      console.warn(`[Config] Ignoring unknown PLANNER_MODE="${rawMode}", scoring by distance`);
    }
  }

  return {
    dataDir: env.PLANNER_DATA_DIR?.trim() || 'data',
    dayCount: readNumber(env, 'PLANNER_DAYS', 3, n => Number.isInteger(n) && n > 0),
    trials: readNumber(env, 'PLANNER_TRIALS', DEFAULT_TRIALS, n => Number.isInteger(n) && n >= 0),
    seed: readNumber(env, 'PLANNER_SEED', DEFAULT_SEED, Number.isInteger),
    mode,
    maxDailyKm: readNumber(env, 'PLANNER_MAX_DAILY_KM', DEFAULT_SCORE_CONFIG.maxDailyKm, n => n > 0),
  };
}
