/**
 * Shared constants for the planner.
 * Single source of truth for category sets, transport profiles and default budgets.
 */

import type { HardLimits, ScoreConfig, TransportMode, TransportProfile } from '../../types';

/** Categories visited in the open air (parks, gardens, beaches...) */
export const OUTDOOR_CATEGORIES: ReadonlySet<string> = new Set([
  'outdoor',
  'beach',
  'park',
  'garden',
]);

/** Categories visited under a roof (museums, temples, malls...) */
export const INDOOR_CATEGORIES: ReadonlySet<string> = new Set([
  'indoor',
  'museum',
  'shopping',
  'temple',
]);

/** Flat-earth approximation: km per degree of latitude/longitude */
export const KM_PER_DEGREE = 111;

/**
 * Average door-to-door speed and per-leg overhead by transport mode.
 * Transit overhead stands for waiting time at the stop.
 */
export const TRANSPORT_PROFILES: Readonly<Record<TransportMode, TransportProfile>> = Object.freeze({
  walk: { speedKmh: 5, overheadMinutes: 0 },
  transit: { speedKmh: 20, overheadMinutes: 5 },
  taxi: { speedKmh: 25, overheadMinutes: 0 },
});

export const DEFAULT_SCORE_CONFIG: ScoreConfig = Object.freeze({
  maxDailyKm: 6.0,
  exceedKmPenalty: 25.0,
  oneSpotDayPenalty: 15.0,
  minSpotsPerDay: 2,
});

/** Daily minute budgets used by the mode-aware scoring variant */
export const DEFAULT_MAX_DAILY_MINUTES: Readonly<Record<TransportMode, number>> = Object.freeze({
  walk: 240,
  transit: 300,
  taxi: 360,
});

export const DEFAULT_EXCEED_MINUTE_PENALTY = 1.5;

export const DEFAULT_HARD_LIMITS: HardLimits = Object.freeze({
  maxDailyKm: 6.0,
  maxDailyMinutes: DEFAULT_MAX_DAILY_MINUTES,
});

// Local search
export const DEFAULT_TRIALS = 200;
export const DEFAULT_SEED = 42;
/** Probability of the move operator (otherwise swap) */
export const MOVE_PROBABILITY = 0.6;
