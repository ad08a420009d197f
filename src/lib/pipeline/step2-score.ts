/**
 * Planner — Step 2: Soft-constraint scoring
 *
 * Lower is better: the score is a cost. Each day adds its raw route length
 * (km, or minutes in the mode-aware variant) plus penalties for going over
 * the daily budget and for sparse days. Pure function, safe to call
 * thousands of times per run.
 */

import type { DayPlan, Itinerary, ScoreConfig, ScoreResult, TransportMode } from '../types';
import { DEFAULT_EXCEED_MINUTE_PENALTY } from './utils/constants';
import { countSpots, dayDistanceKm, dayTravelMinutes } from './utils/itinerary';

interface DailyBudget {
  measure: (day: DayPlan) => number;
  limit: number;
  penaltyRate: number;
  unit: 'km' | 'min';
}

function resolveBudget(config: ScoreConfig, mode?: TransportMode): DailyBudget {
  const maxDailyMinutes = config.maxDailyMinutes;
  if (mode && maxDailyMinutes) {
    return {
      measure: day => dayTravelMinutes(day, mode),
      limit: maxDailyMinutes[mode],
      penaltyRate: config.exceedMinutePenalty ?? DEFAULT_EXCEED_MINUTE_PENALTY,
      unit: 'min',
    };
  }
  return {
    measure: dayDistanceKm,
    limit: config.maxDailyKm,
    penaltyRate: config.exceedKmPenalty,
    unit: 'km',
  };
}

function formatExceeded(day: number, budget: DailyBudget, exceed: number, penalty: number): string {
  if (budget.unit === 'km') {
    return `Day ${day}: exceeded ${budget.limit.toFixed(1)}km by ${exceed.toFixed(2)}km (+${penalty.toFixed(2)})`;
  }
  return `Day ${day}: exceeded ${budget.limit}min by ${exceed.toFixed(1)}min (+${penalty.toFixed(2)})`;
}

export function scoreItinerary(
  itinerary: Itinerary,
  config: ScoreConfig,
  mode?: TransportMode
): ScoreResult {
  const reasons: string[] = [];
  const budget = resolveBudget(config, mode);

  // A sparse day only counts as a flaw when there are enough spots to avoid it
  const expectMin = countSpots(itinerary) >= itinerary.days.length * config.minSpotsPerDay;

  let score = 0;

  for (const day of itinerary.days) {
    const value = budget.measure(day);
    score += value;

    if (value > budget.limit) {
      const exceed = value - budget.limit;
      const penalty = exceed * budget.penaltyRate;
      score += penalty;
      reasons.push(formatExceeded(day.day, budget, exceed, penalty));
    }

    if (expectMin && day.spots.length < config.minSpotsPerDay) {
      score += config.oneSpotDayPenalty;
      reasons.push(`Day ${day.day}: only ${day.spots.length} spot(s) (+${config.oneSpotDayPenalty.toFixed(2)})`);
    }
  }

  return { score, reasons };
}
