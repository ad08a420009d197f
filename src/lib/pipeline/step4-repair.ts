/**
 * Planner — Step 4: Hard limits
 *
 * Checks each day against fixed ceilings (km, or minutes for a transport mode)
 * that are independent of the soft ScoreConfig, and relocates spots off days
 * that break them. Repair mutates the itinerary in place and is a single pass:
 * re-run the check afterwards, it may not have converged.
 */

import type { DayPlan, HardLimits, Itinerary, Spot, TransportMode } from '../types';
import type {
  DroppedSpot,
  HardConstraintPolicy,
  HardConstraintViolation,
  MovedSpot,
  RepairOptions,
  RepairPick,
  RepairResult,
} from './types';
import { distance, legCost } from '../services/geometry';
import { nearestNeighborPath } from './step1-cluster';
import { DEFAULT_HARD_LIMITS } from './utils/constants';
import { dayDistanceKm, dayTravelMinutes, roundTo } from './utils/itinerary';

const DISTANCE_POLICY: HardConstraintPolicy = { kind: 'distance' };

// ============================================
// Detection
// ============================================

export function checkHardConstraints(
  itinerary: Itinerary,
  policy: HardConstraintPolicy = DISTANCE_POLICY,
  limits: HardLimits = DEFAULT_HARD_LIMITS
): HardConstraintViolation[] {
  const violations: HardConstraintViolation[] = [];

  for (const day of itinerary.days) {
    const measured = policy.kind === 'time'
      ? dayTravelMinutes(day, policy.mode)
      : dayDistanceKm(day);
    const limit = policy.kind === 'time'
      ? limits.maxDailyMinutes[policy.mode]
      : limits.maxDailyKm;

    if (measured > limit) {
      violations.push({
        day: day.day,
        measured: roundTo(measured, 1),
        limit,
        unit: policy.kind === 'time' ? 'min' : 'km',
      });
    }
  }

  return violations;
}

export function checkDailyDistance(
  itinerary: Itinerary,
  limits: HardLimits = DEFAULT_HARD_LIMITS
): HardConstraintViolation[] {
  return checkHardConstraints(itinerary, DISTANCE_POLICY, limits);
}

export function checkDailyTime(
  itinerary: Itinerary,
  mode: TransportMode,
  limits: HardLimits = DEFAULT_HARD_LIMITS
): HardConstraintViolation[] {
  return checkHardConstraints(itinerary, { kind: 'time', mode }, limits);
}

// ============================================
// Repair
// ============================================

/**
 * Index of the spot whose removal saves the most route cost.
 * Ties keep the earliest spot.
 */
function farthestSpotIndex(spots: readonly Spot[], mode?: TransportMode): number {
  let bestIdx = spots.length - 1;
  let bestSaving = -Infinity;

  for (let i = 0; i < spots.length; i++) {
    const prev = i > 0 ? spots[i - 1] : null;
    const next = i < spots.length - 1 ? spots[i + 1] : null;
    let saving = 0;
    if (prev) saving += legCost(prev, spots[i], mode);
    if (next) saving += legCost(spots[i], next, mode);
    if (prev && next) saving -= legCost(prev, next, mode);

    if (saving > bestSaving) {
      bestSaving = saving;
      bestIdx = i;
    }
  }

  return bestIdx;
}

function pickIndex(day: DayPlan, pick: RepairPick, policy: HardConstraintPolicy): number {
  if (pick === 'last') return day.spots.length - 1;
  return farthestSpotIndex(day.spots, policy.kind === 'time' ? policy.mode : undefined);
}

/**
 * Other non-empty day whose route ends closest to the spot.
 * Ties go to the first day in order.
 */
function nearestEndingDay(itinerary: Itinerary, spot: Spot, exclude: DayPlan): DayPlan | null {
  let target: DayPlan | null = null;
  let minDist = Infinity;

  for (const other of itinerary.days) {
    if (other === exclude || other.spots.length === 0) continue;
    const d = distance(spot, other.spots[other.spots.length - 1]);
    if (d < minDist) {
      minDist = d;
      target = other;
    }
  }

  return target;
}

/**
 * For every violating day with more than one spot, take one spot off and
 * append it to the day ending nearest to it. The destination route is not
 * reordered (see reorderRoutes). A spot with no destination is dropped and
 * listed in the result.
 */
export function repairItinerary(itinerary: Itinerary, options: RepairOptions = {}): RepairResult {
  const policy = options.policy ?? DISTANCE_POLICY;
  const violations = checkHardConstraints(itinerary, policy, options.limits);
  const pick = options.pick ?? 'last';
  const moved: MovedSpot[] = [];
  const dropped: DroppedSpot[] = [];

  for (const v of violations) {
    const day = itinerary.days.find(d => d.day === v.day);
    // A single-spot day is never reduced further
    if (!day || day.spots.length <= 1) continue;

    const [spot] = day.spots.splice(pickIndex(day, pick, policy), 1);
    const target = nearestEndingDay(itinerary, spot, day);

    if (target) {
      target.spots.push(spot);
      moved.push({ spot, fromDay: day.day, toDay: target.day });
    } else {
      dropped.push({ spot, fromDay: day.day });
    }
  }

  return { itinerary, violations, moved, dropped };
}

/**
 * Re-run nearest-neighbor ordering on every day, in place.
 */
export function reorderRoutes(itinerary: Itinerary, mode?: TransportMode): Itinerary {
  for (const day of itinerary.days) {
    day.spots = nearestNeighborPath(day.spots, mode);
  }
  return itinerary;
}
