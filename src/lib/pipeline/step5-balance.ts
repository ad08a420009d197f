/**
 * Planner — Step 5: Indoor/outdoor balance
 *
 * Gives all-outdoor days an indoor fallback by trading one outdoor spot for
 * an indoor spot from another day. Best effort: one swap per day, in place.
 */

import type { DayPlan, Itinerary, Spot } from '../types';
import type { BalanceResult } from './types';
import { isIndoor, isOutdoor } from '../services/semantics';

export function isAllOutdoor(day: DayPlan): boolean {
  return day.spots.length > 0 && day.spots.every(isOutdoor);
}

export function findAllOutdoorDays(itinerary: Itinerary): DayPlan[] {
  return itinerary.days.filter(isAllOutdoor);
}

/**
 * If the day at dayIndex (0-based) has an outdoor spot, swap its first outdoor
 * spot with the first indoor spot of the first other day that has one.
 * Both spots are appended to their new day. Returns false without touching
 * the itinerary when there is nothing to swap.
 *
 * `canDonate` narrows which days may give their indoor spot (all by default).
 */
export function swapOutdoorForIndoor(
  itinerary: Itinerary,
  dayIndex: number,
  canDonate: (donor: DayPlan, indoorSpot: Spot) => boolean = () => true
): boolean {
  if (!Number.isInteger(dayIndex) || dayIndex < 0 || dayIndex >= itinerary.days.length) {
    throw new RangeError(`dayIndex ${dayIndex} out of range (0..${itinerary.days.length - 1})`);
  }
  const day = itinerary.days[dayIndex];

  const outdoorSpot = day.spots.find(isOutdoor);
  if (!outdoorSpot) return false;

  for (const other of itinerary.days) {
    if (other === day) continue;

    const indoorSpot = other.spots.find(isIndoor);
    if (!indoorSpot || !canDonate(other, indoorSpot)) continue;

    day.spots.splice(day.spots.indexOf(outdoorSpot), 1);
    other.spots.splice(other.spots.indexOf(indoorSpot), 1);
    day.spots.push(indoorSpot);
    other.spots.push(outdoorSpot);
    return true;
  }

  return false;
}

/** A donor must keep at least one non-outdoor spot after giving one away */
function keepsShelter(donor: DayPlan, indoorSpot: Spot): boolean {
  return donor.spots.some(s => s !== indoorSpot && !isOutdoor(s));
}

/**
 * Run swapOutdoorForIndoor on every day that is all-outdoor at the time it is
 * visited, only taking from days that will not turn all-outdoor themselves.
 */
export function balanceIndoorOutdoor(itinerary: Itinerary): BalanceResult {
  const swappedDays: number[] = [];
  const unresolvedDays: number[] = [];

  itinerary.days.forEach((day, idx) => {
    if (!isAllOutdoor(day)) return;

    if (swapOutdoorForIndoor(itinerary, idx, keepsShelter)) {
      swappedDays.push(day.day);
      console.log(`[Planner] Indoor/outdoor swap: Day ${day.day} now has an indoor spot`);
    } else {
      unresolvedDays.push(day.day);
    }
  });

  return { swappedDays, unresolvedDays };
}
