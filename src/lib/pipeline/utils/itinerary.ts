/**
 * Small helpers over Itinerary / DayPlan values.
 * Day distances are always derived from the current route, never stored.
 */

import type { DayPlan, Itinerary, Spot, TransportMode } from '../../types';
import { routeDistanceKm, routeTravelMinutes } from '../../services/geometry';

export function dayDistanceKm(day: DayPlan): number {
  return routeDistanceKm(day.spots);
}

export function dayTravelMinutes(day: DayPlan, mode: TransportMode): number {
  return routeTravelMinutes(day.spots, mode);
}

/**
 * Copies the day arrays. Spots are immutable and shared between copies.
 */
export function cloneItinerary(itinerary: Itinerary): Itinerary {
  return {
    city: itinerary.city,
    days: itinerary.days.map(d => ({ day: d.day, spots: [...d.spots] })),
  };
}

export function countSpots(itinerary: Itinerary): number {
  return itinerary.days.reduce((sum, d) => sum + d.spots.length, 0);
}

export function allSpots(itinerary: Itinerary): Spot[] {
  return itinerary.days.flatMap(d => d.spots);
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function assertDayCount(dayCount: number): void {
  if (!Number.isInteger(dayCount) || dayCount <= 0) {
    throw new RangeError(`dayCount must be a positive integer, got ${dayCount}`);
  }
}
