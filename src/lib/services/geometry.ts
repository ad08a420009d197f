/**
 * Geometry & travel cost
 *
 * Flat-earth distances between spots and per-mode travel times.
 * Good enough inside a city; not meant for spans of hundreds of km.
 */

import type { Spot, TransportMode } from '../types';
import { KM_PER_DEGREE, TRANSPORT_PROFILES } from '../pipeline/utils/constants';

type Coords = Pick<Spot, 'lat' | 'lon'>;

/**
 * Euclidean distance in km between two (lat, lon) points, 111 km per degree.
 */
export function distance(a: Coords, b: Coords): number {
  const dLat = a.lat - b.lat;
  const dLon = a.lon - b.lon;
  return Math.sqrt(dLat * dLat + dLon * dLon) * KM_PER_DEGREE;
}

/**
 * Travel time in minutes from a to b with the given mode (speed + fixed overhead).
 */
export function travelCost(a: Coords, b: Coords, mode: TransportMode): number {
  const profile = TRANSPORT_PROFILES[mode];
  return (distance(a, b) / profile.speedKmh) * 60 + profile.overheadMinutes;
}

/**
 * Cost of one leg: minutes when the mode is known, km otherwise.
 * Used as the ordering key by nearest-neighbor chaining.
 */
export function legCost(a: Coords, b: Coords, mode?: TransportMode): number {
  return mode ? travelCost(a, b, mode) : distance(a, b);
}

export function routeDistanceKm(spots: readonly Coords[]): number {
  let total = 0;
  for (let i = 0; i < spots.length - 1; i++) {
    total += distance(spots[i], spots[i + 1]);
  }
  return total;
}

export function routeTravelMinutes(spots: readonly Coords[], mode: TransportMode): number {
  let total = 0;
  for (let i = 0; i < spots.length - 1; i++) {
    total += travelCost(spots[i], spots[i + 1], mode);
  }
  return total;
}

/** Stable identity of a spot for the lifetime of a plan */
export function spotKey(spot: Spot): string {
  return `${spot.name}@${spot.lat},${spot.lon}`;
}
