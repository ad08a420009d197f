/**
 * Planner — Step 1: Initial construction
 *
 * Sorts spots by longitude (a cheap locality proxy), splits them across days
 * with a PartitionStrategy, then orders every day by nearest-neighbor chaining.
 * Pure function, no randomness.
 */

import type { DayPlan, Itinerary, Spot, TransportMode } from '../types';
import type { BuildOptions, PartitionStrategy } from './types';
import { legCost } from '../services/geometry';
import { assertDayCount } from './utils/itinerary';

/**
 * Spot i goes to day (i mod dayCount). Lossless, day sizes differ by at most one.
 */
export const roundRobinPartition: PartitionStrategy = {
  name: 'round-robin',
  partition(sorted, dayCount) {
    const groups: Spot[][] = Array.from({ length: dayCount }, () => []);
    sorted.forEach((spot, i) => {
      groups[i % dayCount].push(spot);
    });
    return groups;
  },
};

/**
 * Contiguous blocks of floor(n / dayCount) spots (at least 1).
 * Blocks past dayCount are discarded, so the remainder is lost when n
 * does not divide evenly. Kept for comparison with round-robin.
 */
export const chunkedPartition: PartitionStrategy = {
  name: 'chunked',
  partition(sorted, dayCount) {
    const chunkSize = Math.max(1, Math.floor(sorted.length / dayCount));
    const chunks: Spot[][] = [];
    for (let i = 0; i < sorted.length; i += chunkSize) {
      chunks.push(sorted.slice(i, i + chunkSize));
    }
    return chunks.slice(0, dayCount);
  },
};

export function sortByLongitude(spots: readonly Spot[]): Spot[] {
  return [...spots].sort((a, b) => a.lon - b.lon || a.lat - b.lat);
}

/**
 * Greedy route: start from the first spot, always go to the closest unvisited one.
 * Ties go to the spot met first. O(n^2), fine for day-sized inputs.
 */
export function nearestNeighborPath(spots: readonly Spot[], mode?: TransportMode): Spot[] {
  if (spots.length === 0) return [];

  const remaining = [...spots];
  const path: Spot[] = [remaining[0]];
  remaining.splice(0, 1);

  while (remaining.length > 0) {
    const last = path[path.length - 1];
    let nearestIdx = 0;
    let nearestCost = Infinity;

    for (let i = 0; i < remaining.length; i++) {
      const c = legCost(last, remaining[i], mode);
      if (c < nearestCost) {
        nearestCost = c;
        nearestIdx = i;
      }
    }

    path.push(remaining[nearestIdx]);
    remaining.splice(nearestIdx, 1);
  }

  return path;
}

/**
 * Build the seed itinerary: always dayCount days, some possibly empty.
 */
export function buildInitialItinerary(
  city: string,
  spots: readonly Spot[],
  dayCount: number,
  options: BuildOptions = {}
): Itinerary {
  assertDayCount(dayCount);
  const strategy = options.strategy ?? roundRobinPartition;

  const groups = strategy.partition(sortByLongitude(spots), dayCount);

  const days: DayPlan[] = Array.from({ length: dayCount }, (_, i) => ({
    day: i + 1,
    spots: nearestNeighborPath(groups[i] ?? [], options.mode),
  }));

  return { city, days };
}
