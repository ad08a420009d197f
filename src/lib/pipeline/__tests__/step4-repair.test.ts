import {
  checkDailyDistance,
  checkDailyTime,
  checkHardConstraints,
  repairItinerary,
  reorderRoutes,
} from '../step4-repair';
import { DEFAULT_HARD_LIMITS } from '../utils/constants';
import type { Itinerary, Spot } from '../../types';

function spot(name: string, lat: number, lon: number): Spot {
  return { name, lat, lon, category: 'sightseeing' };
}

function itinerary(...days: Spot[][]): Itinerary {
  return { city: 'Testville', days: days.map((spots, i) => ({ day: i + 1, spots })) };
}

function names(trip: Itinerary): string[][] {
  return trip.days.map(d => d.spots.map(s => s.name));
}

const A = spot('A', 0, 0);
const B = spot('B', 0, 0.03);
const C = spot('C', 0, 0.06);
const D = spot('D', 0, 0.07);

describe('checkHardConstraints', () => {
  it('flags a day over the distance ceiling', () => {
    // A → B → C = 6.66 km
    const trip = itinerary([A, B, C], [D]);
    expect(checkHardConstraints(trip)).toEqual([{ day: 1, measured: 6.7, limit: 6, unit: 'km' }]);
    expect(checkDailyDistance(trip)).toEqual(checkHardConstraints(trip));
  });

  it('accepts days at or under the ceiling', () => {
    expect(checkDailyDistance(itinerary([A, B], [C, D], []))).toEqual([]);
  });

  it('honors custom limits', () => {
    const trip = itinerary([A, B]);
    expect(checkDailyDistance(trip, { ...DEFAULT_HARD_LIMITS, maxDailyKm: 3 })).toEqual([
      { day: 1, measured: 3.3, limit: 3, unit: 'km' },
    ]);
  });

  it('checks travel minutes for a mode', () => {
    // 22.2 km on foot at 5 km/h = 266.4 min
    const trip = itinerary([A, spot('E', 0, 0.2)]);
    expect(checkDailyTime(trip, 'walk')).toEqual([{ day: 1, measured: 266.4, limit: 240, unit: 'min' }]);
    expect(checkDailyTime(trip, 'taxi')).toEqual([]);
    expect(checkHardConstraints(trip, { kind: 'time', mode: 'walk' })).toEqual(checkDailyTime(trip, 'walk'));
  });
});

describe('repairItinerary', () => {
  it('moves the last spot of a violating day to the day ending nearest to it', () => {
    const trip = itinerary([A, B, C], [D]);
    const result = repairItinerary(trip);

    expect(result.itinerary).toBe(trip);
    expect(result.violations).toEqual([{ day: 1, measured: 6.7, limit: 6, unit: 'km' }]);
    expect(result.moved).toEqual([{ spot: C, fromDay: 1, toDay: 2 }]);
    expect(result.dropped).toEqual([]);
    expect(names(trip)).toEqual([['A', 'B'], ['D', 'C']]);
    expect(checkDailyDistance(trip)).toEqual([]);
  });

  it('drops the spot when no other day can take it', () => {
    const trip = itinerary([A, B, C], []);
    const result = repairItinerary(trip);

    expect(result.moved).toEqual([]);
    expect(result.dropped).toEqual([{ spot: C, fromDay: 1 }]);
    expect(names(trip)).toEqual([['A', 'B'], []]);
  });

  it('skips empty days when looking for a destination', () => {
    const trip = itinerary([A, B, C], [], [spot('Far', 1, 1)]);
    const result = repairItinerary(trip);
    expect(result.moved).toEqual([{ spot: C, fromDay: 1, toDay: 3 }]);
  });

  it('breaks distance ties in favor of the earlier day', () => {
    const C7 = spot('C7', 0, 0.07);
    const trip = itinerary([A, B, C7], [spot('North', 0.01, 0.06)], [spot('South', -0.01, 0.06)]);
    const result = repairItinerary(trip);
    expect(result.moved).toEqual([{ spot: C7, fromDay: 1, toDay: 2 }]);
  });

  it('leaves the destination route order as appended', () => {
    const trip = itinerary([A, B, C], [spot('W', 0, 0.1), spot('V', 0, 0.09)]);
    repairItinerary(trip);
    expect(names(trip)[1]).toEqual(['W', 'V', 'C']);
  });

  it('can take the spot whose removal saves the most', () => {
    const F = spot('F', 0.05, 0.01);
    const B2 = spot('B2', 0, 0.02);
    const limits = { ...DEFAULT_HARD_LIMITS, maxDailyKm: 1 };

    const farthest = itinerary([A, F, B2], [spot('G', 0, 0.5)]);
    expect(repairItinerary(farthest, { limits, pick: 'farthest' }).moved).toEqual([{ spot: F, fromDay: 1, toDay: 2 }]);

    const last = itinerary([A, F, B2], [spot('G', 0, 0.5)]);
    expect(repairItinerary(last, { limits }).moved).toEqual([{ spot: B2, fromDay: 1, toDay: 2 }]);
  });

  it('repairs against a time policy', () => {
    const E = spot('E', 0, 0.2);
    const trip = itinerary([A, E], [spot('G', 0, 0.25)]);
    const result = repairItinerary(trip, { policy: { kind: 'time', mode: 'walk' } });

    expect(result.violations).toEqual([{ day: 1, measured: 266.4, limit: 240, unit: 'min' }]);
    expect(result.moved).toEqual([{ spot: E, fromDay: 1, toDay: 2 }]);
  });

  it('never empties a single-spot day', () => {
    // A lone spot has no legs, so it cannot violate; repair leaves such itineraries alone
    const trip = itinerary([A], [D]);
    expect(repairItinerary(trip)).toEqual({ itinerary: trip, violations: [], moved: [], dropped: [] });
  });
});

describe('reorderRoutes', () => {
  it('re-chains every day by nearest neighbor from its first spot', () => {
    const trip = itinerary([spot('C', 0, 0.02), spot('A', 0, 0), spot('B', 0, 0.01)], []);
    expect(reorderRoutes(trip)).toBe(trip);
    expect(names(trip)).toEqual([['C', 'B', 'A'], []]);
  });
});
