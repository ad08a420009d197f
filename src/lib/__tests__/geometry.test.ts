import {
  distance,
  legCost,
  routeDistanceKm,
  routeTravelMinutes,
  spotKey,
  travelCost,
} from '../services/geometry';
import { isIndoor, isOutdoor } from '../services/semantics';
import type { Spot } from '../types';

function spot(name: string, lat: number, lon: number, category = 'sightseeing'): Spot {
  return { name, lat, lon, category };
}

describe('distance', () => {
  const a = spot('A', 0, 0);
  const b = spot('B', 0.03, 0.04);

  it('scales the euclidean degree distance by 111 km', () => {
    expect(distance(a, b)).toBeCloseTo(5.55, 10);
  });

  it('is symmetric and zero for identical coordinates', () => {
    expect(distance(a, b)).toBe(distance(b, a));
    expect(distance(a, a)).toBe(0);
    expect(distance(a, spot('A bis', 0, 0))).toBe(0);
  });
});

describe('travelCost', () => {
  const a = spot('A', 0, 0);
  const b = spot('B', 0.03, 0.04); // 5.55 km

  it('converts km to minutes with the mode speed plus overhead', () => {
    expect(travelCost(a, b, 'walk')).toBeCloseTo(66.6, 10);
    expect(travelCost(a, b, 'transit')).toBeCloseTo(21.65, 10);
    expect(travelCost(a, b, 'taxi')).toBeCloseTo(13.32, 10);
  });

  it('makes walking the slowest mode', () => {
    expect(travelCost(a, b, 'walk')).toBeGreaterThan(travelCost(a, b, 'transit'));
    expect(travelCost(a, b, 'walk')).toBeGreaterThan(travelCost(a, b, 'taxi'));
  });

  it('grows with distance for a fixed mode', () => {
    const near = spot('Near', 0, 0.01);
    const far = spot('Far', 0, 0.02);
    expect(travelCost(a, far, 'transit')).toBeGreaterThan(travelCost(a, near, 'transit'));
  });

  it('charges only the transit overhead for a zero-length leg', () => {
    expect(travelCost(a, a, 'transit')).toBe(5);
    expect(travelCost(a, a, 'walk')).toBe(0);
  });
});

describe('legCost', () => {
  it('falls back to km without a mode', () => {
    const a = spot('A', 0, 0);
    const b = spot('B', 0.03, 0.04);
    expect(legCost(a, b)).toBe(distance(a, b));
    expect(legCost(a, b, 'taxi')).toBe(travelCost(a, b, 'taxi'));
  });
});

describe('route totals', () => {
  it('sums consecutive legs', () => {
    const route = [spot('A', 0, 0), spot('B', 0, 0.01), spot('C', 0, 0.03)];
    expect(routeDistanceKm(route)).toBeCloseTo(3.33, 10);
    expect(routeTravelMinutes(route, 'transit')).toBeCloseTo(3.33 / 20 * 60 + 10, 10);
  });

  it('is zero for empty and single-spot routes', () => {
    expect(routeDistanceKm([])).toBe(0);
    expect(routeDistanceKm([spot('A', 1, 1)])).toBe(0);
    expect(routeTravelMinutes([spot('A', 1, 1)], 'transit')).toBe(0);
  });
});

describe('spotKey', () => {
  it('combines name and coordinates', () => {
    expect(spotKey(spot('Tower', 35.5, 139.25))).toBe('Tower@35.5,139.25');
  });
});

describe('semantic classifier', () => {
  it('recognizes outdoor categories', () => {
    for (const category of ['outdoor', 'beach', 'park', 'garden']) {
      expect(isOutdoor({ category })).toBe(true);
      expect(isIndoor({ category })).toBe(false);
    }
  });

  it('recognizes indoor categories', () => {
    for (const category of ['indoor', 'museum', 'shopping', 'temple']) {
      expect(isIndoor({ category })).toBe(true);
      expect(isOutdoor({ category })).toBe(false);
    }
  });

  it('classifies other and unknown categories as neither', () => {
    for (const category of ['food', 'history', 'sightseeing', 'volcano']) {
      expect(isIndoor({ category })).toBe(false);
      expect(isOutdoor({ category })).toBe(false);
    }
  });
});
