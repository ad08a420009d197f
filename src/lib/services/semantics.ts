import type { Spot } from '../types';
import { INDOOR_CATEGORIES, OUTDOOR_CATEGORIES } from '../pipeline/utils/constants';

export function isOutdoor(spot: Pick<Spot, 'category'>): boolean {
  return OUTDOOR_CATEGORIES.has(spot.category);
}

export function isIndoor(spot: Pick<Spot, 'category'>): boolean {
  return INDOOR_CATEGORIES.has(spot.category);
}
