import { addDays, format } from 'date-fns';
import type { Itinerary, TransportMode } from '../types';
import type { DaySummary } from './types';
import { isIndoor, isOutdoor } from '../services/semantics';
import { dayDistanceKm, dayTravelMinutes, roundTo } from './utils/itinerary';

export interface SummaryOptions {
  mode?: TransportMode;
  /** Date of day 1 */
  startDate?: Date;
}

/**
 * Per-day figures computed from the current routes.
 */
export function summarizeItinerary(itinerary: Itinerary, options: SummaryOptions = {}): DaySummary[] {
  const { mode, startDate } = options;

  return itinerary.days.map(day => {
    const summary: DaySummary = {
      day: day.day,
      spotNames: day.spots.map(s => s.name),
      totalDistanceKm: roundTo(dayDistanceKm(day), 2),
      outdoorCount: day.spots.filter(isOutdoor).length,
      indoorCount: day.spots.filter(isIndoor).length,
    };
    if (startDate) {
      summary.date = format(addDays(startDate, day.day - 1), 'yyyy-MM-dd');
    }
    if (mode) {
      summary.travelMinutes = roundTo(dayTravelMinutes(day, mode), 1);
    }
    return summary;
  });
}
