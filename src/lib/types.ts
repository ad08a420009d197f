// ============================================
// Spots
// ============================================

export interface Spot {
  readonly name: string;
  readonly lat: number;
  readonly lon: number;
  /** Lowercase, e.g. 'park', 'museum'. Unknown categories are kept as-is */
  readonly category: string;
  readonly durationMinutes?: number;
  readonly rating?: number; // 1.0 - 5.0
}

// ============================================
// Transport
// ============================================

export type TransportMode = 'walk' | 'transit' | 'taxi';

export const TRANSPORT_MODES: readonly TransportMode[] = ['walk', 'transit', 'taxi'];

export interface TransportProfile {
  speedKmh: number;
  /** Fixed cost added to every leg (waiting for a train, etc.) */
  overheadMinutes: number;
}

// ============================================
// Itinerary
// ============================================

export interface DayPlan {
  /** 1-based, equals the day's position in the itinerary + 1 */
  day: number;
  /** Visiting order: this is the route */
  spots: Spot[];
}

export interface Itinerary {
  city: string;
  days: DayPlan[];
}

// ============================================
// Scoring
// ============================================

export interface ScoreConfig {
  readonly maxDailyKm: number;
  /** Added per km over maxDailyKm */
  readonly exceedKmPenalty: number;
  /** Flat penalty for a day below minSpotsPerDay */
  readonly oneSpotDayPenalty: number;
  /** Only enforced when the total spot count lets every day reach it */
  readonly minSpotsPerDay: number;
  /** Mode-aware variant: daily budget in minutes, used when a mode is given */
  readonly maxDailyMinutes?: Readonly<Record<TransportMode, number>>;
  /** Added per minute over maxDailyMinutes */
  readonly exceedMinutePenalty?: number;
}

export interface ScoreResult {
  score: number;
  reasons: string[];
}

/** Fixed ceilings checked outside the scorer */
export interface HardLimits {
  readonly maxDailyKm: number;
  readonly maxDailyMinutes: Readonly<Record<TransportMode, number>>;
}
