/**
 * Planner — internal types
 */

import type { HardLimits, Itinerary, ScoreConfig, Spot, TransportMode } from '../types';
import type { RandomFn } from './utils/random';

// ============================================
// Step 1: Construction
// ============================================

/**
 * Splits spots (already sorted by longitude) into at most dayCount groups.
 */
export interface PartitionStrategy {
  readonly name: string;
  partition(sorted: readonly Spot[], dayCount: number): Spot[][];
}

export interface BuildOptions {
  strategy?: PartitionStrategy;
  /** Order routes by travel minutes instead of km */
  mode?: TransportMode;
}

// ============================================
// Step 3: Local search
// ============================================

export interface AcceptanceContext {
  candidateScore: number;
  currentScore: number;
  bestScore: number;
  /** 0-based trial number */
  trial: number;
  randomFn: RandomFn;
}

/**
 * Decides whether a mutated candidate replaces the current state.
 * The best itinerary only ever changes on strict improvement, whatever the policy.
 */
export interface AcceptancePolicy {
  readonly name: string;
  accept(ctx: AcceptanceContext): boolean;
}

export interface OptimizeOptions extends BuildOptions {
  trials?: number;
  seed?: number;
  acceptance?: AcceptancePolicy;
  /** Overrides the seeded generator */
  randomFn?: RandomFn;
}

export interface OptimizerStats {
  trials: number;
  /** Candidates that became the current state */
  accepted: number;
  /** Candidates that became the best */
  improved: number;
  /** Trials where no operator could apply */
  noOps: number;
}

export interface OptimizeResult {
  itinerary: Itinerary;
  score: number;
  reasons: string[];
  stats: OptimizerStats;
}

export type MutationKind = 'move' | 'swap';

// ============================================
// Step 4: Hard constraints
// ============================================

export type HardConstraintPolicy =
  | { kind: 'distance' }
  | { kind: 'time'; mode: TransportMode };

export interface HardConstraintViolation {
  day: number;
  /** Rounded to 1 decimal */
  measured: number;
  limit: number;
  unit: 'km' | 'min';
}

export type RepairPick = 'last' | 'farthest';

export interface RepairOptions {
  policy?: HardConstraintPolicy;
  limits?: HardLimits;
  pick?: RepairPick;
}

export interface MovedSpot {
  spot: Spot;
  fromDay: number;
  toDay: number;
}

export interface DroppedSpot {
  spot: Spot;
  fromDay: number;
}

export interface RepairResult {
  itinerary: Itinerary;
  violations: HardConstraintViolation[];
  moved: MovedSpot[];
  /** Spots removed with no other day to take them: no longer in the itinerary */
  dropped: DroppedSpot[];
}

// ============================================
// Step 5: Indoor/outdoor balance
// ============================================

export interface BalanceResult {
  /** Day numbers that received an indoor spot */
  swappedDays: number[];
  /** All-outdoor day numbers for which no donor day was found */
  unresolvedDays: number[];
}

// ============================================
// Orchestration
// ============================================

export interface DaySummary {
  day: number;
  /** yyyy-MM-dd, present when a start date was given */
  date?: string;
  spotNames: string[];
  totalDistanceKm: number;
  travelMinutes?: number;
  outdoorCount: number;
  indoorCount: number;
}

export interface PlanRequest {
  city: string;
  spots: Spot[];
  dayCount: number;
  config?: ScoreConfig;
  mode?: TransportMode;
  trials?: number;
  seed?: number;
  acceptance?: AcceptancePolicy;
  strategy?: PartitionStrategy;
  startDate?: Date;
  /** Run the hard-limit repair pass (default true) */
  enforceHardLimits?: boolean;
  hardLimits?: HardLimits;
  /** Run the indoor/outdoor balancer (default true) */
  balanceIndoorOutdoor?: boolean;
}

export interface PlanResult {
  itinerary: Itinerary;
  score: number;
  reasons: string[];
  summary: DaySummary[];
  /** Hard-limit violations left after post-processing */
  violations: HardConstraintViolation[];
  repair: RepairResult | null;
  balance: BalanceResult | null;
  stats: OptimizerStats;
}

export interface PlannerEvent {
  type: 'step_start' | 'step_done';
  step: number;
  stepName: string;
  durationMs?: number;
  detail?: string;
  timestamp: number;
}

export type OnPlannerEvent = (event: PlannerEvent) => void;
