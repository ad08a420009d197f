/**
 * Planner — Step 3: Local search
 *
 * Stochastic hill-climbing over the seed itinerary:
 * 1. Clone the current itinerary
 * 2. Apply one mutation: move (60%) or swap (40%)
 * 3. Re-run nearest-neighbor on the days it touched
 * 4. Score the candidate and ask the acceptance policy whether to keep it
 *
 * Fixed trial budget, no early stopping, seeded randomness.
 * Cost: O(trials × days × daySize²).
 */

import type { Itinerary, ScoreConfig, Spot, TransportMode } from '../types';
import type { AcceptancePolicy, MutationKind, OptimizeOptions, OptimizeResult, OptimizerStats } from './types';
import { buildInitialItinerary, nearestNeighborPath } from './step1-cluster';
import { scoreItinerary } from './step2-score';
import { DEFAULT_SEED, DEFAULT_TRIALS, MOVE_PROBABILITY } from './utils/constants';
import { cloneItinerary } from './utils/itinerary';
import { createSeededRandom, pickWithRandom, randomIndex } from './utils/random';
import type { RandomFn } from './utils/random';

// ============================================
// Acceptance policies
// ============================================

/**
 * Keep a candidate only if it beats the best score so far.
 * Pure ascent: stuck at the first local optimum.
 */
export const strictImprovement: AcceptancePolicy = {
  name: 'strict-improvement',
  accept: ({ candidateScore, bestScore }) => candidateScore < bestScore,
};

export interface AnnealingOptions {
  initialTemperature?: number;
  /** Temperature multiplier per trial, in (0, 1) */
  coolingRate?: number;
}

/**
 * Accepts every improvement over the current state, and a worse candidate
 * with probability exp(-Δ / T), T = initialTemperature × coolingRate^trial.
 */
export function simulatedAnnealingAcceptance(options: AnnealingOptions = {}): AcceptancePolicy {
  const initialTemperature = options.initialTemperature ?? 10;
  const coolingRate = options.coolingRate ?? 0.98;
  if (!(initialTemperature > 0)) {
    throw new RangeError(`initialTemperature must be > 0, got ${initialTemperature}`);
  }
  if (!(coolingRate > 0 && coolingRate < 1)) {
    throw new RangeError(`coolingRate must be in (0, 1), got ${coolingRate}`);
  }

  return {
    name: 'simulated-annealing',
    accept({ candidateScore, currentScore, trial, randomFn }) {
      if (candidateScore < currentScore) return true;
      const temperature = initialTemperature * coolingRate ** trial;
      return randomFn() < Math.exp((currentScore - candidateScore) / temperature);
    },
  };
}

// ============================================
// Mutation operators
// ============================================

function reorder(spots: Spot[], mode?: TransportMode): Spot[] {
  return nearestNeighborPath(spots, mode);
}

/**
 * Move a random spot from a day holding ≥2 spots to a random other day.
 * Returns false (no-op) when no day qualifies.
 */
export function applyMove(itinerary: Itinerary, randomFn: RandomFn, mode?: TransportMode): boolean {
  if (itinerary.days.length < 2) return false;

  const sources = itinerary.days.filter(d => d.spots.length >= 2);
  if (sources.length === 0) return false;

  const source = pickWithRandom(sources, randomFn);
  const [spot] = source.spots.splice(randomIndex(source.spots.length, randomFn), 1);
  const target = pickWithRandom(itinerary.days.filter(d => d !== source), randomFn);
  target.spots.push(spot);

  source.spots = reorder(source.spots, mode);
  target.spots = reorder(target.spots, mode);
  return true;
}

/**
 * Exchange one random spot between two distinct non-empty days.
 * Returns false (no-op) when fewer than two days hold spots.
 */
export function applySwap(itinerary: Itinerary, randomFn: RandomFn, mode?: TransportMode): boolean {
  const eligible = itinerary.days.filter(d => d.spots.length >= 1);
  if (eligible.length < 2) return false;

  const i = randomIndex(eligible.length, randomFn);
  let j = randomIndex(eligible.length - 1, randomFn);
  if (j >= i) j++;

  const a = eligible[i];
  const b = eligible[j];
  const ai = randomIndex(a.spots.length, randomFn);
  const bi = randomIndex(b.spots.length, randomFn);

  const spotA = a.spots[ai];
  a.spots[ai] = b.spots[bi];
  b.spots[bi] = spotA;

  a.spots = reorder(a.spots, mode);
  b.spots = reorder(b.spots, mode);
  return true;
}

// ============================================
// Search loop
// ============================================

export function optimizeItinerary(
  city: string,
  spots: readonly Spot[],
  dayCount: number,
  config: ScoreConfig,
  options: OptimizeOptions = {}
): OptimizeResult {
  const trials = options.trials ?? DEFAULT_TRIALS;
  if (!Number.isInteger(trials) || trials < 0) {
    throw new RangeError(`trials must be a non-negative integer, got ${trials}`);
  }
  const randomFn = options.randomFn ?? createSeededRandom(options.seed ?? DEFAULT_SEED);
  const acceptance = options.acceptance ?? strictImprovement;
  const mode = options.mode;

  let current = buildInitialItinerary(city, spots, dayCount, options);
  let currentScore = scoreItinerary(current, config, mode).score;
  let best = current;
  let bestScore = currentScore;

  const stats: OptimizerStats = { trials, accepted: 0, improved: 0, noOps: 0 };

  for (let trial = 0; trial < trials; trial++) {
    // Mutations only ever touch the clone: current and best stay intact on rejection
    const candidate = cloneItinerary(current);
    const kind: MutationKind = randomFn() < MOVE_PROBABILITY ? 'move' : 'swap';
    const applied = kind === 'move'
      ? applyMove(candidate, randomFn, mode)
      : applySwap(candidate, randomFn, mode);

    if (!applied) {
      stats.noOps++;
      continue;
    }

    const candidateScore = scoreItinerary(candidate, config, mode).score;
    if (!acceptance.accept({ candidateScore, currentScore, bestScore, trial, randomFn })) {
      continue;
    }

    current = candidate;
    currentScore = candidateScore;
    stats.accepted++;

    if (candidateScore < bestScore) {
      best = candidate;
      bestScore = candidateScore;
      stats.improved++;
    }
  }

  const { score, reasons } = scoreItinerary(best, config, mode);
  return { itinerary: best, score, reasons, stats };
}
