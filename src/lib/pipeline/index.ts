/**
 * Planner — Main Orchestrator
 *
 * optimize → hard-limit repair → indoor/outdoor balance → final scoring.
 * Synchronous and CPU-bound; callers needing a deadline bound `trials`.
 */

import type { HardConstraintPolicy, OnPlannerEvent, PlanRequest, PlanResult, PlannerEvent } from './types';
export type {
  PlanRequest,
  PlanResult,
  PlannerEvent,
  OnPlannerEvent,
  PartitionStrategy,
  AcceptancePolicy,
  HardConstraintPolicy,
  HardConstraintViolation,
  RepairResult,
  BalanceResult,
  DaySummary,
  OptimizeResult,
} from './types';
import { optimizeItinerary } from './step3-optimize';
import { scoreItinerary } from './step2-score';
import { checkHardConstraints, repairItinerary, reorderRoutes } from './step4-repair';
import { balanceIndoorOutdoor } from './step5-balance';
import { summarizeItinerary } from './summary';
import { DEFAULT_HARD_LIMITS, DEFAULT_SCORE_CONFIG } from './utils/constants';
import { countSpots } from './utils/itinerary';

export { buildInitialItinerary, nearestNeighborPath, roundRobinPartition, chunkedPartition } from './step1-cluster';
export { scoreItinerary } from './step2-score';
export {
  optimizeItinerary,
  strictImprovement,
  simulatedAnnealingAcceptance,
} from './step3-optimize';
export {
  checkHardConstraints,
  checkDailyDistance,
  checkDailyTime,
  repairItinerary,
  reorderRoutes,
} from './step4-repair';
export { swapOutdoorForIndoor, balanceIndoorOutdoor, findAllOutdoorDays, isAllOutdoor } from './step5-balance';
export { summarizeItinerary } from './summary';

// ---------------------------------------------------------------------------
// Planner event system: emit helper
// ---------------------------------------------------------------------------
function emit(onEvent: OnPlannerEvent | undefined, partial: Omit<PlannerEvent, 'timestamp'>) {
  onEvent?.({ ...partial, timestamp: Date.now() });
}

/**
 * Plan an itinerary for one request.
 */
export function planItinerary(request: PlanRequest, onEvent?: OnPlannerEvent): PlanResult {
  const config = request.config ?? DEFAULT_SCORE_CONFIG;
  const limits = request.hardLimits ?? DEFAULT_HARD_LIMITS;
  const mode = request.mode;
  const policy: HardConstraintPolicy = mode ? { kind: 'time', mode } : { kind: 'distance' };
  const T0 = Date.now();

  // Step 1: Construction + local search
  console.log(`[Planner] === Step 1: Optimizing ${request.spots.length} spots over ${request.dayCount} days (${request.city}) ===`);
  emit(onEvent, { type: 'step_start', step: 1, stepName: 'Local search' });
  const optimized = optimizeItinerary(request.city, request.spots, request.dayCount, config, {
    trials: request.trials,
    seed: request.seed,
    mode,
    acceptance: request.acceptance,
    strategy: request.strategy,
  });
  const { itinerary, stats } = optimized;
  const step1Ms = Date.now() - T0;
  console.log(`[Planner] Step 1 done in ${step1Ms}ms: score ${optimized.score.toFixed(2)} (${stats.improved} improvements, ${stats.noOps} no-op trials out of ${stats.trials})`);
  emit(onEvent, { type: 'step_done', step: 1, stepName: 'Local search', durationMs: step1Ms, detail: `score ${optimized.score.toFixed(2)}` });

  // Step 2: Hard limits
  let repair: PlanResult['repair'] = null;
  if (request.enforceHardLimits ?? true) {
    emit(onEvent, { type: 'step_start', step: 2, stepName: 'Hard limits' });
    const T2 = Date.now();
    repair = repairItinerary(itinerary, { policy, limits });
    reorderRoutes(itinerary, mode);
    for (const m of repair.moved) {
      console.log(`[Planner] Hard limit: moved "${m.spot.name}" from Day ${m.fromDay} to Day ${m.toDay}`);
    }
    for (const d of repair.dropped) {
      console.warn(`[Planner] Hard limit: "${d.spot.name}" dropped from Day ${d.fromDay}, no other day could take it`);
    }
    emit(onEvent, {
      type: 'step_done',
      step: 2,
      stepName: 'Hard limits',
      durationMs: Date.now() - T2,
      detail: `${repair.violations.length} violations, ${repair.moved.length} moved, ${repair.dropped.length} dropped`,
    });
  }

  // Step 3: Indoor/outdoor balance
  let balance: PlanResult['balance'] = null;
  if (request.balanceIndoorOutdoor ?? true) {
    emit(onEvent, { type: 'step_start', step: 3, stepName: 'Indoor/outdoor balance' });
    const T3 = Date.now();
    balance = balanceIndoorOutdoor(itinerary);
    if (balance.swappedDays.length > 0) reorderRoutes(itinerary, mode);
    if (balance.unresolvedDays.length > 0) {
      console.warn(`[Planner] No indoor spot available for all-outdoor day(s): ${balance.unresolvedDays.join(', ')}`);
    }
    emit(onEvent, {
      type: 'step_done',
      step: 3,
      stepName: 'Indoor/outdoor balance',
      durationMs: Date.now() - T3,
      detail: `${balance.swappedDays.length} swapped, ${balance.unresolvedDays.length} unresolved`,
    });
  }

  // Step 4: Final scoring (post-processing may have moved spots)
  emit(onEvent, { type: 'step_start', step: 4, stepName: 'Final scoring' });
  const T4 = Date.now();
  const { score, reasons } = scoreItinerary(itinerary, config, mode);
  const violations = checkHardConstraints(itinerary, policy, limits);
  const summary = summarizeItinerary(itinerary, { mode, startDate: request.startDate });
  console.log(`[Planner] Step 4: score ${score.toFixed(2)}, ${reasons.length} penalties, ${violations.length} hard violations, ${countSpots(itinerary)}/${request.spots.length} spots placed`);
  emit(onEvent, { type: 'step_done', step: 4, stepName: 'Final scoring', durationMs: Date.now() - T4, detail: `score ${score.toFixed(2)}` });

  console.log(`[Planner] Done in ${Date.now() - T0}ms`);

  return { itinerary, score, reasons, summary, violations, repair, balance, stats };
}
