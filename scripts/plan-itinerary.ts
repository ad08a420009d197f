/**
 * Plan an itinerary for a city spot file and print a self-check report.
 * Usage: npx tsx scripts/plan-itinerary.ts [city] [walk|transit|taxi]
 * Examples: npx tsx scripts/plan-itinerary.ts tokyo
 *           npx tsx scripts/plan-itinerary.ts tokyo transit
 */
import { config } from 'dotenv';
config({ path: '.env.local' });

import { createModeAwareScoreConfig, createScoreConfig, getPlannerEnv } from '../src/lib/config';
import { planItinerary } from '../src/lib/pipeline';
import { loadCitySpots } from '../src/lib/services/spotLoader';
import { TRANSPORT_MODES } from '../src/lib/types';
import type { TransportMode } from '../src/lib/types';

function parseMode(arg: string | undefined, fallback: TransportMode | undefined): TransportMode | undefined {
  if (!arg) return fallback;
  const mode = TRANSPORT_MODES.find(m => m === arg.toLowerCase());
  if (!mode) {
    throw new Error(`Invalid transport mode '${arg}'. Must be one of: ${TRANSPORT_MODES.join(', ')}`);
  }
  return mode;
}

async function main() {
  const env = getPlannerEnv();
  const city = process.argv[2] || 'tokyo';
  const mode = parseMode(process.argv[3], env.mode);

  const spots = await loadCitySpots(city, env.dataDir);
  const scoreConfig = mode
    ? createModeAwareScoreConfig({ maxDailyKm: env.maxDailyKm })
    : createScoreConfig({ maxDailyKm: env.maxDailyKm });

  const result = planItinerary({
    city,
    spots,
    dayCount: env.dayCount,
    config: scoreConfig,
    mode,
    trials: env.trials,
    seed: env.seed,
    startDate: new Date(),
  });

  console.log(`\nBest score: ${result.score.toFixed(2)}`);
  if (result.reasons.length > 0) {
    console.log('Self-check report:');
    for (const r of result.reasons) {
      console.log(` - ${r}`);
    }
  } else {
    console.log('Self-check report: no penalties');
  }

  for (const day of result.summary) {
    const travel = day.travelMinutes !== undefined ? `, ${day.travelMinutes}min ${mode}` : '';
    console.log(`Day ${day.day} (${day.date}): ${day.spotNames.join(' → ') || '(free day)'} [${day.totalDistanceKm}km${travel}]`);
  }
}

main().catch((err: unknown) => {
  console.error('[Planner] ❌ Planning failed:', err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
