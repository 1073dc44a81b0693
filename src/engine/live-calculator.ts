import type { EquivalenceRow, Equivalents, PaceRange, PaceZone, PerformanceInput } from '../domain/types.js';
import { NoRootInBracketError } from '../domain/errors.js';
import { PerformanceInputSchema } from '../domain/schemas.js';
import { computeRow, raceTimeSeconds } from './equivalence.js';
import { fitnessFromPerformance, paceFromEffort, velocityToPace } from './model.js';

/** Scores outside this range get no live training paces. */
export const LIVE_FITNESS_RANGE = { min: 25, max: 85 } as const;

const ZONE_EFFORTS: ReadonlyArray<[PaceZone, number, number]> = [
  ['easy', 0.59, 0.74],
  ['marathon', 0.75, 0.84],
  ['threshold', 0.83, 0.88],
  ['interval', 0.95, 1],
  ['repetition', 1.05, 1.2]
];

function withoutBracketFailure<T>(fn: () => T): T | null {
  try {
    return fn();
  } catch (err) {
    if (err instanceof NoRootInBracketError) return null;
    throw err;
  }
}

export function estimateFitness(input: PerformanceInput): number | null {
  const parsed = PerformanceInputSchema.safeParse(input);
  if (!parsed.success) return null;
  const score = fitnessFromPerformance(parsed.data.distance_m, parsed.data.duration_seconds);
  return Number.isFinite(score) ? score : null;
}

export function liveRaceTime(fitnessScore: number, distance: number): number | null {
  return withoutBracketFailure(() => raceTimeSeconds(fitnessScore, distance));
}

export function liveRow(fitnessScore: number): EquivalenceRow | null {
  if (!Number.isFinite(fitnessScore)) return null;
  return withoutBracketFailure(() => computeRow(fitnessScore));
}

export function calculateEquivalents(input: PerformanceInput): Equivalents {
  const fitness = estimateFitness(input);
  if (fitness === null) return { fitness: null, row: null };
  return { fitness, row: liveRow(fitness) };
}

export function trainingPaceRanges(fitnessScore: number): PaceRange[] | null {
  if (!(fitnessScore >= LIVE_FITNESS_RANGE.min && fitnessScore <= LIVE_FITNESS_RANGE.max)) return null;

  return ZONE_EFFORTS.map(([zone, low, high]) => ({
    zone,
    slow_sec_per_km: Math.round(velocityToPace(paceFromEffort(fitnessScore, low))),
    fast_sec_per_km: Math.round(velocityToPace(paceFromEffort(fitnessScore, high)))
  }));
}
