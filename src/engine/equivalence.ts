import type { EquivalenceRow, RaceDistance, RaceKey, RaceTimes, TrainingPaces } from '../domain/types.js';
import { gridIndex } from '../domain/grid.js';
import { bisect } from './solver.js';
import { paceFromEffort, raceTimeResidual, velocityToPace } from './model.js';

export const DISTANCE_METERS: Record<RaceKey, number> = {
  five_k: 5000,
  ten_k: 10000,
  half_marathon: 21097.5,
  marathon: 42195
};

export const RACE_DISTANCES: readonly RaceDistance[] = [
  { key: 'five_k', label: '5K', meters: DISTANCE_METERS.five_k },
  { key: 'ten_k', label: '10K', meters: DISTANCE_METERS.ten_k },
  { key: 'half_marathon', label: 'Half-Marathon', meters: DISTANCE_METERS.half_marathon },
  { key: 'marathon', label: 'Marathon', meters: DISTANCE_METERS.marathon }
];

/** Search interval for race durations, in minutes. */
export const TIME_BRACKET = { lower: 1, upper: 600 } as const;

export const EFFORT_FRACTIONS = {
  easy_slow: 0.6304,
  easy_fast: 0.7346,
  threshold: 0.8799,
  interval: 0.9743
} as const;

export function repetitionOffset(fitnessScore: number): number {
  return fitnessScore < 50.0 ? 20 : 15;
}

/**
 * Equivalent race time in whole seconds.
 * @throws NoRootInBracketError when the score has no solution inside TIME_BRACKET
 */
export function raceTimeSeconds(fitnessScore: number, distance: number): number {
  const minutes = bisect(raceTimeResidual, TIME_BRACKET.lower, TIME_BRACKET.upper, [fitnessScore, distance]);
  return Math.round(minutes * 60);
}

export function effortPaceSeconds(fitnessScore: number, effortFraction: number): number {
  return Math.round(velocityToPace(paceFromEffort(fitnessScore, effortFraction)));
}

export function computeRow(fitnessScore: number): EquivalenceRow {
  const race_times: RaceTimes = {
    five_k: raceTimeSeconds(fitnessScore, DISTANCE_METERS.five_k),
    ten_k: raceTimeSeconds(fitnessScore, DISTANCE_METERS.ten_k),
    half_marathon: raceTimeSeconds(fitnessScore, DISTANCE_METERS.half_marathon),
    marathon: raceTimeSeconds(fitnessScore, DISTANCE_METERS.marathon)
  };

  const interval = effortPaceSeconds(fitnessScore, EFFORT_FRACTIONS.interval);
  const paces: TrainingPaces = {
    easy_slow: effortPaceSeconds(fitnessScore, EFFORT_FRACTIONS.easy_slow),
    easy_fast: effortPaceSeconds(fitnessScore, EFFORT_FRACTIONS.easy_fast),
    marathon: Math.round(race_times.marathon / (DISTANCE_METERS.marathon / 1000)),
    threshold: effortPaceSeconds(fitnessScore, EFFORT_FRACTIONS.threshold),
    interval,
    repetition: interval - repetitionOffset(fitnessScore)
  };

  return { index: gridIndex(fitnessScore), race_times, paces };
}
