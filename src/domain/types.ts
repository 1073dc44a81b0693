export type RaceKey = 'five_k' | 'ten_k' | 'half_marathon' | 'marathon';

export type PaceKey = 'easy_slow' | 'easy_fast' | 'marathon' | 'threshold' | 'interval' | 'repetition';

export interface RaceDistance {
  key: RaceKey;
  label: string;
  meters: number;
}

/** Whole seconds per race distance. */
export type RaceTimes = Record<RaceKey, number>;

/** Whole seconds per kilometre, slowest zone first. */
export type TrainingPaces = Record<PaceKey, number>;

export interface EquivalenceRow {
  /** Grid index, round(fitness score × 10). */
  index: number;
  race_times: RaceTimes;
  paces: TrainingPaces;
}

export type PrecomputedTable = ReadonlyMap<number, EquivalenceRow>;

export interface PerformanceInput {
  distance_m: number;
  duration_seconds: number;
}

export type LookupResult =
  | { status: 'found'; index: number; row: EquivalenceRow }
  | { status: 'out_of_range'; index: number };

export type PaceZone = 'easy' | 'marathon' | 'threshold' | 'interval' | 'repetition';

export interface PaceRange {
  zone: PaceZone;
  /** sec/km at the lower effort bound */
  slow_sec_per_km: number;
  /** sec/km at the upper effort bound */
  fast_sec_per_km: number;
}

export interface Equivalents {
  fitness: number | null;
  row: EquivalenceRow | null;
}
