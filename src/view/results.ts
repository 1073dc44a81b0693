import type { EquivalenceRow, LookupResult, PaceKey } from '../domain/types.js';
import { RACE_DISTANCES } from '../engine/equivalence.js';
import { formatDuration } from '../utils/format-duration.js';
import { paceToSpeedKmh, racePaceSeconds } from '../utils/pace.js';

export const UNAVAILABLE = '-';

export interface RaceLine {
  label: string;
  time: string;
  pace: string;
}

export interface PaceLine {
  label: string;
  pace: string;
  speed: string;
}

const SINGLE_PACE_ZONES: ReadonlyArray<[string, PaceKey]> = [
  ['Marathon', 'marathon'],
  ['Threshold', 'threshold'],
  ['Interval', 'interval'],
  ['Repetitions', 'repetition']
];

export function formatFitness(fitnessScore: number | null): string {
  return fitnessScore === null ? '?' : fitnessScore.toFixed(1);
}

export function renderRaces(row: EquivalenceRow | null): RaceLine[] {
  return RACE_DISTANCES.map((d) => {
    if (!row) return { label: d.label, time: UNAVAILABLE, pace: UNAVAILABLE };
    const seconds = row.race_times[d.key];
    return {
      label: d.label,
      time: formatDuration(seconds),
      pace: formatDuration(racePaceSeconds(seconds, d.meters))
    };
  });
}

export function renderPaces(row: EquivalenceRow | null): PaceLine[] {
  if (!row) {
    return ['Easy', ...SINGLE_PACE_ZONES.map(([label]) => label)].map((label) => ({
      label,
      pace: UNAVAILABLE,
      speed: UNAVAILABLE
    }));
  }

  const { paces } = row;
  const easy: PaceLine = {
    label: 'Easy',
    pace: `${formatDuration(paces.easy_fast)} - ${formatDuration(paces.easy_slow)}`,
    speed: `${paceToSpeedKmh(paces.easy_slow)}-${paceToSpeedKmh(paces.easy_fast)} km/h`
  };

  return [
    easy,
    ...SINGLE_PACE_ZONES.map(([label, key]) => ({
      label,
      pace: formatDuration(paces[key]),
      speed: `${paceToSpeedKmh(paces[key])} km/h`
    }))
  ];
}

export function renderLookup(result: LookupResult): { races: RaceLine[]; paces: PaceLine[] } {
  const row = result.status === 'found' ? result.row : null;
  return { races: renderRaces(row), paces: renderPaces(row) };
}

export function renderResults(fitnessScore: number | null, row: EquivalenceRow | null): string {
  const races = renderRaces(row)
    .map((r) => (r.time === UNAVAILABLE ? `- ${r.label}: ${UNAVAILABLE}` : `- ${r.label}: ${r.time} (${r.pace}/km)`))
    .join('\n');
  const paces = renderPaces(row)
    .map((p) => (p.pace === UNAVAILABLE ? `- ${p.label}: ${UNAVAILABLE}` : `- ${p.label}: ${p.pace}/km (${p.speed})`))
    .join('\n');

  return `VDOT: ${formatFitness(fitnessScore)}\n\n` +
    `Equivalent race performances:\n${races}\n\n` +
    `Training paces:\n${paces}`;
}
