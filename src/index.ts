export type {
  EquivalenceRow,
  Equivalents,
  LookupResult,
  PaceKey,
  PaceRange,
  PaceZone,
  PerformanceInput,
  PrecomputedTable,
  RaceDistance,
  RaceKey,
  RaceTimes,
  TrainingPaces
} from './domain/types.js';
export { MalformedTableError, NoRootInBracketError, TableGenerationError } from './domain/errors.js';
export { GRID, gridIndex, roundFitness } from './domain/grid.js';
export { fitnessFromPerformance, paceFromEffort, raceTimeResidual } from './engine/model.js';
export { bisect } from './engine/solver.js';
export { RACE_DISTANCES, computeRow } from './engine/equivalence.js';
export { generateTable } from './engine/table-generator.js';
export { decodeTable, encodeTable } from './engine/table-codec.js';
export { loadTable, lookup } from './engine/table-store.js';
export {
  calculateEquivalents,
  estimateFitness,
  liveRaceTime,
  liveRow,
  trainingPaceRanges
} from './engine/live-calculator.js';
export { formatDuration } from './utils/format-duration.js';
export { renderLookup, renderPaces, renderRaces, renderResults } from './view/results.js';
