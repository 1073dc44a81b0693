import type { EquivalenceRow, PrecomputedTable } from '../domain/types.js';
import { TableGenerationError } from '../domain/errors.js';
import { GRID, gridIndices } from '../domain/grid.js';
import { computeRow } from './equivalence.js';

/**
 * Computes one row per grid index 300..850. Any grid point without a
 * solution aborts the whole run; a partial table is never returned.
 */
export function generateTable(compute: (fitnessScore: number) => EquivalenceRow = computeRow): PrecomputedTable {
  const table = new Map<number, EquivalenceRow>();

  for (const index of gridIndices()) {
    const fitnessScore = index / GRID.scale;
    let row: EquivalenceRow;
    try {
      row = compute(fitnessScore);
    } catch (err) {
      throw new TableGenerationError(`Grid index ${index} (fitness ${fitnessScore.toFixed(1)}) did not resolve`, { cause: err });
    }
    table.set(index, Object.freeze(row));
  }

  return table;
}
