import { readFile } from 'node:fs/promises';
import type { LookupResult, PrecomputedTable } from '../domain/types.js';
import { MalformedTableError } from '../domain/errors.js';
import { gridIndex, isGridIndex } from '../domain/grid.js';
import { CONFIG } from '../config.js';
import { logError, logInfo } from '../utils/logger.js';
import { decodeTable } from './table-codec.js';

export function lookup(table: PrecomputedTable, fitnessScore: number): LookupResult {
  const index = gridIndex(fitnessScore);
  if (!isGridIndex(index)) return { status: 'out_of_range', index };

  const row = table.get(index);
  if (!row) return { status: 'out_of_range', index };
  return { status: 'found', index, row };
}

/**
 * Reads and decodes the table artifact. Meant to run once at startup;
 * a missing or corrupt artifact is fatal.
 */
export async function loadTable(path: string = CONFIG.tablePath): Promise<PrecomputedTable> {
  let blob: string;
  try {
    blob = await readFile(path, 'utf8');
  } catch (err) {
    logError('vdot table unreadable', { path, err });
    throw new MalformedTableError(`Cannot read table artifact at ${path}`, { cause: err });
  }

  try {
    const table = decodeTable(blob);
    logInfo('vdot table loaded', { path, rows: table.size });
    return table;
  } catch (err) {
    logError('vdot table corrupt', { path, err });
    throw err;
  }
}
