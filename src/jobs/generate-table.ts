import { mkdir, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { TableGenerationError } from '../domain/errors.js';
import { generateTable } from '../engine/table-generator.js';
import { decodeTable, encodeTable, serializeTable, sha256 } from '../engine/table-codec.js';
import { CONFIG } from '../config.js';
import { logError, logInfo } from '../utils/logger.js';

export interface GenerationReport {
  path: string;
  rows: number;
  sha256: string;
}

export async function runTableGeneration(
  outPath: string = CONFIG.tablePath,
  wrapWidth: number = CONFIG.wrapWidth
): Promise<GenerationReport> {
  const started = Date.now();
  try {
    const table = generateTable();
    const blob = encodeTable(table, wrapWidth);
    const dump = serializeTable(table);

    // the artifact must decode back to exactly what was generated
    if (serializeTable(decodeTable(blob)) !== dump) {
      throw new TableGenerationError('Encoded table does not round-trip');
    }

    await mkdir(path.dirname(outPath), { recursive: true });
    const tmpPath = `${outPath}.${process.pid}.tmp`;
    await writeFile(tmpPath, blob, 'utf8');
    await rename(tmpPath, outPath);

    const report = { path: outPath, rows: table.size, sha256: sha256(dump) };
    logInfo('vdot table generated', { ...report, ms: Date.now() - started });
    return report;
  } catch (err) {
    logError('vdot table generation failed', { path: outPath, err });
    throw err;
  }
}
