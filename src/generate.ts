import { runTableGeneration } from './jobs/generate-table.js';

const outPath = process.argv[2];

await runTableGeneration(outPath || undefined);
