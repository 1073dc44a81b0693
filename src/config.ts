import 'dotenv/config';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

// src/ and dist/ both sit one level below the package root
const DEFAULT_TABLE_PATH = fileURLToPath(new URL('../data/vdot-table.txt', import.meta.url));

export const LogLevelSchema = z.enum(['info', 'error', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const ConfigSchema = z.object({
  tablePath: z.string().min(1),
  wrapWidth: z.coerce.number().int().min(16).max(1024),
  logLevel: LogLevelSchema
});

const env = (key: string, fallback: string): string => {
  const val = process.env[key];
  return val ? val : fallback;
};

export const CONFIG = ConfigSchema.parse({
  tablePath: env('VDOT_TABLE_PATH', DEFAULT_TABLE_PATH),
  wrapWidth: env('VDOT_TABLE_WRAP_WIDTH', '88'),
  logLevel: env('LOG_LEVEL', 'info')
});
