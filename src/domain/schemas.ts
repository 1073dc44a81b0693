import { z } from 'zod';
import { GRID } from './grid.js';

export const PerformanceInputSchema = z.object({
  distance_m: z.number().finite().positive(),
  duration_seconds: z.number().finite().positive()
});

const seconds = z.number().int().positive();

// Field order of a serialized row: v, 4 race times, 6 paces
export const SerializedRowSchema = z.tuple([
  z.number().int().min(GRID.min).max(GRID.max),
  seconds, seconds, seconds, seconds,
  seconds, seconds, seconds, seconds, seconds, seconds
]);

export type SerializedRow = z.infer<typeof SerializedRowSchema>;
