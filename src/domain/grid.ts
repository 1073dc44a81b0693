// Fitness scores 30.0..85.0 stored as integers ×10
export const GRID = { min: 300, max: 850, scale: 10 } as const;

export const GRID_SIZE = GRID.max - GRID.min + 1;

export function gridIndex(fitnessScore: number): number {
  return Math.round(fitnessScore * GRID.scale);
}

export function isGridIndex(index: number): boolean {
  return Number.isInteger(index) && index >= GRID.min && index <= GRID.max;
}

export function gridIndices(): number[] {
  return Array.from({ length: GRID_SIZE }, (_, i) => GRID.min + i);
}

/** Nearest tenth, the precision the table is keyed on. */
export function roundFitness(fitnessScore: number): number {
  return gridIndex(fitnessScore) / GRID.scale;
}
