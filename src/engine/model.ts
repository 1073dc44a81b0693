/**
 * Oxygen-cost and drop-dead relations behind the VDOT tables
 * (Daniels & Gilbert). Time inputs are minutes, velocities metres per minute.
 */

/** VO2 (ml/kg/min) needed to run at velocity `v`. */
function oxygenCost(v: number): number {
  return -4.6 + 0.182258 * v + 0.000104 * v * v;
}

/** Fraction of VO2max sustainable for `t` minutes. */
function sustainableFraction(t: number): number {
  return 0.8 + 0.1894393 * Math.exp(-0.012778 * t) + 0.2989558 * Math.exp(-0.1932605 * t);
}

/**
 * Difference between the fitness score implied by covering `distance` metres
 * in `x` minutes and `fitnessScore`. Zero at the equivalent race duration.
 */
export function raceTimeResidual(x: number, fitnessScore: number, distance: number): number {
  return oxygenCost(distance / x) / sustainableFraction(x) - fitnessScore;
}

/** Velocity (m/min) held at `effortFraction` of VO2max for the given score. */
export function paceFromEffort(fitnessScore: number, effortFraction: number): number {
  return (-0.182258 + Math.sqrt(0.033218 - 0.000416 * (-4.6 - fitnessScore * effortFraction))) / 0.000208;
}

export function fitnessFromPerformance(distance: number, durationSeconds: number): number {
  const t = durationSeconds / 60;
  const v = distance / t;
  return oxygenCost(v) / sustainableFraction(t);
}

/** m/min to seconds per km, unrounded. */
export function velocityToPace(velocity: number): number {
  return (1000 / velocity) * 60;
}
