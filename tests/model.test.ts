import { describe, it, expect } from 'vitest';
import { fitnessFromPerformance, paceFromEffort, raceTimeResidual, velocityToPace } from '../src/engine/model.js';

describe('physiological model', () => {
  it('estimates fitness from a race performance', () => {
    expect(fitnessFromPerformance(5000, 20 * 60)).toBeCloseTo(49.81, 2);
    expect(fitnessFromPerformance(10000, 40 * 60)).toBeCloseTo(51.94, 2);
    expect(fitnessFromPerformance(42195, 3 * 3600)).toBeCloseTo(53.53, 2);
  });

  it('gives a higher score for a faster time over the same distance', () => {
    expect(fitnessFromPerformance(5000, 18 * 60)).toBeGreaterThan(fitnessFromPerformance(5000, 25 * 60));
  });

  it('has a residual of zero at the performance that produced the score', () => {
    const score = fitnessFromPerformance(10000, 2400);
    expect(raceTimeResidual(40, score, 10000)).toBeCloseTo(0, 10);
  });

  it('changes sign across the race-time bracket', () => {
    expect(raceTimeResidual(1, 50, 5000)).toBeGreaterThan(0);
    expect(raceTimeResidual(600, 50, 5000)).toBeLessThan(0);
  });

  it('derives interval velocity from effort', () => {
    const v = paceFromEffort(50, 0.9743);
    expect(v).toBeCloseTo(255.326, 3);
    expect(velocityToPace(v)).toBeCloseTo(234.994, 3);
  });

  it('runs faster at higher effort', () => {
    expect(paceFromEffort(50, 0.88)).toBeGreaterThan(paceFromEffort(50, 0.74));
  });
});
