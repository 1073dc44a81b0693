import { describe, it, expect } from 'vitest';
import { computeRow, raceTimeSeconds, repetitionOffset } from '../src/engine/equivalence.js';
import { NoRootInBracketError } from '../src/domain/errors.js';

describe('equivalence row', () => {
  it('computes the row for fitness 50.0', () => {
    expect(computeRow(50)).toEqual({
      index: 500,
      race_times: { five_k: 1196, ten_k: 2480, half_marathon: 5491, marathon: 11440 },
      paces: { easy_slow: 334, easy_fast: 295, marathon: 271, threshold: 255, interval: 235, repetition: 220 }
    });
  });

  it('puts the 50.0 marathon within ten seconds of 3:10:49', () => {
    const marathon = computeRow(50).race_times.marathon;
    expect(Math.abs(marathon - (3 * 3600 + 10 * 60 + 49))).toBeLessThanOrEqual(10);
  });

  it('computes the bottom and top rows of the grid', () => {
    expect(computeRow(30).race_times).toEqual({ five_k: 1841, ten_k: 3829, half_marathon: 8477, marathon: 17389 });
    expect(computeRow(85).paces).toEqual({
      easy_slow: 218, easy_fast: 192, marathon: 172, threshold: 166, interval: 153, repetition: 138
    });
  });

  it('steps the repetition offset at 50.0', () => {
    expect(repetitionOffset(49.9)).toBe(20);
    expect(repetitionOffset(50)).toBe(15);

    const below = computeRow(49.9).paces;
    const at = computeRow(50).paces;
    expect(below.interval - below.repetition).toBe(20);
    expect(at.interval - at.repetition).toBe(15);
  });

  it('derives marathon pace from marathon time', () => {
    const row = computeRow(60);
    expect(row.race_times.marathon).toBe(9802);
    expect(row.paces.marathon).toBe(232);
  });

  it('throws for a score with no marathon solution', () => {
    expect(() => raceTimeSeconds(10, 42195)).toThrow(NoRootInBracketError);
    expect(raceTimeSeconds(10, 5000)).toBe(4256);
  });
});
