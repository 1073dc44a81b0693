import { describe, it, expect } from 'vitest';
import { formatFitness, renderLookup, renderPaces, renderRaces, renderResults } from '../src/view/results.js';
import { formatDuration } from '../src/utils/format-duration.js';
import { paceToSpeedKmh, racePaceSeconds } from '../src/utils/pace.js';
import { computeRow } from '../src/engine/equivalence.js';

const row = computeRow(50);

describe('formatting', () => {
  it('formats durations', () => {
    expect(formatDuration(11440)).toBe('3:10:40');
    expect(formatDuration(3600)).toBe('1:00:00');
    expect(formatDuration(1196)).toBe('19:56');
    expect(formatDuration(59)).toBe('0:59');
    expect(formatDuration(-5)).toBe('0:00');
  });

  it('converts pace to speed', () => {
    expect(paceToSpeedKmh(360)).toBe(10);
    expect(paceToSpeedKmh(300)).toBe(12);
  });

  it('derives race pace per kilometre', () => {
    expect(racePaceSeconds(5491, 21097.5)).toBe(260);
  });

  it('shows the score to one decimal', () => {
    expect(formatFitness(51.944)).toBe('51.9');
    expect(formatFitness(null)).toBe('?');
  });
});

describe('results view', () => {
  it('renders equivalent races', () => {
    expect(renderRaces(row)).toEqual([
      { label: '5K', time: '19:56', pace: '3:59' },
      { label: '10K', time: '41:20', pace: '4:08' },
      { label: 'Half-Marathon', time: '1:31:31', pace: '4:20' },
      { label: 'Marathon', time: '3:10:40', pace: '4:31' }
    ]);
  });

  it('renders training paces', () => {
    expect(renderPaces(row)).toEqual([
      { label: 'Easy', pace: '4:55 - 5:34', speed: '10.8-12.2 km/h' },
      { label: 'Marathon', pace: '4:31', speed: '13.3 km/h' },
      { label: 'Threshold', pace: '4:15', speed: '14.1 km/h' },
      { label: 'Interval', pace: '3:55', speed: '15.3 km/h' },
      { label: 'Repetitions', pace: '3:40', speed: '16.4 km/h' }
    ]);
  });

  it('renders an out-of-range lookup as unavailable', () => {
    const view = renderLookup({ status: 'out_of_range', index: 851 });
    expect(view.races.map((r) => r.time)).toEqual(['-', '-', '-', '-']);
    expect(view.paces.map((p) => p.label)).toEqual(['Easy', 'Marathon', 'Threshold', 'Interval', 'Repetitions']);
    expect(view.paces.every((p) => p.pace === '-' && p.speed === '-')).toBe(true);
  });

  it('renders a found lookup', () => {
    const view = renderLookup({ status: 'found', index: 500, row });
    expect(view.races[3].time).toBe('3:10:40');
  });

  it('renders a text block', () => {
    const text = renderResults(50, row).split('\n');
    expect(text[0]).toBe('VDOT: 50.0');
    expect(text[2]).toBe('Equivalent race performances:');
    expect(text[3]).toBe('- 5K: 19:56 (3:59/km)');
    expect(text[8]).toBe('Training paces:');
    expect(text[9]).toBe('- Easy: 4:55 - 5:34/km (10.8-12.2 km/h)');
    expect(text[13]).toBe('- Repetitions: 3:40/km (16.4 km/h)');
  });

  it('renders a text block without results', () => {
    const text = renderResults(null, null).split('\n');
    expect(text[0]).toBe('VDOT: ?');
    expect(text[3]).toBe('- 5K: -');
    expect(text[9]).toBe('- Easy: -');
  });
});
