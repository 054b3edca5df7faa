import { describe, it, expect } from 'vitest';
import { estimateJobTime, formatTime, generateCutJob, summarizeJob, type MotionInstruction } from './job';
import { generateMaze } from '../maze/MazeGenerator';
import { planToolpaths } from '../planner/PathPlanner';
import type { Toolpath } from '../types';

const square: Toolpath[] = [{ points: [{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 1, y: 1 }] }];

describe('generateCutJob', () => {
  it('emits travel, plunge, cuts and retract for each toolpath', () => {
    const grid = generateMaze(3, 3, 42);
    const job = generateCutJob(planToolpaths(grid), grid);

    expect(job).toEqual([
      { kind: 'travel', x: -5, y: -5 },
      { kind: 'plunge', z: -0.5, feed: 300 },
      { kind: 'cut', x: 0, y: -5, feed: 300 },
      { kind: 'cut', x: 0, y: 0, feed: 300 },
      { kind: 'cut', x: -5, y: 0, feed: 300 },
      { kind: 'cut', x: -5, y: 5, feed: 300 },
      { kind: 'cut', x: 5, y: 5, feed: 300 },
      { kind: 'cut', x: 5, y: -5, feed: 300 },
      { kind: 'retract', z: 2 },
      { kind: 'pause' },
    ]);
  });

  it('emits N-1 cuts for a toolpath of N points', () => {
    const job = generateCutJob(square, { width: 2, height: 2 }, { pauseBetweenPasses: false });
    expect(job.map((ins) => ins.kind)).toEqual(['travel', 'plunge', 'cut', 'cut', 'retract']);
  });

  it('keeps the plan order of toolpaths', () => {
    const grid = generateMaze(4, 4, 7);
    const job = generateCutJob(planToolpaths(grid), grid, { originCentre: false, stepSize: 1 });
    const travels = job.filter((ins) => ins.kind === 'travel');
    expect(travels).toEqual([
      { kind: 'travel', x: 0, y: 0 },
      { kind: 'travel', x: 2, y: 3 },
    ]);
  });

  it('repeats every toolpath once per depth pass', () => {
    const job = generateCutJob(square, { width: 2, height: 2 }, { depthSteps: [0.5, 1] });
    const plunges = job.filter((ins) => ins.kind === 'plunge');
    expect(plunges).toEqual([
      { kind: 'plunge', z: -0.5, feed: 300 },
      { kind: 'plunge', z: -1, feed: 300 },
    ]);
    expect(job.filter((ins) => ins.kind === 'pause')).toHaveLength(2);
  });

  it('uses the configured rates', () => {
    const job = generateCutJob(square, { width: 2, height: 2 }, { plungeRate: 120, feedRate: 900 });
    expect(job[1]).toEqual({ kind: 'plunge', z: -0.5, feed: 120 });
    expect(job[2]).toEqual({ kind: 'cut', x: 2.5, y: -2.5, feed: 900 });
  });

  it('emits nothing when there is nothing to cut', () => {
    expect(generateCutJob([], { width: 1, height: 1 })).toEqual([]);
  });
});

describe('summarizeJob', () => {
  it('counts lifts and measures the 3x3 maze', () => {
    const grid = generateMaze(3, 3, 42);
    const summary = summarizeJob(generateCutJob(planToolpaths(grid), grid));

    expect(summary.travels).toBe(1);
    expect(summary.cuts).toBe(6);
    expect(summary.pauses).toBe(1);
    // 8 corridors of 5mm
    expect(summary.cutLength).toBeCloseTo(40, 9);
    expect(summary.travelLength).toBeCloseTo(Math.hypot(5, 5), 9);
  });

  it('counts one lift per toolpath', () => {
    const grid = generateMaze(4, 4, 7);
    expect(summarizeJob(generateCutJob(planToolpaths(grid), grid)).travels).toBe(2);
  });
});

describe('estimateJobTime', () => {
  it('adds rapid, plunge, feed and lift time', () => {
    const job: MotionInstruction[] = [
      { kind: 'travel', x: 3, y: 4 },
      { kind: 'plunge', z: -1, feed: 100 },
      { kind: 'cut', x: 3, y: 10, feed: 300 },
      { kind: 'retract', z: 2 },
    ];
    // (5/1500 + 3/100 + 6/300 + 3/1500) min * 60 + 0.5s
    expect(estimateJobTime(job)).toBeCloseTo(3.82, 9);
  });

  it('is zero for an empty job', () => {
    expect(estimateJobTime([])).toBe(0);
  });
});

describe('formatTime', () => {
  it('formats seconds', () => {
    expect(formatTime(42.4)).toBe('42s');
  });

  it('formats minutes and seconds', () => {
    expect(formatTime(185)).toBe('3m 5s');
  });

  it('carries rounded seconds into the minutes', () => {
    expect(formatTime(119.6)).toBe('2m 0s');
  });
});
