/**
 * Cut job generator - converts planned toolpaths to machine motions
 */

import type { GridExtents, Toolpath } from '../types';
import { debug } from '../utils/debug';
import { gridToMachine, resolveMachineConfig, type MachineConfig } from './machine';

export type MotionInstruction =
  | { kind: 'travel'; x: number; y: number }
  | { kind: 'plunge'; z: number; feed: number }
  | { kind: 'cut'; x: number; y: number; feed: number }
  | { kind: 'retract'; z: number }
  | { kind: 'pause' };

export interface JobSummary {
  travels: number;
  cuts: number;
  pauses: number;
  cutLength: number;    // mm
  travelLength: number; // mm
}

/**
 * Generate the motion program for a list of toolpaths.
 *
 * Every depth pass repeats all toolpaths in plan order. Each toolpath becomes one travel
 * to its first point, one plunge, one cut per remaining point and one retract.
 */
export function generateCutJob(
  toolpaths: Toolpath[],
  extents: GridExtents,
  config: Partial<MachineConfig> = {}
): MotionInstruction[] {
  const machine = resolveMachineConfig(config);
  const instructions: MotionInstruction[] = [];
  if (toolpaths.length === 0) return instructions;

  for (const depth of machine.depthSteps) {
    for (const toolpath of toolpaths) {
      const [first, ...rest] = toolpath.points.map((p) => gridToMachine(p, extents, machine));
      if (first === undefined) continue;

      instructions.push({ kind: 'travel', x: first.x, y: first.y });
      instructions.push({ kind: 'plunge', z: -depth, feed: machine.plungeRate });
      for (const point of rest) {
        instructions.push({ kind: 'cut', x: point.x, y: point.y, feed: machine.feedRate });
      }
      instructions.push({ kind: 'retract', z: machine.clearanceHeight });
    }

    // Room for dust clearance and a quality check
    if (machine.pauseBetweenPasses) {
      instructions.push({ kind: 'pause' });
    }
  }

  debug(
    'cnc',
    `Generated ${instructions.length} instructions for ${toolpaths.length} toolpaths x ${machine.depthSteps.length} passes`
  );
  return instructions;
}

/**
 * Count tool lifts and measure cut/travel distance. The tool starts at X0 Y0.
 */
export function summarizeJob(instructions: MotionInstruction[]): JobSummary {
  const summary: JobSummary = { travels: 0, cuts: 0, pauses: 0, cutLength: 0, travelLength: 0 };
  let lastX = 0;
  let lastY = 0;

  for (const ins of instructions) {
    switch (ins.kind) {
      case 'travel':
        summary.travels++;
        summary.travelLength += Math.hypot(ins.x - lastX, ins.y - lastY);
        lastX = ins.x;
        lastY = ins.y;
        break;
      case 'cut':
        summary.cuts++;
        summary.cutLength += Math.hypot(ins.x - lastX, ins.y - lastY);
        lastX = ins.x;
        lastY = ins.y;
        break;
      case 'pause':
        summary.pauses++;
        break;
      case 'plunge':
      case 'retract':
        break;
    }
  }

  return summary;
}

/**
 * Estimate job time in seconds
 */
export function estimateJobTime(
  instructions: MotionInstruction[],
  config: Partial<MachineConfig> = {}
): number {
  const machine = resolveMachineConfig(config);
  let minutes = 0;
  let seconds = 0;
  let x = 0;
  let y = 0;
  let z = machine.clearanceHeight;

  for (const ins of instructions) {
    switch (ins.kind) {
      case 'travel':
        minutes += Math.hypot(ins.x - x, ins.y - y) / machine.rapidRate;
        x = ins.x;
        y = ins.y;
        break;
      case 'plunge':
        minutes += Math.abs(z - ins.z) / ins.feed;
        z = ins.z;
        seconds += machine.liftSeconds;
        break;
      case 'cut':
        minutes += Math.hypot(ins.x - x, ins.y - y) / ins.feed;
        x = ins.x;
        y = ins.y;
        break;
      case 'retract':
        minutes += Math.abs(ins.z - z) / machine.rapidRate;
        z = ins.z;
        break;
      case 'pause':
        break;
    }
  }

  return minutes * 60 + seconds;
}

/**
 * Format time as human readable string
 */
export function formatTime(seconds: number): string {
  if (seconds < 60) {
    return `${Math.round(seconds)}s`;
  }
  const total = Math.round(seconds);
  const mins = Math.floor(total / 60);
  const secs = total % 60;
  return `${mins}m ${secs}s`;
}
