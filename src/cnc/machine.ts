/**
 * Machine settings and grid-to-machine coordinate conversion
 */

import { z } from 'zod';
import type { GridExtents, Point } from '../types';
import { InvalidConfigError } from '../errors';

export const MachineConfigSchema = z.object({
  stepSize: z.number().positive(),               // mm per cell
  depthSteps: z.array(z.number().positive()).min(1), // mm, one entry per pass
  clearanceHeight: z.number().positive(),        // mm
  spindleSpeed: z.number().int().positive(),     // rpm
  plungeRate: z.number().positive(),             // mm/min
  feedRate: z.number().positive(),               // mm/min
  rapidRate: z.number().positive(),              // mm/min, only used for estimates
  liftSeconds: z.number().min(0),               // per plunge, only used for estimates
  originCentre: z.boolean(),
  pauseBetweenPasses: z.boolean(),
  precision: z.number().int().min(0).max(6),
});

export type MachineConfig = z.infer<typeof MachineConfigSchema>;

export const DEFAULT_MACHINE_CONFIG: MachineConfig = {
  stepSize: 5,
  depthSteps: [0.5],
  clearanceHeight: 2,
  spindleSpeed: 8200,
  plungeRate: 300,
  feedRate: 300,
  rapidRate: 1500,
  liftSeconds: 0.5,
  originCentre: true,
  pauseBetweenPasses: true,
  precision: 3,
};

/**
 * Merge overrides over the defaults and validate the result
 */
export function resolveMachineConfig(config: Partial<MachineConfig> = {}): MachineConfig {
  const result = MachineConfigSchema.safeParse({ ...DEFAULT_MACHINE_CONFIG, ...config });
  if (!result.success) {
    throw new InvalidConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Convert a grid point (x = column, y = row) to machine millimetres.
 * Increasing row is increasing Y. With originCentre the maze centre sits at X0 Y0.
 */
export function gridToMachine(point: Point, extents: GridExtents, config: MachineConfig): Point {
  const offsetX = config.originCentre ? ((extents.width - 1) / 2) * config.stepSize : 0;
  const offsetY = config.originCentre ? ((extents.height - 1) / 2) * config.stepSize : 0;
  return {
    x: point.x * config.stepSize - offsetX,
    y: point.y * config.stepSize - offsetY,
  };
}
