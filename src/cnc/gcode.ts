/**
 * G-code writer
 * Metric units (G21), absolute positioning (G90), one word group per line.
 */

import type { MotionInstruction } from './job';
import { resolveMachineConfig, type MachineConfig } from './machine';

/**
 * Round to `precision` decimals, drop trailing zeros and never print -0
 */
export function formatNumber(value: number, precision: number): string {
  const rounded = Number(value.toFixed(precision));
  return Object.is(rounded, -0) ? '0' : String(rounded);
}

function instructionToLine(ins: MotionInstruction, precision: number): string {
  const n = (value: number) => formatNumber(value, precision);
  switch (ins.kind) {
    case 'travel':
      return `G0 X${n(ins.x)} Y${n(ins.y)}`;
    case 'plunge':
      return `G1 Z${n(ins.z)} F${n(ins.feed)}`;
    case 'cut':
      return `G1 X${n(ins.x)} Y${n(ins.y)} F${n(ins.feed)}`;
    case 'retract':
      return `G0 Z${n(ins.z)}`;
    case 'pause':
      return 'M0';
  }
}

/**
 * Render a motion program as G-code lines, wrapped in spindle start-up and parking.
 * An empty program still gets the preamble and postamble, which cut nothing.
 */
export function toGcode(instructions: MotionInstruction[], config: Partial<MachineConfig> = {}): string[] {
  const machine = resolveMachineConfig(config);
  const n = (value: number) => formatNumber(value, machine.precision);

  const preamble = ['G21', 'G90', `G0 Z${n(machine.clearanceHeight)}`, `M3 S${machine.spindleSpeed}`];
  // park neatly
  const postamble = [`G0 Z${n(machine.clearanceHeight)}`, 'G0 X0 Y0', 'M5', 'M30'];

  return [
    ...preamble,
    ...instructions.map((ins) => instructionToLine(ins, machine.precision)),
    ...postamble,
  ];
}
