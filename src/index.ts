import type { MazeGrid, Toolpath } from './types'
import { generateMaze, type MazeGenParams } from './maze/MazeGenerator'
import { planToolpaths } from './planner/PathPlanner'
import { generateCutJob, toGcode, type MachineConfig, type MotionInstruction } from './cnc'

export interface MazeProgramOptions {
  width: number
  height: number
  seed?: number
  maze?: Partial<MazeGenParams>
  machine?: Partial<MachineConfig>
}

export interface MazeProgram {
  grid: MazeGrid
  toolpaths: Toolpath[]
  instructions: MotionInstruction[]
  lines: string[]
}

/**
 * Build a maze, plan its corridors and render the cutting program.
 * Each stage runs to completion before the next; any failure aborts the whole run.
 */
export function generateMazeProgram(options: MazeProgramOptions): MazeProgram {
  const grid = generateMaze(options.width, options.height, options.seed, options.maze)
  const toolpaths = planToolpaths(grid)
  const instructions = generateCutJob(toolpaths, grid, options.machine)
  const lines = toGcode(instructions, options.machine)
  return { grid, toolpaths, instructions, lines }
}

export type * from './types'
export * from './errors'
export { generateMaze, MazeBuilder, sideOpenings } from './maze/MazeGenerator'
export type { MazeGenParams, BuildStep } from './maze/MazeGenerator'
export {
  neighbors,
  adjacentCells,
  openNeighbors,
  openEdges,
  edgeKey,
  countReachable,
  isPerfectMaze,
} from './maze/graph'
export { planToolpaths, toolpathEdges, coveredEdges } from './planner/PathPlanner'
export * from './cnc'
export { SeededRandom } from './utils/seedRandom'
export {
  debug,
  enableDebugTag,
  disableDebugTag,
  setDebugTags,
  getDebugTags,
  getDebug,
  clearDebug,
} from './utils/debug'
export type { DebugTag } from './utils/debug'
