import type { BorderOpening, Cell, CellCoord, Direction, MazeGrid } from '../types'
import { SeededRandom } from '../utils/seedRandom'
import { debug } from '../utils/debug'
import { InvalidBiasError, InvalidDimensionError, InvalidOpeningError, InvalidStartError } from '../errors'
import { adjacentCells, DC, DIRECTIONS, DR, OPPOSITE, type Adjacent } from './graph'

export interface MazeGenParams {
  start: CellCoord
  straightOnBias: number  // extra weight for carrying on in the direction we entered the cell
  compassBias: Partial<Record<Direction, number>>  // extra weight per direction
  entrance: BorderOpening | null  // also the default start cell
  exit: BorderOpening | null
}

export type BuildStep = 'advance' | 'backtrack' | 'done'

function createCell(row: number, col: number): Cell {
  return {
    row,
    col,
    walls: { north: true, east: true, south: true, west: true },
    visited: false,
  }
}

function removeWall(cell: Cell, neighbor: Cell, dir: Direction) {
  cell.walls[dir] = false
  neighbor.walls[OPPOSITE[dir]] = false
}

function assertDimension(value: number, field: 'width' | 'height'): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidDimensionError(field, value)
  }
}

function assertBias(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidBiasError(field, value)
  }
}

function assertOpening(opening: BorderOpening, field: 'entrance' | 'exit', width: number, height: number): void {
  const { cell, side } = opening
  const where = `(${cell.row}, ${cell.col}) ${side}`
  if (
    !DIRECTIONS.includes(side) ||
    !Number.isInteger(cell.row) || !Number.isInteger(cell.col) ||
    cell.row < 0 || cell.row >= height || cell.col < 0 || cell.col >= width
  ) {
    throw new InvalidOpeningError(field, `${where} is not a cell side of the ${width}x${height} grid`)
  }
  const row = cell.row + DR[side]
  const col = cell.col + DC[side]
  if (row >= 0 && row < height && col >= 0 && col < width) {
    throw new InvalidOpeningError(field, `${where} does not face the outer wall`)
  }
}

/**
 * Entrance through the top wall and exit through the bottom wall, both on the middle column.
 * With an even width the exit sits one column right of the entrance.
 */
export function sideOpenings(width: number, height: number): Pick<MazeGenParams, 'entrance' | 'exit'> {
  const mid = Math.floor((width - 1) / 2)
  return {
    entrance: { cell: { row: 0, col: mid }, side: 'north' },
    exit: { cell: { row: height - 1, col: mid + ((width - 1) % 2) }, side: 'south' },
  }
}

/**
 * Randomized depth-first search with an explicit stack.
 *
 * Each step either advances into a random unvisited neighbour of the cell on top of
 * the stack, opening the wall between them, or pops the stack when there is none.
 * Walls are only ever opened towards unvisited cells, so the result is a spanning tree.
 */
export class MazeBuilder {
  readonly grid: MazeGrid
  private readonly rng: SeededRandom
  private readonly stack: Cell[] = []
  private readonly enteredBy = new Map<Cell, Direction>()
  private readonly params: MazeGenParams
  private readonly biased: boolean

  constructor(width: number, height: number, seed?: number, params: Partial<MazeGenParams> = {}) {
    assertDimension(width, 'width')
    assertDimension(height, 'height')

    const entrance = params.entrance ? { cell: { ...params.entrance.cell }, side: params.entrance.side } : null
    const exit = params.exit ? { cell: { ...params.exit.cell }, side: params.exit.side } : null
    this.params = {
      start: { ...(params.start ?? entrance?.cell ?? { row: 0, col: 0 }) },
      straightOnBias: params.straightOnBias ?? 0,
      compassBias: { ...(params.compassBias ?? {}) },
      entrance,
      exit,
    }
    const { start, straightOnBias, compassBias } = this.params
    assertBias(straightOnBias, 'straightOnBias')
    let compassWeight = 0
    for (const dir of DIRECTIONS) {
      const weight = compassBias[dir] ?? 0
      assertBias(weight, `compassBias.${dir}`)
      compassWeight += weight
    }
    this.biased = straightOnBias > 0 || compassWeight > 0

    if (entrance) assertOpening(entrance, 'entrance', width, height)
    if (exit) assertOpening(exit, 'exit', width, height)
    if (
      entrance && exit && entrance.side === exit.side &&
      entrance.cell.row === exit.cell.row && entrance.cell.col === exit.cell.col
    ) {
      throw new InvalidOpeningError('exit', 'must not share the entrance gap')
    }

    if (
      !Number.isInteger(start.row) || !Number.isInteger(start.col) ||
      start.row < 0 || start.row >= height || start.col < 0 || start.col >= width
    ) {
      throw new InvalidStartError(start.row, start.col, width, height)
    }

    this.rng = new SeededRandom(seed)

    const cells: Cell[][] = []
    for (let row = 0; row < height; row++) {
      cells[row] = []
      for (let col = 0; col < width; col++) {
        cells[row][col] = createCell(row, col)
      }
    }

    // Openings only touch the outer wall, so the interior edge set is unchanged
    for (const opening of [entrance, exit]) {
      if (opening) cells[opening.cell.row][opening.cell.col].walls[opening.side] = false
    }

    this.grid = { width, height, cells, start, seed: this.rng.seed, entrance, exit }

    const first = cells[start.row][start.col]
    first.visited = true
    this.stack.push(first)
  }

  get done(): boolean {
    return this.stack.length === 0
  }

  // Snapshot of the stack, bottom first
  get path(): CellCoord[] {
    return this.stack.map(({ row, col }) => ({ row, col }))
  }

  unexploredDirections(cell: CellCoord): Direction[] {
    return this.unvisitedNeighbors(cell).map((n) => n.dir)
  }

  step(): BuildStep {
    const current = this.stack[this.stack.length - 1]
    if (current === undefined) return 'done'

    const candidates = this.unvisitedNeighbors(current)
    if (candidates.length === 0) {
      this.stack.pop()
      return 'backtrack'
    }

    const chosen = this.choose(current, candidates)
    removeWall(current, chosen.cell, chosen.dir)
    chosen.cell.visited = true
    this.enteredBy.set(chosen.cell, chosen.dir)
    this.stack.push(chosen.cell)
    return 'advance'
  }

  run(): MazeGrid {
    let advances = 0
    let backtracks = 0
    for (let result = this.step(); result !== 'done'; result = this.step()) {
      if (result === 'advance') advances++
      else backtracks++
    }
    debug(
      'maze',
      `Built ${this.grid.width}x${this.grid.height} maze from seed ${this.grid.seed}: ${advances} advances, ${backtracks} backtracks`
    )
    return this.grid
  }

  private unvisitedNeighbors(cell: CellCoord): Adjacent[] {
    return adjacentCells(this.grid, cell).filter((n) => !n.cell.visited)
  }

  private choose(current: Cell, candidates: Adjacent[]): Adjacent {
    // Uniform unless the caller asked for a bias
    if (!this.biased) return this.rng.pick(candidates)

    const { straightOnBias, compassBias } = this.params
    const entered = this.enteredBy.get(current)
    const weights = candidates.map(
      (n) => 1 + (compassBias[n.dir] ?? 0) + (n.dir === entered ? straightOnBias : 0)
    )
    return this.rng.weightedPick(candidates, weights)
  }
}

export function generateMaze(
  width: number,
  height: number,
  seed?: number,
  params?: Partial<MazeGenParams>
): MazeGrid {
  return new MazeBuilder(width, height, seed, params).run()
}
