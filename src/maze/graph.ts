import type { Cell, CellCoord, Direction, Edge, MazeGrid } from '../types'

export const DIRECTIONS: readonly Direction[] = ['north', 'south', 'east', 'west']
export const DR: Record<Direction, number> = { north: -1, south: 1, east: 0, west: 0 }
export const DC: Record<Direction, number> = { north: 0, south: 0, east: 1, west: -1 }
export const OPPOSITE: Record<Direction, Direction> = {
  north: 'south',
  south: 'north',
  east: 'west',
  west: 'east',
}

export interface Adjacent {
  cell: Cell
  dir: Direction
}

export function inBounds(grid: MazeGrid, row: number, col: number): boolean {
  return row >= 0 && row < grid.height && col >= 0 && col < grid.width
}

export function cellAt(grid: MazeGrid, coord: CellCoord): Cell {
  if (!inBounds(grid, coord.row, coord.col)) {
    throw new RangeError(`Cell (${coord.row}, ${coord.col}) is outside the ${grid.width}x${grid.height} grid`)
  }
  return grid.cells[coord.row][coord.col]
}

/**
 * In-bounds 4-connected neighbours of a cell, walls ignored, in north/south/east/west order.
 * Neighbour coordinates off the grid are skipped, so a corner has two and a 1x1 grid none.
 * The query cell itself must be on the grid, otherwise `RangeError`.
 */
export function adjacentCells(grid: MazeGrid, cell: CellCoord): Adjacent[] {
  const source = cellAt(grid, cell)
  const result: Adjacent[] = []
  for (const dir of DIRECTIONS) {
    const row = source.row + DR[dir]
    const col = source.col + DC[dir]
    if (inBounds(grid, row, col)) {
      result.push({ cell: grid.cells[row][col], dir })
    }
  }
  return result
}

export function neighbors(grid: MazeGrid, cell: CellCoord): Cell[] {
  return adjacentCells(grid, cell).map((n) => n.cell)
}

// Neighbours reachable through an open edge
export function openNeighbors(grid: MazeGrid, cell: CellCoord): Adjacent[] {
  const { walls } = cellAt(grid, cell)
  return adjacentCells(grid, cell).filter((n) => !walls[n.dir])
}

export function edgeKey(a: CellCoord, b: CellCoord): string {
  const aFirst = a.row < b.row || (a.row === b.row && a.col <= b.col)
  const [first, second] = aFirst ? [a, b] : [b, a]
  return `${first.row},${first.col}-${second.row},${second.col}`
}

/**
 * Every open edge exactly once, row-major, east edge before south edge.
 */
export function openEdges(grid: MazeGrid): Edge[] {
  const edges: Edge[] = []
  for (let row = 0; row < grid.height; row++) {
    for (let col = 0; col < grid.width; col++) {
      const cell = grid.cells[row][col]
      if (col + 1 < grid.width && !cell.walls.east) {
        edges.push({ from: { row, col }, to: { row, col: col + 1 } })
      }
      if (row + 1 < grid.height && !cell.walls.south) {
        edges.push({ from: { row, col }, to: { row: row + 1, col } })
      }
    }
  }
  return edges
}

export function countReachable(grid: MazeGrid, from: CellCoord): number {
  const seen = new Set<Cell>([cellAt(grid, from)])
  const queue: Cell[] = [cellAt(grid, from)]
  while (queue.length > 0) {
    const current = queue.pop()
    if (current === undefined) break
    for (const { cell } of openNeighbors(grid, current)) {
      if (!seen.has(cell)) {
        seen.add(cell)
        queue.push(cell)
      }
    }
  }
  return seen.size
}

/**
 * A perfect maze is a spanning tree: w*h - 1 open edges and every cell reachable.
 */
export function isPerfectMaze(grid: MazeGrid): boolean {
  const cellCount = grid.width * grid.height
  return openEdges(grid).length === cellCount - 1 && countReachable(grid, { row: 0, col: 0 }) === cellCount
}
