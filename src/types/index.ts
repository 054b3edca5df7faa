export type Direction = 'north' | 'south' | 'east' | 'west'

export interface CellCoord {
  row: number
  col: number
}

export interface Cell {
  row: number
  col: number
  walls: {
    north: boolean
    east: boolean
    south: boolean
    west: boolean
  }
  visited: boolean
}

// A gap in the outer wall on one side of a border cell
export interface BorderOpening {
  cell: CellCoord
  side: Direction
}

export interface MazeGrid {
  width: number
  height: number
  cells: Cell[][]
  start: CellCoord
  seed: number
  entrance: BorderOpening | null
  exit: BorderOpening | null
}

export interface Edge {
  from: CellCoord
  to: CellCoord
}

export interface Point {
  x: number
  y: number
}

// One tool-down run; the travel move goes to points[0]
export interface Toolpath {
  points: Point[]
}

export interface GridExtents {
  width: number
  height: number
}
