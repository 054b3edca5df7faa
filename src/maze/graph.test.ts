import { describe, it, expect } from 'vitest'
import {
  adjacentCells,
  cellAt,
  countReachable,
  edgeKey,
  isPerfectMaze,
  neighbors,
  openEdges,
  openNeighbors,
} from './graph'
import { gridFromEdges, at } from '../test/gridFixtures'

const coords = (cells: { row: number; col: number }[]) => cells.map(({ row, col }) => [row, col])

describe('maze graph queries', () => {
  describe('neighbors', () => {
    const grid = gridFromEdges(3, 3, [])

    it('returns two neighbours for a corner', () => {
      expect(coords(neighbors(grid, at(0, 0)))).toEqual([[1, 0], [0, 1]])
    })

    it('returns three neighbours for an edge cell', () => {
      expect(coords(neighbors(grid, at(0, 1)))).toEqual([[1, 1], [0, 2], [0, 0]])
    })

    it('returns four neighbours in north, south, east, west order for an interior cell', () => {
      expect(coords(neighbors(grid, at(1, 1)))).toEqual([[0, 1], [2, 1], [1, 2], [1, 0]])
    })

    it('returns no neighbours on a 1x1 grid', () => {
      expect(neighbors(gridFromEdges(1, 1, []), at(0, 0))).toHaveLength(0)
    })

    it('ignores walls', () => {
      const open = gridFromEdges(3, 3, [[at(1, 1), at(1, 2)]])
      expect(neighbors(open, at(1, 1))).toHaveLength(4)
    })

    it('reports the direction of each neighbour', () => {
      expect(adjacentCells(grid, at(2, 2)).map((n) => n.dir)).toEqual(['north', 'west'])
    })

    it('rejects a query cell outside the grid like openNeighbors does', () => {
      expect(() => neighbors(grid, at(-1, 0))).toThrow(RangeError)
      expect(() => adjacentCells(grid, at(0, 3))).toThrow(RangeError)
      expect(() => openNeighbors(grid, at(-1, 0))).toThrow(RangeError)
    })
  })

  describe('openNeighbors', () => {
    it('only follows open edges', () => {
      const grid = gridFromEdges(3, 3, [[at(1, 1), at(0, 1)], [at(1, 1), at(1, 0)]])
      const open = openNeighbors(grid, at(1, 1))
      expect(open.map((n) => n.dir)).toEqual(['north', 'west'])
      expect(coords(open.map((n) => n.cell))).toEqual([[0, 1], [1, 0]])
    })
  })

  describe('cellAt', () => {
    it('rejects coordinates outside the grid', () => {
      expect(() => cellAt(gridFromEdges(2, 2, []), at(2, 0))).toThrow(RangeError)
    })
  })

  describe('edgeKey', () => {
    it('is the same in both directions', () => {
      expect(edgeKey(at(1, 2), at(1, 1))).toBe('1,1-1,2')
      expect(edgeKey(at(1, 1), at(1, 2))).toBe('1,1-1,2')
      expect(edgeKey(at(2, 0), at(1, 0))).toBe('1,0-2,0')
    })
  })

  describe('openEdges', () => {
    it('lists each open edge once, row-major with east before south', () => {
      const grid = gridFromEdges(2, 2, [[at(1, 0), at(0, 0)], [at(0, 0), at(0, 1)], [at(1, 1), at(1, 0)]])
      expect(openEdges(grid).map((e) => edgeKey(e.from, e.to))).toEqual(['0,0-0,1', '0,0-1,0', '1,0-1,1'])
    })

    it('is empty for a closed grid', () => {
      expect(openEdges(gridFromEdges(3, 2, []))).toEqual([])
    })
  })

  describe('isPerfectMaze', () => {
    it('accepts a spanning tree', () => {
      const grid = gridFromEdges(2, 2, [[at(0, 0), at(0, 1)], [at(0, 1), at(1, 1)], [at(1, 1), at(1, 0)]])
      expect(isPerfectMaze(grid)).toBe(true)
    })

    it('rejects a loop', () => {
      const grid = gridFromEdges(2, 2, [
        [at(0, 0), at(0, 1)],
        [at(0, 1), at(1, 1)],
        [at(1, 1), at(1, 0)],
        [at(1, 0), at(0, 0)],
      ])
      expect(isPerfectMaze(grid)).toBe(false)
    })

    it('rejects a disconnected layout', () => {
      const grid = gridFromEdges(3, 1, [[at(0, 0), at(0, 1)]])
      expect(countReachable(grid, at(0, 0))).toBe(2)
      expect(isPerfectMaze(grid)).toBe(false)
    })

    it('ignores openings in the outer wall', () => {
      const grid = gridFromEdges(2, 1, [[at(0, 0), at(0, 1)]])
      grid.cells[0][0].walls.west = false
      expect(openEdges(grid)).toHaveLength(1)
      expect(openNeighbors(grid, at(0, 0)).map((n) => n.dir)).toEqual(['east'])
      expect(isPerfectMaze(grid)).toBe(true)
    })

    it('accepts a single cell', () => {
      expect(isPerfectMaze(gridFromEdges(1, 1, []))).toBe(true)
    })
  })
})
