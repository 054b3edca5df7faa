import type { BorderOpening, Cell, CellCoord, Direction, Edge, GridExtents, MazeGrid, Point, Toolpath } from '../types'
import { debug } from '../utils/debug'
import { IncompleteTraversalError, MalformedToolpathError } from '../errors'
import { cellAt, DC, DR, edgeKey, openEdges, openNeighbors, type Adjacent } from '../maze/graph'

function toPoint(cell: CellCoord): Point {
  return { x: cell.col, y: cell.row }
}

function getDirection(from: Point, to: Point): 'h' | 'v' | 'd' {
  const dx = Math.abs(to.x - from.x)
  const dy = Math.abs(to.y - from.y)
  if (dy === 0) return 'h'
  if (dx === 0) return 'v'
  return 'd'
}

// Drop the middle point of every straight run; the set of cut edges is unchanged
function simplify(path: Point[]): Point[] {
  if (path.length <= 2) return path
  const simplified: Point[] = [path[0]]
  for (let i = 1; i < path.length - 1; i++) {
    const dir1 = getDirection(path[i - 1], path[i])
    const dir2 = getDirection(path[i], path[i + 1])
    if (dir1 !== dir2) {
      simplified.push(path[i])
    }
  }
  simplified.push(path[path.length - 1])
  return simplified
}

function pickWalkStart(grid: MazeGrid): Cell {
  const start = cellAt(grid, grid.start)
  if (openNeighbors(grid, start).length === 1) return start

  for (const row of grid.cells) {
    for (const cell of row) {
      if (openNeighbors(grid, cell).length === 1) return cell
    }
  }
  // No dead end at all: not a tree, the coverage check below reports it
  return start
}

type PointKey = string

function pointKey(p: Point): PointKey {
  return `${p.x},${p.y}`
}

/**
 * Join runs that meet end to end into longer chains.
 * Each chain is grown forward from its last point, then backward from its first,
 * until no unused run touches either end. Chains keep the order of their first run.
 */
function joinRuns(runs: Point[][]): Point[][] {
  const used = new Array<boolean>(runs.length).fill(false)

  const adj = new Map<PointKey, number[]>()
  runs.forEach((run, i) => {
    for (const end of [run[0], run[run.length - 1]]) {
      const key = pointKey(end)
      const list = adj.get(key)
      if (list) list.push(i)
      else adj.set(key, [i])
    }
  })

  function takeNextFromEndpoint(endpoint: Point): number | null {
    for (const idx of adj.get(pointKey(endpoint)) ?? []) {
      if (!used[idx]) return idx
    }
    return null
  }

  const chains: Point[][] = []
  for (let startIdx = 0; startIdx < runs.length; startIdx++) {
    if (used[startIdx]) continue
    used[startIdx] = true
    let chain = [...runs[startIdx]]

    // Extend forward from chain end
    while (true) {
      const end = chain[chain.length - 1]
      const next = takeNextFromEndpoint(end)
      if (next === null) break
      used[next] = true
      const cand = runs[next]
      const oriented = pointKey(cand[0]) === pointKey(end) ? cand : [...cand].reverse()
      chain.push(...oriented.slice(1))
    }

    // Extend backward from chain start
    while (true) {
      const start = chain[0]
      const next = takeNextFromEndpoint(start)
      if (next === null) break
      used[next] = true
      const cand = runs[next]
      const oriented = pointKey(cand[cand.length - 1]) === pointKey(start) ? cand : [...cand].reverse()
      chain = [...oriented.slice(0, -1), ...chain]
    }

    chains.push(chain)
  }
  return chains
}

/**
 * Walk the open edges with an explicit stack of cells. The walk extends the current run
 * through uncovered open edges, preferring to carry straight on, and when it gets stuck
 * it pops back to the nearest cell that still has an uncovered edge and starts a new run there.
 */
function walkRuns(grid: MazeGrid, edges: Edge[]): Point[][] {
  const covered = new Set<string>()
  const uncoveredFrom = (cell: Cell): Adjacent[] =>
    openNeighbors(grid, cell).filter((n) => !covered.has(edgeKey(cell, n.cell)))

  const first = pickWalkStart(grid)
  const stack: Cell[] = [first]
  const runs: Point[][] = []
  let run: Point[] = [toPoint(first)]
  let lastDir: Direction | null = null

  while (stack.length > 0) {
    const top = stack[stack.length - 1]
    const options = uncoveredFrom(top)

    if (options.length > 0) {
      const next = options.find((n) => n.dir === lastDir) ?? options[0]
      covered.add(edgeKey(top, next.cell))
      stack.push(next.cell)
      run.push(toPoint(next.cell))
      lastDir = next.dir
      continue
    }

    if (run.length > 1) {
      runs.push(run)
    }

    // Backtrack to the nearest cell with work left
    while (stack.length > 0 && uncoveredFrom(stack[stack.length - 1]).length === 0) {
      stack.pop()
    }
    const restart = stack[stack.length - 1]
    if (restart === undefined) break
    run = [toPoint(restart)]
    lastDir = null
  }

  if (covered.size !== edges.length) {
    throw new IncompleteTraversalError(edges.length - covered.size, edges.length)
  }
  return runs
}

// One step past the border, through the gap in the outer wall
function outsidePoint({ cell, side }: BorderOpening): Point {
  return { x: cell.col + DC[side], y: cell.row + DR[side] }
}

function borderStubs(grid: MazeGrid): Point[][] {
  const stubs: Point[][] = []
  if (grid.entrance) stubs.push([outsidePoint(grid.entrance), toPoint(grid.entrance.cell)])
  if (grid.exit) stubs.push([toPoint(grid.exit.cell), outsidePoint(grid.exit)])
  return stubs
}

/**
 * Plan the corridors of a maze as an ordered list of continuous cuts.
 *
 * Every open edge is cut exactly once. Runs from the walk that meet end to end are
 * joined, so no two toolpaths share an endpoint and a spanning tree needs exactly
 * half as many toolpaths as it has cells of odd degree. Entrance and exit gaps add a
 * one-step stub past the border, joined onto the run that ends at their cell where
 * there is one.
 */
export function planToolpaths(grid: MazeGrid): Toolpath[] {
  const edges = openEdges(grid)
  const runs = edges.length > 0 ? walkRuns(grid, edges) : []
  const stubs = borderStubs(grid)

  const paths = joinRuns([...runs, ...stubs]).map((points) => ({ points: simplify(points) }))

  const stubNote = stubs.length > 0 ? ` and ${stubs.length} border stubs` : ''
  debug('planner', `Planned ${paths.length} toolpaths over ${edges.length} open edges${stubNote}`)
  return paths
}

/**
 * Unit edge keys cut by a toolpath, in cutting order.
 * With `extents`, steps that leave the grid (entrance and exit stubs) are left out.
 */
export function toolpathEdges(toolpath: Toolpath, extents?: GridExtents): string[] {
  const inside = (p: CellCoord) =>
    extents === undefined || (p.row >= 0 && p.row < extents.height && p.col >= 0 && p.col < extents.width)
  const keys: string[] = []
  const { points } = toolpath
  for (let i = 1; i < points.length; i++) {
    const from = points[i - 1]
    const to = points[i]
    if (getDirection(from, to) === 'd') {
      throw new MalformedToolpathError(`Diagonal segment (${from.x}, ${from.y}) -> (${to.x}, ${to.y})`)
    }
    const length = Math.abs(to.x - from.x) + Math.abs(to.y - from.y)
    if (length === 0) {
      throw new MalformedToolpathError(`Zero-length segment at (${from.x}, ${from.y})`)
    }
    const sx = Math.sign(to.x - from.x)
    const sy = Math.sign(to.y - from.y)
    for (let step = 0; step < length; step++) {
      const a = { row: from.y + sy * step, col: from.x + sx * step }
      const b = { row: a.row + sy, col: a.col + sx }
      if (inside(a) && inside(b)) keys.push(edgeKey(a, b))
    }
  }
  return keys
}

/**
 * Replay a plan into the set of edges it cuts, counting edges cut more than once.
 * Pass the grid (or its extents) to count only edges between cells.
 */
export function coveredEdges(
  toolpaths: Toolpath[],
  extents?: GridExtents
): { keys: Set<string>; duplicates: number } {
  const keys = new Set<string>()
  let duplicates = 0
  for (const toolpath of toolpaths) {
    for (const key of toolpathEdges(toolpath, extents)) {
      if (keys.has(key)) duplicates++
      else keys.add(key)
    }
  }
  return { keys, duplicates }
}
