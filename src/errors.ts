export type MazeErrorCode =
  | 'INVALID_DIMENSION'
  | 'INVALID_START'
  | 'INVALID_BIAS'
  | 'INVALID_OPENING'
  | 'INCOMPLETE_TRAVERSAL'
  | 'MALFORMED_TOOLPATH'
  | 'INVALID_CONFIG'

/**
 * Base class for every failure raised by the maze pipeline.
 * All of them are fail-fast: the same input always fails the same way.
 */
export class MazeError extends Error {
  readonly code: MazeErrorCode

  constructor(code: MazeErrorCode, message: string) {
    super(message)
    this.name = 'MazeError'
    this.code = code
  }
}

export class InvalidDimensionError extends MazeError {
  constructor(field: 'width' | 'height', value: number) {
    super('INVALID_DIMENSION', `${field} must be an integer >= 1, got ${value}`)
    this.name = 'InvalidDimensionError'
  }
}

export class InvalidStartError extends MazeError {
  constructor(row: number, col: number, width: number, height: number) {
    super('INVALID_START', `Start cell (${row}, ${col}) is outside the ${width}x${height} grid`)
    this.name = 'InvalidStartError'
  }
}

export class InvalidBiasError extends MazeError {
  constructor(field: string, value: number) {
    super('INVALID_BIAS', `${field} must be a non-negative integer, got ${value}`)
    this.name = 'InvalidBiasError'
  }
}

export class InvalidOpeningError extends MazeError {
  constructor(field: 'entrance' | 'exit', message: string) {
    super('INVALID_OPENING', `${field} ${message}`)
    this.name = 'InvalidOpeningError'
  }
}

// Raised when the planner could not reach every open edge, i.e. the grid is not a spanning tree
export class IncompleteTraversalError extends MazeError {
  readonly uncovered: number

  constructor(uncovered: number, total: number) {
    super('INCOMPLETE_TRAVERSAL', `Toolpaths cover ${total - uncovered} of ${total} open edges`)
    this.name = 'IncompleteTraversalError'
    this.uncovered = uncovered
  }
}

export class MalformedToolpathError extends MazeError {
  constructor(message: string) {
    super('MALFORMED_TOOLPATH', message)
    this.name = 'MalformedToolpathError'
  }
}

export class InvalidConfigError extends MazeError {
  constructor(issues: string[]) {
    super('INVALID_CONFIG', `Invalid machine config: ${issues.join('; ')}`)
    this.name = 'InvalidConfigError'
  }
}
