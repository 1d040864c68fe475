export class MalformedMazeError extends Error {
  constructor (message: string) {
    super('Malformed maze: ' + message)
    this.name = 'MalformedMazeError'
  }
}

/**
 * Thrown when a frontier is asked for a node while empty.
 * Callers are expected to check `isEmpty()` first, so this is a bug, not an outcome.
 */
export class EmptyFrontierError extends Error {
  constructor () {
    super('empty frontier')
    this.name = 'EmptyFrontierError'
  }
}

export class NoSolutionError extends Error {
  constructor (public readonly exploredCount: number) {
    super(`no solution (${exploredCount} states explored)`)
    this.name = 'NoSolutionError'
  }
}

export class UnknownStrategyError extends Error {
  constructor (public readonly selector: string) {
    super(`unknown strategy: ${selector} (use 'bfs' or 'astar')`)
    this.name = 'UnknownStrategyError'
  }
}
