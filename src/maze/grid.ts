import { MovementProvider } from '../abstract'
import { MalformedMazeError } from '../exceptions'
import { Action, Cell } from '../types'
import { ACTION_OFFSETS, sameCell } from '../utils'
import { Move } from './move'

export interface Neighbor {
  action: Action
  cell: Cell
}

export interface GridInit {
  /** `true` marks an impassable cell. Rows shorter than the width are padded with open cells. */
  walls: ReadonlyArray<readonly boolean[]>
  start: Cell
  goal: Cell
  /** defaults to the longest row */
  width?: number
}

/**
 * Immutable maze description. Safe to share between any number of solves.
 */
export class Grid implements MovementProvider<Move> {
  readonly height: number
  readonly width: number
  readonly walls: ReadonlyArray<readonly boolean[]>
  readonly start: Cell
  readonly goal: Cell

  constructor (init: GridInit) {
    this.height = init.walls.length
    this.width = init.width ?? init.walls.reduce((max, row) => Math.max(max, row.length), 0)

    if (this.height < 1 || this.width < 1) {
      throw new MalformedMazeError('maze must have at least one row and one column')
    }

    this.walls = Object.freeze(
      init.walls.map((row, i) => {
        if (row.length > this.width) {
          throw new MalformedMazeError(`row ${i} is wider than the maze (${row.length} > ${this.width})`)
        }
        const padded = row.slice()
        while (padded.length < this.width) padded.push(false)
        return Object.freeze(padded)
      })
    )

    this.start = Object.freeze({ row: init.start.row, col: init.start.col })
    this.goal = Object.freeze({ row: init.goal.row, col: init.goal.col })

    this.checkEndpoint('start', this.start)
    this.checkEndpoint('goal', this.goal)
    if (sameCell(this.start, this.goal)) {
      throw new MalformedMazeError('start and goal must be different cells')
    }
  }

  private checkEndpoint (name: string, cell: Cell): void {
    if (!Number.isInteger(cell.row) || !Number.isInteger(cell.col) || !this.inBounds(cell)) {
      throw new MalformedMazeError(`${name} (${cell.row}, ${cell.col}) is outside the maze`)
    }
    if (this.isWall(cell)) {
      throw new MalformedMazeError(`${name} (${cell.row}, ${cell.col}) is a wall`)
    }
  }

  inBounds (cell: Cell): boolean {
    return cell.row >= 0 && cell.row < this.height && cell.col >= 0 && cell.col < this.width
  }

  isWall (cell: Cell): boolean {
    return this.walls[cell.row][cell.col]
  }

  /**
   * In-bounds open cells next to `cell`, always in the order up, down, left, right.
   */
  neighbors (cell: Cell): Neighbor[] {
    const result: Neighbor[] = []
    for (const [action, dRow, dCol] of ACTION_OFFSETS) {
      const next = { row: cell.row + dRow, col: cell.col + dCol }
      if (this.inBounds(next) && !this.isWall(next)) result.push({ action, cell: next })
    }
    return result
  }

  getNeighbors (org: Move): Move[] {
    return this.neighbors(org).map(({ action, cell }) => new Move(cell.row, cell.col, action))
  }
}
