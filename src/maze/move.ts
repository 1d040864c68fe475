import { PathData } from '../abstract/node'
import { Action, Cell } from '../types'
import { cellKey } from '../utils'

/**
 * One step through the maze: the cell arrived at and the action that got there.
 * The start move has no action and costs nothing.
 */
export class Move implements PathData, Cell {
  readonly hash: string

  constructor (
    public readonly row: number,
    public readonly col: number,
    public readonly action: Action | null,
    public readonly cost: number = 1
  ) {
    this.hash = cellKey(this)
  }

  static startMove (cell: Cell): Move {
    return new Move(cell.row, cell.col, null, 0)
  }

  toCell (): Cell {
    return { row: this.row, col: this.col }
  }
}
