import { Goal } from '../abstract'
import { Cell } from '../types'
import { manhattan, sameCell } from '../utils'
import { Move } from './move'

/**
 * Reach a single cell. The heuristic is Manhattan distance, which never
 * overestimates on a 4-connected grid with unit steps.
 */
export class GoalCell implements Goal<Move> {
  constructor (public readonly cell: Cell) {}

  isEnd (node: Move): boolean {
    return sameCell(node, this.cell)
  }

  heuristic (node: Move): number {
    return manhattan(node, this.cell)
  }
}
