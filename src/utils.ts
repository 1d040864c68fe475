import { Action, Cell } from './types'

export const DEBUG_ENV = 'MAZE_SOLVER_DEBUG'

export const debug = (enabled: boolean, ...args: unknown[]): void => {
  if (!enabled && process.env[DEBUG_ENV] !== '1') return
  console.log(...args)
}

export function cellKey (cell: Cell): string {
  return `${cell.row},${cell.col}`
}

export function sameCell (a: Cell, b: Cell): boolean {
  return a.row === b.row && a.col === b.col
}

export function manhattan (a: Cell, b: Cell): number {
  return Math.abs(a.row - b.row) + Math.abs(a.col - b.col)
}

/**
 * Row/column offsets, listed in the order neighbors are generated.
 */
export const ACTION_OFFSETS: ReadonlyArray<readonly [Action, number, number]> = [
  ['up', -1, 0],
  ['down', 1, 0],
  ['left', 0, -1],
  ['right', 0, 1]
]

export function applyAction (cell: Cell, action: Action): Cell {
  switch (action) {
    case 'up':
      return { row: cell.row - 1, col: cell.col }
    case 'down':
      return { row: cell.row + 1, col: cell.col }
    case 'left':
      return { row: cell.row, col: cell.col - 1 }
    case 'right':
      return { row: cell.row, col: cell.col + 1 }
  }
}
