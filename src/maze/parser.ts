import { readFileSync } from 'fs'
import { MalformedMazeError } from '../exceptions'
import { Cell } from '../types'
import { Grid } from './grid'

export const START_MARK = 'A'
export const GOAL_MARK = 'B'
export const OPEN_MARK = ' '

function countOf (text: string, mark: string): number {
  return text.split(mark).length - 1
}

/**
 * Parses the text form of a maze.
 *
 * `A` is the start, `B` the goal, a space is open floor and anything else is wall.
 * The maze is as wide as its longest line; shorter lines are open past their end.
 */
export function parseMaze (text: string): Grid {
  if (countOf(text, START_MARK) !== 1) throw new MalformedMazeError('maze must have exactly one start point')
  if (countOf(text, GOAL_MARK) !== 1) throw new MalformedMazeError('maze must have exactly one goal')

  const normalized = text.replace(/\r\n?/g, '\n')
  // a single trailing newline ends the last row rather than starting a new one
  const lines = (normalized.endsWith('\n') ? normalized.slice(0, -1) : normalized).split('\n')

  let start: Cell | null = null
  let goal: Cell | null = null
  const walls: boolean[][] = []
  for (let row = 0; row < lines.length; row++) {
    const chars = Array.from(lines[row])
    const wallRow: boolean[] = []
    for (let col = 0; col < chars.length; col++) {
      const ch = chars[col]
      if (ch === START_MARK) start = { row, col }
      else if (ch === GOAL_MARK) goal = { row, col }
      wallRow.push(ch !== START_MARK && ch !== GOAL_MARK && ch !== OPEN_MARK)
    }
    walls.push(wallRow)
  }

  if (start === null || goal === null) {
    // unreachable once the counts above passed
    throw new MalformedMazeError('maze must have exactly one start point and one goal')
  }

  return new Grid({ walls, start, goal })
}

export function loadMaze (filename: string): Grid {
  return parseMaze(readFileSync(filename, 'utf8'))
}
