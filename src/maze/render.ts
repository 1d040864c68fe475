import { Cell } from '../types'
import { cellKey, sameCell } from '../utils'
import { Grid } from './grid'
import { SearchResult } from './solver'

export interface RenderOptions {
  showSolution: boolean
  showExplored: boolean
}

const DEFAULT_RENDER_OPTS: RenderOptions = {
  showSolution: true,
  showExplored: false
}

export const GLYPHS = {
  wall: '█',
  start: 'A',
  goal: 'B',
  path: '*',
  explored: '.',
  open: ' '
} as const

/**
 * Text picture of the maze, one line per row, optionally overlaid with a search result.
 */
export function renderMaze (grid: Grid, result: SearchResult | null = null, opts: Partial<RenderOptions> = {}): string {
  const { showSolution, showExplored } = { ...DEFAULT_RENDER_OPTS, ...opts }

  const onPath = new Set<string>()
  if (showSolution && result?.solution != null) {
    for (const cell of result.solution.cells) onPath.add(cellKey(cell))
  }
  const explored = new Set<string>()
  if (showExplored && result != null) {
    for (const cell of result.exploredOrder) explored.add(cellKey(cell))
  }

  const lines: string[] = []
  for (let row = 0; row < grid.height; row++) {
    let line = ''
    for (let col = 0; col < grid.width; col++) {
      const cell: Cell = { row, col }
      const key = cellKey(cell)
      if (grid.isWall(cell)) line += GLYPHS.wall
      else if (sameCell(cell, grid.start)) line += GLYPHS.start
      else if (sameCell(cell, grid.goal)) line += GLYPHS.goal
      else if (onPath.has(key)) line += GLYPHS.path
      else if (explored.has(key)) line += GLYPHS.explored
      else line += GLYPHS.open
    }
    lines.push(line)
  }
  return lines.join('\n')
}
