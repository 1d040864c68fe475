#!/usr/bin/env node
import { parseArgs } from 'util'
import { MalformedMazeError, UnknownStrategyError } from './exceptions'
import { loadMaze } from './maze/parser'
import { renderMaze } from './maze/render'
import { Grid } from './maze/grid'
import { DEFAULT_SOLVER_OPTS, SolverOptions, parseStrategy, solve } from './maze/solver'
import { SearchStrategy } from './types'
import { DEBUG_ENV } from './utils'

const USAGE = 'Usage: maze-solve <maze.txt> [--strategy bfs|astar] [--explored] [--max N] [--verbose]'

export const EXIT_SOLVED = 0
export const EXIT_NO_SOLUTION = 1
export const EXIT_USAGE = 2

const OPTIONS = {
  strategy: { type: 'string', short: 's', default: 'bfs' },
  explored: { type: 'boolean', short: 'e', default: false },
  max: { type: 'string', short: 'm' },
  verbose: { type: 'boolean', short: 'v', default: false }
} as const

class UsageError extends Error {
  constructor (message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

function readMaxExplored (raw: string | undefined): number {
  if (raw === undefined) return DEFAULT_SOLVER_OPTS.maxExplored
  const value = Number(raw)
  if (!Number.isInteger(value) || value < 0) throw new UsageError(`--max expects a non-negative integer, got ${raw}`)
  return value
}

function isFileError (err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && 'path' in err
}

function isParseArgsError (err: unknown): err is Error {
  return err instanceof TypeError && 'code' in err && String(err.code).startsWith('ERR_PARSE_ARGS')
}

interface CliRun {
  grid: Grid
  strategy: SearchStrategy
  settings: SolverOptions
  showExplored: boolean
}

function setup (argv: string[], env: NodeJS.ProcessEnv): CliRun {
  const { values, positionals } = parseArgs({ args: argv, allowPositionals: true, options: OPTIONS })
  if (positionals.length !== 1) throw new UsageError('expected exactly one maze file')

  return {
    strategy: parseStrategy(values.strategy ?? 'bfs'),
    settings: {
      maxExplored: readMaxExplored(values.max),
      verbose: values.verbose === true || env[DEBUG_ENV] === '1'
    },
    showExplored: values.explored ?? false,
    grid: loadMaze(positionals[0])
  }
}

/**
 * Runs the command line and returns the process exit code.
 */
export function main (argv: string[], env: NodeJS.ProcessEnv = process.env): number {
  let run: CliRun
  try {
    run = setup(argv, env)
  } catch (err) {
    if (err instanceof UsageError || isParseArgsError(err)) {
      console.error(err.message)
      console.error(USAGE)
      return EXIT_USAGE
    }
    if (err instanceof MalformedMazeError || err instanceof UnknownStrategyError || isFileError(err)) {
      console.error(err.message)
      return EXIT_USAGE
    }
    throw err
  }
  const { grid, strategy, settings, showExplored } = run

  console.log('Maze:')
  console.log()
  console.log(renderMaze(grid))
  console.log()
  console.log('Solving...')

  const result = solve(grid, strategy, settings)
  console.log('States Explored:', result.exploredCount)

  if (result.status !== 'success') {
    console.log(result.status === 'partial' ? 'Stopped before reaching the goal.' : 'No solution.')
    return EXIT_NO_SOLUTION
  }

  console.log('Solution:', result.solution.actions.join(', '))
  console.log()
  console.log(renderMaze(grid, result, { showExplored }))
  console.log()
  return EXIT_SOLVED
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2))
}
