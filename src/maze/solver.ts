import { GraphSearch } from '../abstract/algorithms/graphSearch'
import { Frontier, FifoFrontier, PriorityFrontier } from '../abstract/frontier'
import { NoSolutionError, UnknownStrategyError } from '../exceptions'
import { Action, Cell, SearchStrategy } from '../types'
import { GoalCell } from './goals'
import { Grid } from './grid'
import { Move } from './move'

export interface SolverOptions {
  /** stop after this many expansions and report a partial result. Negative means unlimited. */
  maxExplored: number
  /** log a summary line when a search ends */
  verbose: boolean
}

export const DEFAULT_SOLVER_OPTS: SolverOptions = {
  maxExplored: -1,
  verbose: false
}

const STRATEGY_ALIASES = new Map<string, SearchStrategy>([
  ['uninformed', 'uninformed'],
  ['bfs', 'uninformed'],
  ['queue', 'uninformed'],
  ['heuristic', 'heuristic'],
  ['astar', 'heuristic']
])

/**
 * Accepts the strategy names and the `bfs`/`queue`/`astar` shorthands.
 */
export function parseStrategy (selector: string): SearchStrategy {
  const strategy = STRATEGY_ALIASES.get(selector.toLowerCase())
  if (strategy === undefined) throw new UnknownStrategyError(selector)
  return strategy
}

export interface Solution {
  /** moves from start to goal */
  actions: Action[]
  /** cell reached by each action; excludes the start, ends on the goal */
  cells: Cell[]
}

interface ResultBase {
  exploredCount: number
  /** cells in the order they were taken off the frontier */
  exploredOrder: Cell[]
  generatedNodes: number
  calcTime: number
}

export interface SolvedResult extends ResultBase {
  status: 'success'
  solution: Solution
}

export interface UnsolvedResult extends ResultBase {
  status: 'noPath' | 'partial'
  solution: null
}

export type SearchResult = SolvedResult | UnsolvedResult

function makeFrontier (strategy: SearchStrategy): Frontier<Move> {
  switch (strategy) {
    case 'uninformed':
      return new FifoFrontier<Move>()
    case 'heuristic':
      return new PriorityFrontier<Move>()
    default:
      throw new UnknownStrategyError(String(strategy))
  }
}

/**
 * Builds a fresh search over `grid`. Nothing is shared between searches but the grid.
 */
export function createSearch (grid: Grid, strategy: SearchStrategy, opts: Partial<SolverOptions> = {}): GraphSearch<Move> {
  const frontier = makeFrontier(strategy)
  const settings = { ...DEFAULT_SOLVER_OPTS, ...opts }

  return new GraphSearch<Move>(Move.startMove(grid.start), grid, new GoalCell(grid.goal), frontier, {
    informed: strategy === 'heuristic',
    maxExplored: settings.maxExplored,
    verbose: settings.verbose
  })
}

export function toSearchResult (search: GraphSearch<Move>): SearchResult {
  const path = search.compute()
  const base: ResultBase = {
    exploredCount: path.visitedNodes,
    exploredOrder: path.visitedOrder.map((move) => move.toCell()),
    generatedNodes: path.generatedNodes,
    calcTime: path.calcTime
  }

  if (path.status !== 'success') return { ...base, status: path.status, solution: null }

  const actions: Action[] = []
  for (const move of path.path) {
    // only the start move lacks an action, and it is never part of the path
    if (move.action !== null) actions.push(move.action)
  }
  return {
    ...base,
    status: 'success',
    solution: { actions, cells: path.path.map((move) => move.toCell()) }
  }
}

/**
 * Searches from the grid's start to its goal. A maze without a path is a
 * normal outcome here and comes back with status `noPath`.
 */
export function solve (grid: Grid, strategy: SearchStrategy, opts: Partial<SolverOptions> = {}): SearchResult {
  return toSearchResult(createSearch(grid, strategy, opts))
}

/**
 * Like {@link solve}, but throws {@link NoSolutionError} unless a path was found.
 */
export function findPath (grid: Grid, strategy: SearchStrategy, opts: Partial<SolverOptions> = {}): Solution {
  const result = solve(grid, strategy, opts)
  if (result.status !== 'success') throw new NoSolutionError(result.exploredCount)
  return result.solution
}
