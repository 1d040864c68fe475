export { Grid } from './maze/grid'
export type { GridInit, Neighbor } from './maze/grid'
export { Move } from './maze/move'
export { GoalCell } from './maze/goals'
export { parseMaze, loadMaze } from './maze/parser'
export { renderMaze } from './maze/render'
export type { RenderOptions } from './maze/render'
export {
  solve,
  findPath,
  createSearch,
  parseStrategy,
  DEFAULT_SOLVER_OPTS
} from './maze/solver'
export type { SearchResult, SolvedResult, UnsolvedResult, Solution, SolverOptions } from './maze/solver'
export { SearchStepper, exploreSteps } from './maze/stepper'
export type { MazeStep } from './maze/stepper'

export { GraphSearch } from './abstract/algorithms/graphSearch'
export type { GraphSearchOptions } from './abstract/algorithms/graphSearch'
export { reconstructPath } from './abstract/algorithms'
export { FifoFrontier, PriorityFrontier } from './abstract/frontier'
export type { Frontier } from './abstract/frontier'
export { PathNode } from './abstract/node'
export type { Goal, MovementProvider, Path, PathData, SearchStep } from './abstract'
export type { PathProducer } from './abstract/pathProducer'

export * from './exceptions'
export type { Action, Cell, PathStatus, SearchStrategy, StepStatus } from './types'
export { applyAction, cellKey, manhattan, sameCell } from './utils'
