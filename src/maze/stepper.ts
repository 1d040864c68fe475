import { GraphSearch } from '../abstract/algorithms/graphSearch'
import { PathProducer } from '../abstract/pathProducer'
import { SearchStep } from '../abstract'
import { Cell, SearchStrategy, StepStatus } from '../types'
import { Grid } from './grid'
import { Move } from './move'
import { SearchResult, SolverOptions, createSearch, toSearchResult } from './solver'

export interface MazeStep {
  status: StepStatus
  /** cell dequeued by this step, null once the search has ended */
  explored: Cell | null
  /** set on the step that ends the search */
  result: SearchResult | null
}

/**
 * Pull-based search: each `advance()` expands one cell, so a renderer can
 * paint exploration as it happens without the solver knowing about it.
 */
export class SearchStepper implements PathProducer<Move> {
  private readonly search: GraphSearch<Move>
  private latest: SearchResult | null = null

  constructor (grid: Grid, strategy: SearchStrategy, opts: Partial<SolverOptions> = {}) {
    this.search = createSearch(grid, strategy, opts)
  }

  get done (): boolean {
    return this.search.finished
  }

  advance (): SearchStep<Move> {
    return this.search.step()
  }

  next (): MazeStep {
    const step = this.advance()
    if (step.result !== null && this.latest === null) {
      this.latest = toSearchResult(this.search)
    }
    return {
      status: step.status,
      explored: step.expanded?.toCell() ?? null,
      result: this.latest
    }
  }
}

export function * exploreSteps (grid: Grid, strategy: SearchStrategy, opts: Partial<SolverOptions> = {}): Generator<MazeStep, SearchResult, undefined> {
  const stepper = new SearchStepper(grid, strategy, opts)
  while (true) {
    const step = stepper.next()
    yield step
    if (step.result !== null) return step.result
  }
}
