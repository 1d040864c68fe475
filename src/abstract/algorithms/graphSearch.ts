import { Algorithm, Goal, MovementProvider, Path, SearchStep } from '../'
import { Frontier } from '../frontier'
import { PathData, PathNode } from '../node'
import { PathStatus } from '../../types'
import { debug } from '../../utils'
import { reconstructPath } from '.'

export interface GraphSearchOptions {
  /** order the frontier by g + h. Without it, nodes carry no priority. */
  informed: boolean
  /** stop with a partial result after this many expansions. Negative means no limit. */
  maxExplored: number
  verbose: boolean
}

/**
 * Generic closed-set graph search.
 *
 * Breadth-first or A* depending on the frontier handed in and on `informed`.
 * Each state is expanded at most once, and a state already resident in the
 * frontier is never re-added, so the first route discovered to it is the one kept.
 */
export class GraphSearch<Data extends PathData = PathData> implements Algorithm<Data> {
  startTime: number
  goal: Goal<Data>
  movementProvider: MovementProvider<Data>
  frontier: Frontier<Data>
  options: GraphSearchOptions

  closedDataSet: Set<string>
  visitedOrder: Data[]
  generatedNodes = 1

  private result: Path<Data> | null = null

  constructor (
    start: Data,
    movements: MovementProvider<Data>,
    goal: Goal<Data>,
    frontier: Frontier<Data>,
    options: GraphSearchOptions
  ) {
    this.startTime = performance.now()

    this.movementProvider = movements
    this.goal = goal
    this.frontier = frontier
    this.options = options

    this.closedDataSet = new Set()
    this.visitedOrder = []

    const startNode = new PathNode<Data>(start, null, 0, this.heuristic(start))
    this.insert(startNode)
  }

  get finished (): boolean {
    return this.result !== null
  }

  protected heuristic (data: Data): number {
    return this.options.informed ? this.goal.heuristic(data) : 0
  }

  private insert (node: PathNode<Data>): void {
    if (this.options.informed) this.frontier.insert(node, node.f)
    else this.frontier.insert(node)
  }

  makeResult (status: PathStatus, node: PathNode<Data> | null): Path<Data> {
    const path = node !== null ? reconstructPath(node) : []
    const calcTime = performance.now() - this.startTime

    debug(
      this.options.verbose,
      status,
      `${calcTime.toFixed(2)}ms`,
      `cost=${node?.g ?? -1}`,
      `explored=${this.closedDataSet.size}`,
      `generated=${this.generatedNodes}`,
      `length=${path.length}`
    )

    this.result = {
      status,
      cost: node?.g ?? -1,
      calcTime,
      visitedNodes: this.closedDataSet.size,
      generatedNodes: this.generatedNodes,
      path,
      visitedOrder: this.visitedOrder
    }
    return this.result
  }

  /**
   * Performs a single expansion. Once the search has ended, returns the final result again.
   */
  step (): SearchStep<Data> {
    if (this.result !== null) {
      return { status: this.result.status, expanded: null, result: this.result }
    }

    if (this.frontier.isEmpty()) {
      // every state reachable from the start has been expanded
      const result = this.makeResult('noPath', null)
      return { status: result.status, expanded: null, result }
    }

    const { maxExplored } = this.options
    if (maxExplored >= 0 && this.closedDataSet.size >= maxExplored) {
      const result = this.makeResult('partial', null)
      return { status: result.status, expanded: null, result }
    }

    const node = this.frontier.removeNext()
    this.closedDataSet.add(node.data.hash)
    this.visitedOrder.push(node.data)

    if (this.goal.isEnd(node.data)) {
      const result = this.makeResult('success', node)
      return { status: result.status, expanded: node.data, result }
    }

    for (const neighborData of this.movementProvider.getNeighbors(node.data)) {
      if (this.closedDataSet.has(neighborData.hash)) continue
      if (this.frontier.containsState(neighborData.hash)) continue

      const child = new PathNode(neighborData, node, node.g + neighborData.cost, this.heuristic(neighborData))
      this.insert(child)
      this.generatedNodes++
    }

    return { status: 'expanding', expanded: node.data, result: null }
  }

  compute (): Path<Data> {
    let result = this.result
    while (result === null) {
      result = this.step().result
    }
    return result
  }
}
