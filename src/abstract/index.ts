import { PathStatus, StepStatus } from '../types'
import { PathData, PathNode } from './node'

export interface Goal<Data> {
  isEnd: (node: Data) => boolean
  heuristic: (node: Data) => number
}

export interface Algorithm<Data extends PathData = PathData> {
  movementProvider: MovementProvider<Data>
  step: () => SearchStep<Data>
  compute: () => Path<Data>
  makeResult: (status: PathStatus, node: PathNode<Data> | null) => Path<Data>
}

export interface Path<Data extends PathData> {
  status: PathStatus
  cost: number
  calcTime: number
  visitedNodes: number
  generatedNodes: number
  path: Data[]
  /** every dequeued node, in dequeue order */
  visitedOrder: Data[]
}

export interface SearchStep<Data extends PathData> {
  status: StepStatus
  /** node dequeued by this step, null once the search has ended */
  expanded: Data | null
  result: Path<Data> | null
}

export interface MovementProvider<Data extends PathData> {
  getNeighbors: (org: Data) => Data[]
}

export { PathNode } from './node'
export type { PathData } from './node'
