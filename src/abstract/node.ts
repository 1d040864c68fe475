export interface PathData {
  hash: string
  /** cost of the edge that produced this data from its parent */
  cost: number
}

export class PathNode<Data extends PathData> {
  constructor (
    readonly data: Data,
    readonly parent: PathNode<Data> | null = null,
    readonly g = 0,
    readonly h = 0
  ) {}

  get f (): number {
    return this.g + this.h
  }
}
