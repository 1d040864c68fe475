import { Heap } from 'heap-typed'
import { EmptyFrontierError } from '../exceptions'
import { PathData, PathNode } from './node'

/**
 * Open set of a graph search.
 *
 * A state is resident at most once: inserting a node whose state is already
 * resident is a no-op, even if the new node is cheaper. There is no decrease-key.
 */
export interface Frontier<Data extends PathData> {
  readonly size: number
  insert: (node: PathNode<Data>, priority?: number) => void
  removeNext: () => PathNode<Data>
  isEmpty: () => boolean
  containsState: (hash: string) => boolean
}

/**
 * Breadth-first frontier. Oldest node out first, priorities are ignored.
 */
export class FifoFrontier<Data extends PathData> implements Frontier<Data> {
  private readonly queue: Array<PathNode<Data>> = []
  private head = 0
  private readonly states = new Set<string>()

  get size (): number {
    return this.queue.length - this.head
  }

  insert (node: PathNode<Data>): void {
    if (this.states.has(node.data.hash)) return
    this.queue.push(node)
    this.states.add(node.data.hash)
  }

  removeNext (): PathNode<Data> {
    if (this.isEmpty()) throw new EmptyFrontierError()
    const node = this.queue[this.head++]
    this.states.delete(node.data.hash)

    // compact once the consumed prefix dominates the backing array.
    if (this.head > 1024 && this.head * 2 > this.queue.length) {
      this.queue.splice(0, this.head)
      this.head = 0
    }
    return node
  }

  isEmpty (): boolean {
    return this.head >= this.queue.length
  }

  containsState (hash: string): boolean {
    return this.states.has(hash)
  }
}

interface HeapEntry<Data extends PathData> {
  priority: number
  order: number
  node: PathNode<Data>
}

/**
 * A* frontier. Lowest priority out first; equal priorities leave in insertion order.
 * When no priority is supplied the node's g is used, which makes this uniform-cost search.
 */
export class PriorityFrontier<Data extends PathData> implements Frontier<Data> {
  private readonly heap = new Heap<HeapEntry<Data>>([], {
    comparator: (a, b) => a.priority - b.priority || a.order - b.order
  })

  private readonly states = new Set<string>()
  private counter = 0

  get size (): number {
    return this.states.size
  }

  insert (node: PathNode<Data>, priority?: number): void {
    if (this.states.has(node.data.hash)) return
    this.heap.add({ priority: priority ?? node.g, order: this.counter++, node })
    this.states.add(node.data.hash)
  }

  removeNext (): PathNode<Data> {
    const entry = this.heap.poll()
    if (entry === undefined) throw new EmptyFrontierError()
    this.states.delete(entry.node.data.hash)
    return entry.node
  }

  isEmpty (): boolean {
    return this.heap.isEmpty()
  }

  containsState (hash: string): boolean {
    return this.states.has(hash)
  }
}
