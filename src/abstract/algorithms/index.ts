import { PathData, PathNode } from '../node'

/**
 * Walks parent links back to the root. The root's data is not included.
 */
export function reconstructPath<Data extends PathData> (node: PathNode<Data>): Data[] {
  const path: Data[] = []
  let current: PathNode<Data> | null = node
  while (current?.parent != null) {
    path.push(current.data)
    current = current.parent
  }
  return path.reverse()
}
