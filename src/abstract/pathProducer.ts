import { SearchStep } from '.'
import { PathData } from './node'

export interface PathProducer<Data extends PathData = PathData> {
  advance: () => SearchStep<Data>
}
