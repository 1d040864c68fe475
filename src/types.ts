export interface Cell {
  row: number
  col: number
}

export type Action = 'up' | 'down' | 'left' | 'right'

export type SearchStrategy = 'uninformed' | 'heuristic'

export type PathStatus = 'noPath' | 'partial' | 'success'

export type StepStatus = 'expanding' | PathStatus
