import { join } from 'path'
import { exploreSteps, loadMaze, renderMaze, solve } from '../src'

const grid = loadMaze(join(__dirname, 'mazes', 'maze2.txt'))

for (const strategy of ['uninformed', 'heuristic'] as const) {
  const result = solve(grid, strategy, { verbose: true })
  console.log(`${strategy}: ${result.status}, ${result.exploredCount} states explored`)
  console.log(renderMaze(grid, result, { showExplored: true }))
  console.log()
}

// replay exploration one cell at a time, the way an animated view would
const steps = exploreSteps(grid, 'heuristic')
let next = steps.next()
while (next.done !== true) {
  const { explored } = next.value
  if (explored !== null) console.log('explored', explored.row, explored.col)
  next = steps.next()
}
console.log('finished with', next.value.status)
