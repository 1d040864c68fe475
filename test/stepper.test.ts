import { parseMaze } from '../src/maze/parser'
import { solve } from '../src/maze/solver'
import { MazeStep, SearchStepper, exploreSteps } from '../src/maze/stepper'

describe('SearchStepper', () => {
  it('expands one cell per call and reports the result on the last one', () => {
    // Arrange
    const stepper = new SearchStepper(parseMaze('AB'), 'uninformed')
    // Act
    const first = stepper.next()
    const second = stepper.next()
    // Assert
    expect(first).toEqual({ status: 'expanding', explored: { row: 0, col: 0 }, result: null })
    expect(second.status).toBe('success')
    expect(second.explored).toEqual({ row: 0, col: 1 })
    expect(second.result?.solution?.actions).toEqual(['right'])
    expect(stepper.done).toBe(true)
  })

  it('keeps returning the final result once finished', () => {
    // Arrange
    const stepper = new SearchStepper(parseMaze('AB'), 'heuristic')
    stepper.next()
    const last = stepper.next()
    // Act
    const after = stepper.next()
    // Assert
    expect(after.status).toBe('success')
    expect(after.explored).toBeNull()
    expect(after.result).toBe(last.result)
  })

  it('exposes the raw search step through advance', () => {
    const stepper = new SearchStepper(parseMaze('A B'), 'uninformed')
    const step = stepper.advance()
    expect(step.status).toBe('expanding')
    expect(step.expanded?.hash).toBe('0,0')
    expect(step.expanded?.action).toBeNull()
    expect(step.result).toBeNull()
  })

  it('ends without exploring anything when the frontier runs dry', () => {
    // Arrange
    const stepper = new SearchStepper(parseMaze('A#B'), 'uninformed')
    // Act
    const first = stepper.next()
    const last = stepper.next()
    // Assert
    expect(first.explored).toEqual({ row: 0, col: 0 })
    expect(last).toEqual({
      status: 'noPath',
      explored: null,
      result: expect.objectContaining({ status: 'noPath', solution: null, exploredCount: 1 })
    })
  })
})

describe('exploreSteps', () => {
  it('yields cells in the same order solve reports them', () => {
    // Arrange
    const grid = parseMaze(['A  ', '   ', '  B'].join('\n'))
    const steps: MazeStep[] = []
    // Act
    const generator = exploreSteps(grid, 'heuristic')
    let next = generator.next()
    while (next.done !== true) {
      steps.push(next.value)
      next = generator.next()
    }
    // Assert
    expect(steps.map((step) => step.explored)).toEqual(solve(grid, 'heuristic').exploredOrder)
    expect(next.value.status).toBe('success')
    expect(next.value.solution?.actions).toEqual(['down', 'down', 'right', 'right'])
  })
})
