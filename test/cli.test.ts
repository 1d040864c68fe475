import { join } from 'path'
import { EXIT_NO_SOLUTION, EXIT_SOLVED, EXIT_USAGE, main } from '../src/cli'

const fixture = (name: string): string => join(__dirname, 'fixtures', name)

describe('maze-solve', () => {
  let log: jest.SpyInstance
  let error: jest.SpyInstance

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => {})
    error = jest.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    jest.restoreAllMocks()
  })

  it('prints the explored count and the solution', () => {
    // Act
    const code = main([fixture('open3x3.txt')], {})
    // Assert
    expect(code).toBe(EXIT_SOLVED)
    expect(log).toHaveBeenCalledWith('States Explored:', 9)
    expect(log).toHaveBeenCalledWith('Solution:', 'down, down, right, right')
    expect(log).toHaveBeenCalledWith('A  \n*  \n**B')
  })

  it('overlays explored cells with --explored', () => {
    const code = main([fixture('open3x3.txt'), '--strategy', 'astar', '--explored'], {})
    expect(code).toBe(EXIT_SOLVED)
    expect(log).toHaveBeenCalledWith('A..\n*..\n**B')
  })

  it('exits with 1 when there is no solution', () => {
    const code = main([fixture('enclosed.txt')], {})
    expect(code).toBe(EXIT_NO_SOLUTION)
    expect(log).toHaveBeenCalledWith('States Explored:', 8)
    expect(log).toHaveBeenCalledWith('No solution.')
  })

  it('stops early with --max', () => {
    const code = main([fixture('open3x3.txt'), '--max', '2'], {})
    expect(code).toBe(EXIT_NO_SOLUTION)
    expect(log).toHaveBeenCalledWith('States Explored:', 2)
    expect(log).toHaveBeenCalledWith('Stopped before reaching the goal.')
  })

  it('logs a search summary with --verbose', () => {
    main([fixture('open3x3.txt'), '--verbose'], {})
    const summary = log.mock.calls.find((call: unknown[]) => call[0] === 'success')
    expect(summary).toBeDefined()
    expect(summary?.slice(2)).toEqual(['cost=4', 'explored=9', 'generated=9', 'length=4'])
  })

  it.each<{ name: string, argv: string[] }>([
    { name: 'no arguments', argv: [] },
    { name: 'two files', argv: ['a.txt', 'b.txt'] },
    { name: 'an unknown option', argv: [fixture('open3x3.txt'), '--bogus'] },
    { name: 'a bad limit', argv: [fixture('open3x3.txt'), '--max', 'lots'] }
  ])('prints usage for $name', ({ argv }) => {
    expect(main(argv, {})).toBe(EXIT_USAGE)
    expect(error).toHaveBeenLastCalledWith('Usage: maze-solve <maze.txt> [--strategy bfs|astar] [--explored] [--max N] [--verbose]')
    expect(log).not.toHaveBeenCalled()
  })

  it('rejects an unknown strategy', () => {
    expect(main([fixture('open3x3.txt'), '--strategy', 'dfs'], {})).toBe(EXIT_USAGE)
    expect(error).toHaveBeenCalledWith("unknown strategy: dfs (use 'bfs' or 'astar')")
  })

  it('rejects a malformed maze', () => {
    expect(main([fixture('two-starts.txt')], {})).toBe(EXIT_USAGE)
    expect(error).toHaveBeenCalledWith('Malformed maze: maze must have exactly one start point')
  })

  it('reports a missing file', () => {
    expect(main([fixture('missing.txt')], {})).toBe(EXIT_USAGE)
    expect(error).toHaveBeenCalledTimes(1)
  })
})
