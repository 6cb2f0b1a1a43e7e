import { describe, it, expect, vi, afterEach } from 'vitest'
import { DropFourGame } from './dropfour'
import { cellIndex } from './lines'
import type { SearchEngine } from '../ai/engine'
import { GameOverError, IllegalMoveError, NoHistoryError, type IllegalMoveReason, type MoveOutcome } from '../lib/errors'

const DRAW_SEQUENCE = [
  3, 3, 3, 3, 3, 3, 2, 2, 2, 2, 2, 2, 4, 4, 4, 4, 4, 4, 0, 1, 1,
  1, 1, 1, 1, 5, 5, 5, 5, 5, 5, 0, 0, 0, 0, 0, 6, 6, 6, 6, 6, 6,
]

function playAll(game: DropFourGame, columns: readonly number[]): void {
  for (const column of columns) {
    expect(game.applyHumanMove(column)).toEqual({ success: true, column })
  }
}

function expectIllegal(outcome: MoveOutcome, reason: IllegalMoveReason): void {
  expect(outcome.success).toBe(false)
  if (!outcome.success) {
    expect(outcome.error).toBeInstanceOf(IllegalMoveError)
    if (outcome.error instanceof IllegalMoveError) {
      expect(outcome.error.reason).toBe(reason)
    }
  }
}

const alwaysZero = () => 0

describe('DropFourGame', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('new game', () => {
    it('starts empty with the human to move at the default level', () => {
      const game = new DropFourGame()
      expect(game.moveCount()).toBe(0)
      expect(game.lastMove()).toBeNull()
      expect(game.isComputerTurn()).toBe(false)
      expect(game.isGameOver()).toBe(false)
      expect(game.winner()).toBeNull()
      expect(game.evaluation()).toBe(0)
      expect(game.difficulty().level).toBe(4)
      expect(game.boardSnapshot()).toHaveLength(42)
    })

    it('takes options', () => {
      const game = new DropFourGame({ difficulty: 7, firstPlayer: 'computer' })
      expect(game.difficulty().depth).toBe(11)
      expect(game.isComputerTurn()).toBe(true)
    })

    it('rejects an invalid worker count', () => {
      expect(() => new DropFourGame({ workers: 0 })).toThrow()
    })
  })

  describe('applyHumanMove', () => {
    it('drops a piece for the side to move', () => {
      const game = new DropFourGame()
      expect(game.applyHumanMove(2)).toEqual({ success: true, column: 2 })
      expect(game.boardSnapshot()[cellIndex(5, 2)]).toBe('human')
      expect(game.lastMove()).toBe(2)
      expect(game.isComputerTurn()).toBe(true)
    })

    it('rejects columns off the board', () => {
      const game = new DropFourGame()
      expectIllegal(game.applyHumanMove(7), 'out-of-range')
      expectIllegal(game.applyHumanMove(-1), 'out-of-range')
      expectIllegal(game.applyHumanMove(2.5), 'out-of-range')
      expect(game.moveCount()).toBe(0)
    })

    it('rejects a full column', () => {
      const game = new DropFourGame()
      playAll(game, [3, 3, 3, 3, 3, 3])
      const outcome = game.applyHumanMove(3)
      expectIllegal(outcome, 'column-full')
      if (!outcome.success) {
        expect(outcome.error.message).toBe('Column 3 is full')
      }
      expect(game.moveCount()).toBe(6)
    })

    it('completes a human three in a row', () => {
      const game = new DropFourGame()
      playAll(game, [0, 6, 1, 6, 2, 5])
      expect(game.isComputerTurn()).toBe(false)

      expect(game.applyHumanMove(3)).toEqual({ success: true, column: 3 })
      expect(game.winner()).toBe('human')
      expect(game.isGameOver()).toBe(true)
      expect(game.evaluation()).toBeLessThanOrEqual(-1000)
    })

    it('rejects moves after the game is over', () => {
      const game = new DropFourGame()
      playAll(game, [0, 6, 1, 6, 2, 5, 3])
      expectIllegal(game.applyHumanMove(4), 'game-over')
      expect(game.moveCount()).toBe(7)
    })
  })

  describe('requestComputerMove', () => {
    it('opens in the center and scores one piece per line through it', async () => {
      const game = new DropFourGame({ firstPlayer: 'computer', random: alwaysZero })
      const outcome = await game.requestComputerMove()

      expect(outcome).toEqual({ success: true, column: 3 })
      expect(game.boardSnapshot()[cellIndex(5, 3)]).toBe('computer')
      expect(game.evaluation()).toBe(7)
      expect(game.lastSearch()?.pick).toBe('best')
      expect(game.lastSearch()?.searchInfo.depth).toBe(5)
    })

    it('blocks an open three', async () => {
      const game = new DropFourGame({ random: alwaysZero })
      playAll(game, [0, 6, 1, 6, 2])
      expect(await game.requestComputerMove()).toEqual({ success: true, column: 3 })
      expect(game.isGameOver()).toBe(false)
    })

    it('plays the same column for the same position', async () => {
      const columns: number[] = []
      for (let i = 0; i < 3; i++) {
        const game = new DropFourGame({ random: alwaysZero })
        playAll(game, [3, 2, 4, 4, 1])
        const outcome = await game.requestComputerMove()
        expect(outcome.success).toBe(true)
        if (outcome.success) columns.push(outcome.column)
      }
      expect(new Set(columns).size).toBe(1)
    })

    it('returns GameOverError once the game is over', async () => {
      const game = new DropFourGame()
      playAll(game, [0, 6, 1, 6, 2, 5, 3])
      const outcome = await game.requestComputerMove()
      expect(outcome.success).toBe(false)
      if (!outcome.success) {
        expect(outcome.error).toBeInstanceOf(GameOverError)
      }
    })

    it('refuses a second request while searching', async () => {
      const game = new DropFourGame({ firstPlayer: 'computer', random: alwaysZero })
      const pending = game.requestComputerMove()

      expect(game.isSearching()).toBe(true)
      const second = game.requestComputerMove()
      expectIllegal(game.applyHumanMove(0), 'search-in-progress')
      expectIllegal(game.undoLastMove(), 'search-in-progress')
      expectIllegal(await second, 'search-in-progress')

      expect(await pending).toEqual({ success: true, column: 3 })
      expect(game.isSearching()).toBe(false)
      expect(game.moveCount()).toBe(1)
    })

    it('discards a move searched for a game that was restarted', async () => {
      const game = new DropFourGame({ firstPlayer: 'computer', random: alwaysZero })
      const pending = game.requestComputerMove()
      game.newGame()

      expectIllegal(await pending, 'stale-position')
      expect(game.moveCount()).toBe(0)
    })

    it('rethrows and logs engine failures', async () => {
      const failing: SearchEngine = {
        name: 'serial',
        description: 'always fails',
        chooseMove: () => Promise.reject(new Error('engine exploded')),
        dispose: () => Promise.resolve(),
      }
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
      const game = new DropFourGame({ searchEngine: failing })

      await expect(game.requestComputerMove()).rejects.toThrow('engine exploded')
      expect(errorSpy).toHaveBeenCalledWith('[requestComputerMove]', 'engine exploded', expect.any(Error))
      expect(game.isSearching()).toBe(false)
      expect(game.moveCount()).toBe(0)
    })
  })

  describe('suggestMove', () => {
    it('searches for the side to move without playing', async () => {
      const game = new DropFourGame({ random: alwaysZero })
      playAll(game, [0, 6, 1, 6, 2, 5])
      const suggestion = await game.suggestMove()
      expect(suggestion?.column).toBe(3)
      expect(suggestion?.side).toBe('human')
      expect(game.moveCount()).toBe(6)
    })

    it('returns null when the game is over', async () => {
      const game = new DropFourGame()
      playAll(game, [0, 6, 1, 6, 2, 5, 3])
      expect(await game.suggestMove()).toBeNull()
    })
  })

  describe('undoLastMove', () => {
    it('returns NoHistoryError on an empty board', () => {
      const outcome = new DropFourGame().undoLastMove()
      expect(outcome.success).toBe(false)
      if (!outcome.success) {
        expect(outcome.error).toBeInstanceOf(NoHistoryError)
      }
    })

    it('takes back the last move', () => {
      const game = new DropFourGame()
      playAll(game, [3, 4])
      expect(game.undoLastMove()).toEqual({ success: true, column: 4 })
      expect(game.moveCount()).toBe(1)
      expect(game.lastMove()).toBe(3)
      expect(game.moveHistory()).toEqual([3])
      expect(game.isComputerTurn()).toBe(true)
    })

    it('reopens a finished game', () => {
      const game = new DropFourGame()
      playAll(game, [0, 6, 1, 6, 2, 5, 3])
      game.undoLastMove()
      expect(game.isGameOver()).toBe(false)
      expect(game.winner()).toBeNull()
    })
  })

  describe('full board', () => {
    it('ends in a draw when no line is completed', async () => {
      const game = new DropFourGame()
      playAll(game, DRAW_SEQUENCE)

      expect(game.moveCount()).toBe(42)
      expect(game.isGameOver()).toBe(true)
      expect(game.winner()).toBeNull()
      expectIllegal(game.applyHumanMove(0), 'game-over')
      const outcome = await game.requestComputerMove()
      expect(outcome.success).toBe(false)
    })
  })

  describe('first player and difficulty', () => {
    it('switches the first player right away on an empty board', () => {
      const game = new DropFourGame()
      game.setComputerFirst()
      expect(game.isComputerTurn()).toBe(true)
      game.setHumanFirst()
      expect(game.isComputerTurn()).toBe(false)
    })

    it('keeps the current game and switches from the next one', () => {
      const game = new DropFourGame()
      game.applyHumanMove(3)
      game.setComputerFirst()
      expect(game.boardSnapshot()[cellIndex(5, 3)]).toBe('human')
      expect(game.isComputerTurn()).toBe(true)

      game.newGame()
      expect(game.moveCount()).toBe(0)
      expect(game.isComputerTurn()).toBe(true)

      game.setHumanFirst()
      game.reset()
      expect(game.isComputerTurn()).toBe(false)
    })

    it('changes the difficulty', () => {
      const game = new DropFourGame()
      game.setDifficulty(9)
      expect(game.difficulty()).toEqual({ level: 9, depth: 17, chanceBest: 1, chanceSecondBest: 0 })
    })

    it.each([Number.NaN, -3, 10, 4.5])('falls back to the default for a configured level of %s', (level) => {
      vi.spyOn(console, 'warn').mockImplementation(() => {})
      const game = new DropFourGame({ difficulty: level })
      expect(game.difficulty().level).toBe(4)
      expect(game.difficulty().depth).toBe(5)
    })

    it('falls back to the default for an invalid level', () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {})
      const game = new DropFourGame({ difficulty: 2 })
      game.setDifficulty(12)
      expect(game.difficulty().level).toBe(4)
    })
  })

  it('keeps games independent', () => {
    const first = new DropFourGame()
    const second = new DropFourGame()
    first.applyHumanMove(3)
    expect(second.moveCount()).toBe(0)
  })
})
