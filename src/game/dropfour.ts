/**
 * Drop Four Game
 *
 * The public surface used by renderers, input handlers and the game loop:
 * apply a move from outside, ask the engine for a move, take moves back,
 * and read the board and result. Every call works on one explicitly owned
 * Board; separate DropFourGame instances never share state.
 */

import { type DifficultyParams, difficultyToParams } from '../ai/difficulty'
import { type SearchEngine, createSearchEngine } from '../ai/engine'
import type { MoveChoice, RandomSource } from '../ai/search'
import {
  type MoveOutcome,
  GameOverError,
  IllegalMoveError,
  NoHistoryError,
} from '../lib/errors'
import { logError } from '../lib/errorUtils'
import { type GameConfigInput, parseGameConfig } from '../lib/schemas'
import { Board } from './board'
import { type Cell, type Player, type Winner, isColumnInRange } from './types'

export interface DropFourGameOptions extends GameConfigInput {
  /** Source of uniform numbers in [0, 1) for the difficulty layer */
  random?: RandomSource
  /** Engine to use instead of the one named by `engine`/`workers` */
  searchEngine?: SearchEngine
}

export class DropFourGame {
  private board: Board
  private params: DifficultyParams
  private preferredFirstPlayer: Player
  private readonly engine: SearchEngine
  private readonly random: RandomSource
  private searching = false
  // Bumped by newGame so a search started on an old board is discarded
  private generation = 0
  private lastChoice: MoveChoice | null = null

  constructor(options: DropFourGameOptions = {}) {
    const { random, searchEngine, ...configInput } = options
    const config = parseGameConfig(configInput)

    this.params = difficultyToParams(config.difficulty)
    this.preferredFirstPlayer = config.firstPlayer
    this.board = new Board(config.firstPlayer)
    this.engine = searchEngine ?? createSearchEngine(config)
    this.random = random ?? Math.random
  }

  /**
   * Starts a new game with the current first-player preference.
   */
  newGame(): void {
    this.board = new Board(this.preferredFirstPlayer)
    this.generation++
    this.lastChoice = null
  }

  reset(): void {
    this.newGame()
  }

  /**
   * Sets the level (0-9); other values fall back to the default level.
   */
  setDifficulty(level: number): void {
    this.params = difficultyToParams(level)
  }

  difficulty(): DifficultyParams {
    return { ...this.params }
  }

  /**
   * The human moves first. Takes effect now on an empty board, otherwise
   * from the next game.
   */
  setHumanFirst(): void {
    this.setFirstPlayer('human')
  }

  setComputerFirst(): void {
    this.setFirstPlayer('computer')
  }

  /**
   * Plays a column chosen outside the engine for the side to move.
   */
  applyHumanMove(column: number): MoveOutcome<IllegalMoveError> {
    if (this.searching) {
      return { success: false, error: new IllegalMoveError(column, 'search-in-progress') }
    }
    if (this.board.isGameOver()) {
      return { success: false, error: new IllegalMoveError(column, 'game-over') }
    }
    if (!isColumnInRange(column)) {
      return { success: false, error: new IllegalMoveError(column, 'out-of-range') }
    }
    if (this.board.isColumnFull(column)) {
      return { success: false, error: new IllegalMoveError(column, 'column-full') }
    }

    this.board.apply(column)
    return { success: true, column }
  }

  /**
   * Searches and plays a move for the side to move.
   * Rejects only if the engine itself fails.
   */
  async requestComputerMove(): Promise<MoveOutcome<GameOverError | IllegalMoveError>> {
    if (this.board.isGameOver()) {
      return { success: false, error: new GameOverError() }
    }
    if (this.searching) {
      return { success: false, error: new IllegalMoveError(null, 'search-in-progress') }
    }

    const board = this.board
    const generation = this.generation
    this.searching = true
    try {
      const choice = await this.engine.chooseMove(board, board.sideToMove, this.params, this.random)
      if (generation !== this.generation) {
        return { success: false, error: new IllegalMoveError(choice.column, 'stale-position') }
      }
      board.apply(choice.column)
      this.lastChoice = choice
      return { success: true, column: choice.column }
    } catch (error) {
      logError('requestComputerMove', error)
      throw error
    } finally {
      this.searching = false
    }
  }

  /**
   * Runs the search for the side to move without playing the result.
   * Returns null when the game is over.
   */
  async suggestMove(): Promise<MoveChoice | null> {
    if (this.board.isGameOver()) return null
    // Analyse a copy so moves made meanwhile cannot disturb the search
    const board = this.board.clone()
    return this.engine.chooseMove(board, board.sideToMove, this.params, this.random)
  }

  /**
   * Takes back the most recent move, whoever made it.
   */
  undoLastMove(): MoveOutcome<NoHistoryError | IllegalMoveError> {
    if (this.searching) {
      return { success: false, error: new IllegalMoveError(null, 'search-in-progress') }
    }
    if (this.board.moveCount === 0) {
      return { success: false, error: new NoHistoryError() }
    }
    const column = this.board.undo()
    this.lastChoice = null
    return { success: true, column }
  }

  /** 42 cells, row-major, top row first */
  boardSnapshot(): Cell[] {
    return this.board.snapshot()
  }

  isGameOver(): boolean {
    return this.board.isGameOver()
  }

  winner(): Winner {
    return this.board.winner()
  }

  moveCount(): number {
    return this.board.moveCount
  }

  lastMove(): number | null {
    return this.board.lastMove
  }

  moveHistory(): number[] {
    return [...this.board.history]
  }

  isComputerTurn(): boolean {
    return this.board.sideToMove === 'computer'
  }

  evaluation(): number {
    return this.board.evaluation
  }

  /** Result of the last search that produced a played move */
  lastSearch(): MoveChoice | null {
    return this.lastChoice
  }

  isSearching(): boolean {
    return this.searching
  }

  async dispose(): Promise<void> {
    await this.engine.dispose()
  }

  private setFirstPlayer(player: Player): void {
    this.preferredFirstPlayer = player
    if (this.board.moveCount === 0 && !this.searching) {
      this.board = new Board(player)
    }
  }
}
