/**
 * Engine-vs-engine matches
 *
 * Plays whole games between two difficulty levels on one board, the
 * computer side maximizing and the human side minimizing. Used to compare
 * levels and to exercise the engine end to end.
 */

import { Board } from '../game/board'
import type { Player, Winner } from '../game/types'
import { difficultyToParams } from './difficulty'
import { type RandomSource, chooseMove } from './search'

export interface MatchOptions {
  /** Level playing the computer (maximizing) side */
  computerLevel: number
  /** Level playing the human (minimizing) side */
  humanLevel: number
  firstPlayer?: Player
  random?: RandomSource
}

export interface MatchResult {
  winner: Winner
  moves: number[]
}

export function playMatch(options: MatchOptions): MatchResult {
  const random = options.random ?? Math.random
  const params = {
    computer: difficultyToParams(options.computerLevel),
    human: difficultyToParams(options.humanLevel),
  }
  const board = new Board(options.firstPlayer ?? 'human')

  while (!board.isGameOver()) {
    const side = board.sideToMove
    const choice = chooseMove(board, side, params[side], random)
    board.apply(choice.column)
  }

  return { winner: board.winner(), moves: [...board.history] }
}

export interface SeriesResult {
  games: number
  computerWins: number
  humanWins: number
  draws: number
}

/**
 * Plays `games` matches, alternating who moves first.
 */
export function playSeries(games: number, options: Omit<MatchOptions, 'firstPlayer'>): SeriesResult {
  const result: SeriesResult = { games, computerWins: 0, humanWins: 0, draws: 0 }

  for (let i = 0; i < games; i++) {
    const { winner } = playMatch({ ...options, firstPlayer: i % 2 === 0 ? 'human' : 'computer' })
    if (winner === 'computer') result.computerWins++
    else if (winner === 'human') result.humanWins++
    else result.draws++
  }

  return result
}
