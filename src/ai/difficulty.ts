/**
 * Difficulty Model
 *
 * Maps a level 0-9 to a search depth and the chances of playing the best
 * move, the second best move, or (with whatever probability is left) a
 * uniformly random legal move.
 *
 *   level | depth           | chanceBest     | chanceSecondBest
 *   0-4   | level + 1       | 0.1*(level+1)  | same as chanceBest
 *   5-7   | 5 + 2*(level-4) | 0.1*(level+1)  | 1 - chanceBest
 *   8-9   | 11 + 3*(level-7)| 0.1*(level+1)  | 1 - chanceBest
 *
 * Low levels therefore play at random most of the time, while high levels
 * search deep and always pick the best or second best move.
 */

export const MIN_DIFFICULTY = 0
export const MAX_DIFFICULTY = 9
export const DEFAULT_DIFFICULTY = 4

/**
 * Parameters the root search needs.
 */
export interface SearchParams {
  /** Plies searched below the current position, including the root move */
  depth: number
  /** Probability of playing the best move */
  chanceBest: number
  /** Probability of playing the second best move */
  chanceSecondBest: number
}

export interface DifficultyParams extends SearchParams {
  level: number
}

export function isValidDifficulty(level: unknown): level is number {
  return (
    typeof level === 'number' &&
    Number.isInteger(level) &&
    level >= MIN_DIFFICULTY &&
    level <= MAX_DIFFICULTY
  )
}

/**
 * Returns the level unchanged when valid, otherwise the default level.
 */
export function normalizeDifficulty(level: number): number {
  if (isValidDifficulty(level)) return level
  console.warn(`Difficulty ${level} is outside ${MIN_DIFFICULTY}-${MAX_DIFFICULTY}, using ${DEFAULT_DIFFICULTY}`)
  return DEFAULT_DIFFICULTY
}

export function difficultyToParams(level: number): DifficultyParams {
  const normalized = normalizeDifficulty(level)
  const chanceBest = 0.1 * (normalized + 1)

  if (normalized <= 4) {
    return { level: normalized, depth: normalized + 1, chanceBest, chanceSecondBest: chanceBest }
  }
  if (normalized <= 7) {
    return {
      level: normalized,
      depth: 5 + 2 * (normalized - 4),
      chanceBest,
      chanceSecondBest: 1 - chanceBest,
    }
  }
  return {
    level: normalized,
    depth: 11 + 3 * (normalized - 7),
    chanceBest,
    chanceSecondBest: 1 - chanceBest,
  }
}

/** Parameters for every level, indexed by level */
export const DIFFICULTY_LEVELS: readonly DifficultyParams[] = Array.from(
  { length: MAX_DIFFICULTY - MIN_DIFFICULTY + 1 },
  (_, i) => difficultyToParams(MIN_DIFFICULTY + i)
)
