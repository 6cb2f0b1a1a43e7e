import { z } from 'zod'
import { DEFAULT_DIFFICULTY, normalizeDifficulty } from '../ai/difficulty'
import { COLUMNS, CELL_COUNT } from '../game/types'

// Game configuration schemas
export const playerSchema = z.enum(['computer', 'human'])

export const engineTypeSchema = z.enum(['serial', 'parallel'])

export type EngineType = z.infer<typeof engineTypeSchema>

export const DEFAULT_WORKERS = 4
export const MAX_WORKERS = 16

export const gameConfigSchema = z.object({
  // Out-of-range levels (NaN included) fall back to the default instead of failing
  difficulty: z
    .union([z.number(), z.nan()])
    .default(DEFAULT_DIFFICULTY)
    .transform(normalizeDifficulty),
  firstPlayer: playerSchema.default('human'),
  engine: engineTypeSchema.default('serial'),
  workers: z
    .number()
    .int('Worker count must be an integer')
    .min(1, 'At least one worker is required')
    .max(MAX_WORKERS, `At most ${MAX_WORKERS} workers are allowed`)
    .default(DEFAULT_WORKERS),
})

export type GameConfigInput = z.input<typeof gameConfigSchema>
export type GameConfig = z.infer<typeof gameConfigSchema>

export function parseGameConfig(input: unknown = {}): GameConfig {
  return gameConfigSchema.parse(input)
}

// Search worker messages
const columnSchema = z.number().int().min(0).max(COLUMNS - 1)

export const searchTaskSchema = z.object({
  id: z.number().int().nonnegative(),
  moves: z.array(columnSchema).max(CELL_COUNT),
  firstPlayer: playerSchema,
  side: playerSchema,
  column: columnSchema,
  depth: z.number().int().min(1),
})

export type SearchTask = z.infer<typeof searchTaskSchema>

export const searchReplySchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('result'),
    id: z.number().int().nonnegative(),
    value: z.number().int(),
    nodesSearched: z.number().int().nonnegative(),
  }),
  z.object({
    type: z.literal('error'),
    id: z.number().int().nonnegative().nullable(),
    message: z.string(),
  }),
])

export type SearchReply = z.infer<typeof searchReplySchema>

// Helper to format validation errors
export function formatZodError(error: z.ZodError): { error: string; details: string } {
  const issue = error.errors[0]
  return {
    error: 'Validation error',
    details: issue ? `${issue.path.join('.') || 'input'}: ${issue.message}` : 'Invalid input',
  }
}
