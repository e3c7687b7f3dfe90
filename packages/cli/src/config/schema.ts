import { z } from 'zod'
import { ConfigurationError, ConfigurationErrorCode, DEFAULT_OPENROUTER_MODEL } from '@reserva/core'

export const DEFAULT_TEMPERATURE = 0.2
export const DEFAULT_MAX_OUTPUT_TOKENS = 1200
export const DEFAULT_OUTPUT_DIR = 'reservations'

export const envSchema = z.object({
  OPENROUTER_API_KEY: z
    .string({ required_error: 'OPENROUTER_API_KEY is not set' })
    .min(1, 'OPENROUTER_API_KEY is empty'),
  OPENROUTER_MODEL: z.string().min(1).default(DEFAULT_OPENROUTER_MODEL),
  OPENROUTER_TEMPERATURE: z.coerce.number().min(0).max(2).default(DEFAULT_TEMPERATURE),
  OPENROUTER_MAX_OUTPUT_TOKENS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_MAX_OUTPUT_TOKENS),
  RESERVA_OUTPUT_DIR: z.string().min(1).default(DEFAULT_OUTPUT_DIR),
})

export interface ChatSettings {
  apiKey: string
  model: string
  temperature: number
  maxOutputTokens: number
  outputDir: string
}

const desiredReservationSchema = z
  .object({
    date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'date must be YYYY-MM-DD').optional(),
    time: z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'time must be HH:MM').optional(),
    partySize: z.number().int().min(1).max(16).optional(),
    occasion: z.string().optional(),
    specialRequests: z.string().optional(),
  })
  .strict()

export const goalFileSchema = z
  .object({
    restaurantName: z.string().optional(),
    guestName: z.string().optional(),
    guestPhone: z.string().optional(),
    celebrationReason: z.string().optional(),
    favoriteDishes: z.array(z.string()).optional(),
    dietaryNotes: z.string().optional(),
    talkingPoints: z.array(z.string()).optional(),
    desiredReservation: desiredReservationSchema.optional(),
    fallbackSlots: z.array(z.string()).optional(),
  })
  .strict()

export type GoalFile = z.infer<typeof goalFileSchema>

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.')
      return path ? `  - ${path}: ${issue.message}` : `  - ${issue.message}`
    })
    .join('\n')
}

export function validateSettings(env: Record<string, string | undefined>): ChatSettings {
  const result = envSchema.safeParse(env)

  if (!result.success) {
    const missingKey = result.error.issues.some(
      (issue) => issue.path[0] === 'OPENROUTER_API_KEY'
    )
    throw new ConfigurationError(`Invalid environment:\n${formatIssues(result.error)}`, {
      code: missingKey ? ConfigurationErrorCode.MISSING_API_KEY : ConfigurationErrorCode.INVALID_CONFIG,
    })
  }

  const data = result.data
  return {
    apiKey: data.OPENROUTER_API_KEY,
    model: data.OPENROUTER_MODEL,
    temperature: data.OPENROUTER_TEMPERATURE,
    maxOutputTokens: data.OPENROUTER_MAX_OUTPUT_TOKENS,
    outputDir: data.RESERVA_OUTPUT_DIR,
  }
}

export function validateGoalFile(goal: unknown): GoalFile {
  const result = goalFileSchema.safeParse(goal ?? {})

  if (!result.success) {
    throw new ConfigurationError(`Invalid goal file:\n${formatIssues(result.error)}`, {
      code: ConfigurationErrorCode.INVALID_CONFIG,
    })
  }

  return result.data
}
