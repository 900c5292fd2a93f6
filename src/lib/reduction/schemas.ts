/**
 * Zod schemas for message payloads and server responses.
 * Everything that crosses a context boundary is parsed before use.
 */

import { z } from 'zod'
import { REDUCTION } from '../config/constants'
import type { ReductionOutcome, ReductionProgress, ReductionStatus } from './types'

export const ReductionLevelSchema = z
  .number()
  .int()
  .min(REDUCTION.MIN_LEVEL)
  .max(REDUCTION.MAX_LEVEL)

export const CustomPromptSchema = z.string().max(10000).nullable()

export const ReducePagePayloadSchema = z.object({
  reductionLevel: ReductionLevelSchema,
  customPrompt: CustomPromptSchema,
})

export const ReduceTextPayloadSchema = z.object({
  text: z.string().min(1).max(100000),
  reductionLevel: ReductionLevelSchema,
  customPrompt: CustomPromptSchema,
})

/** Messages the content script answers */
export const ContentMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('REDUCE_PAGE'), payload: ReducePagePayloadSchema }),
  z.object({ type: z.literal('CANCEL_REDUCTION') }),
  z.object({ type: z.literal('RESTORE_PAGE') }),
  z.object({ type: z.literal('GET_STATUS') }),
])

export type ContentMessage = z.infer<typeof ContentMessageSchema>

export const ReduceTextResultSchema = z.object({
  reducedText: z.string(),
})

/** POST /reduce answer */
export const ReduceResponseSchema = z.object({
  reduced_text: z.string(),
  original_length: z.number().optional(),
  reduced_length: z.number().optional(),
  reduction_percentage: z.number().optional(),
})

/** GET /health answer; any 2xx body is accepted, a JSON status is read when present */
export const HealthResponseSchema = z
  .object({
    status: z.string().optional(),
    model: z.string().optional(),
    error: z.string().optional(),
  })
  .passthrough()

const ReductionStateSchema = z.enum(['idle', 'running', 'cancelling', 'reduced'])

const ReductionStatsShape = {
  succeeded: z.number(),
  failed: z.number(),
  originalWords: z.number(),
  reducedWords: z.number(),
}

export const ReductionProgressSchema: z.ZodType<ReductionProgress> = z.object({
  current: z.number(),
  total: z.number(),
  failed: z.number(),
  message: z.string(),
})

export const ReductionStatusSchema: z.ZodType<ReductionStatus> = z.object({
  ...ReductionStatsShape,
  state: ReductionStateSchema,
  isReduced: z.boolean(),
  processed: z.number(),
  total: z.number(),
})

export const ReductionOutcomeSchema: z.ZodType<ReductionOutcome> = z.object({
  ...ReductionStatsShape,
  status: z.enum(['reduced', 'cancelled']),
  total: z.number(),
})
