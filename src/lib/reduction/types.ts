/**
 * Shared types for in-page content reduction.
 */

/** Lifecycle of one page's reduction run */
export type ReductionState = 'idle' | 'running' | 'cancelling' | 'reduced'

/**
 * A maximal group of text nodes sharing the nearest non-inline ancestor.
 * Computed once per run, before the first mutation.
 */
export interface Segment {
  /** Position in the work list (document order) */
  index: number
  container: Element
  nodes: Text[]
  /** Node values joined with single spaces */
  text: string
  wordCount: number
}

export interface ReductionProgress {
  current: number
  total: number
  failed: number
  message: string
}

export interface ReductionStats {
  succeeded: number
  failed: number
  /** Words in the segments that were replaced */
  originalWords: number
  /** Words in the fragments that replaced them */
  reducedWords: number
}

export interface ReductionStatus extends ReductionStats {
  state: ReductionState
  isReduced: boolean
  processed: number
  total: number
}

/** How a run that was allowed to start ended */
export interface ReductionOutcome extends ReductionStats {
  status: 'reduced' | 'cancelled'
  total: number
}

/**
 * Request/response access to the external reduction capability.
 * Resolves with raw, untrusted HTML.
 */
export interface ReductionClient {
  reduce(text: string, level: number, customInstruction?: string | null): Promise<string>
}

export type HealthStatus =
  | { online: true; model?: string }
  | { online: false; error: string }
