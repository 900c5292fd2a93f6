/**
 * Extension Type Definitions - Central Export
 *
 * Import all types from this single file for consistency.
 */

// Runtime message types
export type {
  RuntimeMessage,
  ReducePageMessage,
  CancelReductionMessage,
  RestorePageMessage,
  GetStatusMessage,
  ReduceTextMessage,
  ReduceProgressMessage,
} from './runtime'

// Reduction types
export type {
  ReductionState,
  Segment,
  ReductionProgress,
  ReductionStats,
  ReductionStatus,
  ReductionOutcome,
  ReductionClient,
  HealthStatus,
} from '../lib/reduction/types'
