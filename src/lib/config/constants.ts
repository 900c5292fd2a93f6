/**
 * Application Constants
 *
 * Centralized constants for reduction policy, server access, timeouts and
 * the markers the content script leaves in the page.
 */

/**
 * Reduction Policy
 */
export const REDUCTION = {
  MIN_LEVEL: 5,
  MAX_LEVEL: 80,
  DEFAULT_LEVEL: 50,
  LEVEL_STEP: 5,
  /** Segments with fewer words are not sent for reduction */
  MIN_SEGMENT_WORDS: 10,
  /** Replaced verbatim (case-sensitive, every occurrence) with the level in custom prompts */
  LEVEL_PLACEHOLDER: '{REDUCT_FACTOR}',
} as const

/**
 * Reduction Server
 */
export const SERVER = {
  DEFAULT_URL: 'http://localhost:8000',
  REDUCE_PATH: '/reduce',
  HEALTH_PATH: '/health',
} as const

/**
 * Timeout Values (milliseconds)
 */
export const TIMEOUTS = {
  REDUCE_REQUEST_MS: 60000,
  HEALTH_CHECK_MS: 3000,
  MESSAGE_MS: 5000,
  /** Content → background round trip, must outlast REDUCE_REQUEST_MS */
  REDUCE_MESSAGE_MS: 70000,
  /** Popup wait for a whole page run; progress keeps arriving meanwhile */
  PAGE_RUN_MS: 30 * 60 * 1000,
  STATUS_DISPLAY_MS: 3000,
} as const

/**
 * Debounce Values (milliseconds)
 */
export const DEBOUNCE = {
  CHROME_STORAGE_MS: 100,
} as const

/**
 * DOM markers left by the content script
 */
export const MARKERS = {
  /** Class of every inserted fragment */
  FRAGMENT_CLASS: 'distill-formatted',
  /** Present on inserted fragments and on every piece of extension UI in the page */
  ATTRIBUTE: 'data-distill',
  LOADING_ID: 'distill-loading',
  BADGE_ID: 'distill-indicator',
} as const

/**
 * Z-Index Layers
 */
export const ZINDEX = {
  OVERLAY_MAX: 2147483647,
} as const

/**
 * Storage Keys
 */
export const STORAGE_KEYS = {
  SETTINGS: 'settings-store',
} as const
