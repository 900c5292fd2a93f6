import { REDUCTION } from '../config/constants'
import { ALLOWED_TAGS } from './sanitize'

/**
 * Default instruction sent when the user gives none. The tag list mirrors the
 * sanitizer's allow-list so the model does not spend tokens on markup that
 * would be stripped anyway.
 */
export function buildDefaultPrompt(level: number): string {
  const tags = ALLOWED_TAGS.map((tag) => `<${tag}>`).join(', ')
  return [
    `Reduce this text to approximately ${level}% of its original length.`,
    'Remove filler, redundancy, and verbose explanations while retaining all meaningful semantic content, key points, and factual information.',
    'Maintain the original tone and style.',
    `Output as clean HTML using only these tags: ${tags}.`,
    'Do not add attributes to any tag.',
    'Use <details><summary>Title</summary>content</details> for less important information.',
    'IMPORTANT: Output ONLY the HTML without any introduction, wrapper tags, or commentary.',
  ].join(' ')
}

/**
 * Replace every occurrence of the level placeholder with the numeric level.
 * Plain, case-sensitive text substitution; nothing else in the prompt is interpreted.
 */
export function applyLevelPlaceholder(prompt: string, level: number): string {
  return prompt.split(REDUCTION.LEVEL_PLACEHOLDER).join(String(level))
}

/**
 * Snap a raw slider or stored value to a valid reduction level.
 */
export function clampReductionLevel(value: number): number {
  if (!Number.isFinite(value)) return REDUCTION.DEFAULT_LEVEL
  const snapped = Math.round(value / REDUCTION.LEVEL_STEP) * REDUCTION.LEVEL_STEP
  return Math.min(REDUCTION.MAX_LEVEL, Math.max(REDUCTION.MIN_LEVEL, snapped))
}

/**
 * Custom prompt as sent to the page: trimmed, placeholder substituted, null when blank.
 */
export function resolveCustomPrompt(prompt: string, level: number): string | null {
  const trimmed = prompt.trim()
  return trimmed ? applyLevelPlaceholder(trimmed, level) : null
}
