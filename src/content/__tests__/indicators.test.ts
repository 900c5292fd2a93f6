import { describe, it, expect, beforeEach, vi } from 'vitest'
import { PageIndicators } from '../indicators'
import { buildSegments } from '../../lib/reduction/segmenter'

describe('PageIndicators', () => {
  beforeEach(() => {
    document.body.innerHTML = ''
  })

  it('shows progress and forwards Cancel once', () => {
    const indicators = new PageIndicators(document)
    const onCancel = vi.fn()
    indicators.showLoading(onCancel)

    indicators.updateProgress({ current: 1, total: 4, failed: 0, message: 'Processing text blocks... (1/4)' })

    const overlay = document.getElementById('distill-loading')
    expect(overlay?.getAttribute('data-distill')).toBe('loading')
    expect(overlay?.textContent).toContain('Processing text blocks... (1/4)')

    const button = overlay?.querySelector('button')
    button?.click()
    button?.click()
    expect(onCancel).toHaveBeenCalledTimes(1)
    expect(button?.textContent).toBe('Cancelling...')

    indicators.hideLoading()
    expect(document.getElementById('distill-loading')).toBeNull()
  })

  it('shows a single badge until hidden', () => {
    const indicators = new PageIndicators(document)
    indicators.showBadge()
    indicators.showBadge()
    expect(document.querySelectorAll('#distill-indicator')).toHaveLength(1)

    indicators.hideBadge()
    expect(document.getElementById('distill-indicator')).toBeNull()
  })

  it('is never picked up as page text', () => {
    const indicators = new PageIndicators(document)
    indicators.showLoading(() => {})
    indicators.updateProgress({ current: 0, total: 12, failed: 0, message: 'Processing 12 text blocks with quite a few words in this message' })
    indicators.showBadge()

    expect(buildSegments(document.body, { minWords: 1 })).toEqual([])
  })
})
