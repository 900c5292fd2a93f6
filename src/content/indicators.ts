/**
 * In-page indicators
 *
 * Loading overlay (progress + Cancel) while a run is active, and a small
 * "Reduced" badge while the page shows reduced content. Every element carries
 * the extension marker attribute so the segmenter never picks up its text.
 */

import { MARKERS, ZINDEX } from '../lib/config/constants'
import type { ReductionProgress } from '../lib/reduction/types'

const FONT_STACK = '"Inter", -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, sans-serif'

export class PageIndicators {
  private overlay: HTMLElement | null = null
  private messageEl: HTMLElement | null = null
  private barEl: HTMLElement | null = null
  private cancelBtn: HTMLButtonElement | null = null
  private badge: HTMLElement | null = null

  constructor(private readonly doc: Document = document) {}

  showLoading(onCancel: () => void): void {
    this.hideLoading()

    const overlay = this.doc.createElement('div')
    overlay.id = MARKERS.LOADING_ID
    overlay.setAttribute(MARKERS.ATTRIBUTE, 'loading')
    overlay.setAttribute('role', 'status')
    Object.assign(overlay.style, {
      position: 'fixed',
      top: '16px',
      right: '16px',
      width: '260px',
      zIndex: String(ZINDEX.OVERLAY_MAX),
      background: 'rgba(20, 20, 20, 0.90)',
      backdropFilter: 'blur(20px)',
      borderRadius: '12px',
      padding: '12px 14px',
      boxShadow: '0 8px 32px rgba(0, 0, 0, 0.3)',
      border: '1px solid rgba(255, 255, 255, 0.15)',
      color: 'rgba(255, 255, 255, 0.9)',
      fontFamily: FONT_STACK,
      fontSize: '13px',
      display: 'flex',
      flexDirection: 'column',
      gap: '8px',
    })

    const message = this.doc.createElement('div')
    message.textContent = 'Reducing content...'

    const track = this.doc.createElement('div')
    Object.assign(track.style, {
      height: '4px',
      borderRadius: '2px',
      background: 'rgba(255, 255, 255, 0.15)',
      overflow: 'hidden',
    })
    const bar = this.doc.createElement('div')
    Object.assign(bar.style, {
      height: '100%',
      width: '0%',
      background: 'rgba(255, 255, 255, 0.85)',
      transition: 'width 0.2s ease-out',
    })
    track.appendChild(bar)

    const cancel = this.doc.createElement('button')
    cancel.type = 'button'
    cancel.textContent = 'Cancel'
    Object.assign(cancel.style, {
      alignSelf: 'flex-end',
      border: '1px solid rgba(255, 255, 255, 0.25)',
      borderRadius: '6px',
      background: 'transparent',
      color: 'rgba(255, 255, 255, 0.85)',
      padding: '4px 10px',
      fontSize: '12px',
      cursor: 'pointer',
    })
    cancel.addEventListener('click', () => {
      cancel.disabled = true
      cancel.textContent = 'Cancelling...'
      onCancel()
    })

    overlay.append(message, track, cancel)
    this.doc.body.appendChild(overlay)

    this.overlay = overlay
    this.messageEl = message
    this.barEl = bar
    this.cancelBtn = cancel
  }

  updateProgress(progress: ReductionProgress): void {
    if (!this.messageEl || !this.barEl) return
    this.messageEl.textContent = progress.message
    const pct = progress.total > 0 ? Math.round((progress.current / progress.total) * 100) : 0
    this.barEl.style.width = `${pct}%`
  }

  /** Reflect a cancel that came from outside the overlay (popup) */
  markCancelling(): void {
    if (!this.cancelBtn) return
    this.cancelBtn.disabled = true
    this.cancelBtn.textContent = 'Cancelling...'
  }

  hideLoading(): void {
    this.overlay?.remove()
    this.overlay = null
    this.messageEl = null
    this.barEl = null
    this.cancelBtn = null
  }

  showBadge(): void {
    if (this.badge) return

    const badge = this.doc.createElement('div')
    badge.id = MARKERS.BADGE_ID
    badge.setAttribute(MARKERS.ATTRIBUTE, 'badge')
    badge.textContent = 'Reduced'
    Object.assign(badge.style, {
      position: 'fixed',
      bottom: '16px',
      right: '16px',
      zIndex: String(ZINDEX.OVERLAY_MAX),
      background: 'rgba(20, 20, 20, 0.85)',
      color: 'rgba(255, 255, 255, 0.9)',
      borderRadius: '999px',
      padding: '4px 10px',
      fontFamily: FONT_STACK,
      fontSize: '12px',
      pointerEvents: 'none',
    })
    this.doc.body.appendChild(badge)
    this.badge = badge
  }

  hideBadge(): void {
    this.badge?.remove()
    this.badge = null
  }
}
