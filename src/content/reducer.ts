/**
 * Page Reducer
 *
 * Owns all reduction state for one page: the run state, the cancel flag and
 * the original text of every node it touched. A run reads the page once
 * (buildSegments), then only mutates through the captured segment references,
 * one segment at a time, in document order.
 *
 *   idle → running → reduced → (restore) → idle
 *             ↓ cancel
 *        cancelling → (restore) → idle
 */

import { createNanoEvents } from 'nanoevents'
import { MARKERS } from '../lib/config/constants'
import { createLogger } from '../lib/core/debug'
import { InvalidStateError, SegmentReductionError, getErrorMessage } from '../lib/core/errors'
import { sanitizeHtml } from '../lib/reduction/sanitize'
import { buildSegments, countWords, type SegmenterOptions } from '../lib/reduction/segmenter'
import type {
  ReductionClient,
  ReductionOutcome,
  ReductionProgress,
  ReductionState,
  ReductionStats,
  ReductionStatus,
  Segment,
} from '../lib/reduction/types'

const log = createLogger('PageReducer')

type PageReducerEvents = {
  progress: (progress: ReductionProgress) => void
  state: (state: ReductionState) => void
  segmentError: (error: SegmentReductionError) => void
}

export interface PageReducerOptions {
  root: Element
  client: ReductionClient
  segmenter?: SegmenterOptions
  sanitize?: (html: string, doc: Document) => string
}

function emptyStats(): ReductionStats {
  return { succeeded: 0, failed: 0, originalWords: 0, reducedWords: 0 }
}

export class PageReducer {
  private readonly root: Element
  private readonly client: ReductionClient
  private readonly segmenterOptions: SegmenterOptions
  private readonly sanitize: (html: string, doc: Document) => string
  private readonly events = createNanoEvents<PageReducerEvents>()

  private state: ReductionState = 'idle'
  private cancelRequested = false
  private originals = new Map<Text, string>()
  private processed = 0
  private total = 0
  private stats: ReductionStats = emptyStats()

  constructor(options: PageReducerOptions) {
    this.root = options.root
    this.client = options.client
    this.segmenterOptions = options.segmenter ?? {}
    this.sanitize = options.sanitize ?? sanitizeHtml
  }

  on<E extends keyof PageReducerEvents>(event: E, cb: PageReducerEvents[E]) {
    return this.events.on(event, cb)
  }

  getStatus(): ReductionStatus {
    return {
      state: this.state,
      isReduced: this.state === 'reduced',
      processed: this.processed,
      total: this.total,
      ...this.stats,
    }
  }

  /**
   * Number of text nodes whose original content is held for restoration
   */
  get capturedNodeCount(): number {
    return this.originals.size
  }

  /**
   * Reduce every segment under root. Resolves when the run ends, either
   * reduced or cancelled (and already restored).
   *
   * @throws InvalidStateError unless idle; nothing is changed in that case
   */
  async start(level: number, customInstruction: string | null = null): Promise<ReductionOutcome> {
    if (this.state !== 'idle') {
      throw new InvalidStateError('start a reduction', this.state, this.state === 'reduced'
        ? 'Page is already reduced, restore it first'
        : 'A reduction is already running on this page')
    }

    // read phase; a throw here leaves the reducer idle
    const segments = buildSegments(this.root, this.segmenterOptions)

    this.cancelRequested = false
    this.originals.clear()
    this.processed = 0
    this.stats = emptyStats()
    this.setState('running')
    const finished = log.time('Run')
    this.total = segments.length
    log.log(`Run started: ${segments.length} segments at ${level}%`)
    this.report(`Processing ${segments.length} text blocks...`)

    for (const segment of segments) {
      if (this.cancelRequested) {
        log.log(`Cancelled after ${this.processed} of ${this.total} segments`)
        break
      }

      await this.reduceSegment(segment, level, customInstruction)
      this.processed++
      this.report(`Processing text blocks... (${this.processed}/${this.total})`)
    }

    const summary = { ...this.stats, total: this.total }

    finished()

    if (this.cancelRequested) {
      this.revert()
      this.setState('idle')
      return { status: 'cancelled', ...summary }
    }

    this.setState('reduced')
    log.log('Run finished:', summary)
    return { status: 'reduced', ...summary }
  }

  /**
   * Ask the running loop to stop at the next segment boundary. An in-flight
   * request is allowed to finish; the page is restored once the loop stops.
   *
   * @throws InvalidStateError when no run is active
   */
  cancel(): ReductionStatus {
    if (this.state === 'cancelling') return this.getStatus()
    if (this.state !== 'running') {
      throw new InvalidStateError('cancel', this.state, 'No reduction is running on this page')
    }
    this.cancelRequested = true
    this.setState('cancelling')
    return this.getStatus()
  }

  /**
   * Put back the original text. A no-op when idle. During a run this is a
   * cancel request: the loop stops at the next boundary and restores.
   */
  restore(): ReductionStatus {
    switch (this.state) {
      case 'idle':
        log.log('Nothing to restore')
        return this.getStatus()
      case 'running':
        return this.cancel()
      case 'cancelling':
        return this.getStatus()
      case 'reduced':
        this.revert()
        this.setState('idle')
        return this.getStatus()
    }
  }

  private async reduceSegment(
    segment: Segment,
    level: number,
    customInstruction: string | null
  ): Promise<void> {
    // Captured before any mutation; never overwritten within a run
    for (const node of segment.nodes) {
      if (!this.originals.has(node)) {
        this.originals.set(node, node.data)
      }
    }

    try {
      const html = await this.client.reduce(segment.text, level, customInstruction)
      const doc = this.root.ownerDocument
      const fragment = this.createFragment(this.sanitize(html, doc), doc)
      const reducedText = (fragment.textContent ?? '').trim()

      if (!reducedText) {
        throw new SegmentReductionError(segment.index, 'Reduction returned no usable content')
      }
      if (!segment.container.isConnected) {
        throw new SegmentReductionError(segment.index, 'Segment left the document during reduction')
      }

      for (const node of segment.nodes) {
        node.data = ''
      }
      segment.container.appendChild(fragment)

      this.stats.succeeded++
      this.stats.originalWords += segment.wordCount
      this.stats.reducedWords += countWords(reducedText)
    } catch (err) {
      const error = err instanceof SegmentReductionError
        ? err
        : new SegmentReductionError(segment.index, getErrorMessage(err, 'Reduction failed'), { cause: err })
      this.stats.failed++
      log.error(`Segment ${segment.index + 1}/${this.total} left unchanged:`, error.message)
      this.emitSafely('segmentError', error)
    }
  }

  private createFragment(html: string, doc: Document): HTMLElement {
    const wrapper = doc.createElement('div')
    wrapper.className = MARKERS.FRAGMENT_CLASS
    wrapper.setAttribute(MARKERS.ATTRIBUTE, 'fragment')
    wrapper.innerHTML = html
    return wrapper
  }

  /** Remove every inserted fragment, then write back every captured node still in the document */
  private revert(): void {
    const doc = this.root.ownerDocument
    doc.querySelectorAll(`.${MARKERS.FRAGMENT_CLASS}[${MARKERS.ATTRIBUTE}]`).forEach((fragment) => {
      fragment.remove()
    })

    let restored = 0
    this.originals.forEach((text, node) => {
      if (node.isConnected) {
        node.data = text
        restored++
      }
    })
    log.log(`Restored ${restored} of ${this.originals.size} text nodes`)
    this.originals.clear()
  }

  private setState(state: ReductionState): void {
    this.state = state
    this.emitSafely('state', state)
  }

  private report(message: string): void {
    this.emitSafely('progress', {
      current: this.processed,
      total: this.total,
      failed: this.stats.failed,
      message,
    })
  }

  private emitSafely<E extends keyof PageReducerEvents>(
    event: E,
    ...args: Parameters<PageReducerEvents[E]>
  ): void {
    try {
      this.events.emit(event, ...args)
    } catch (err) {
      log.error(`'${event}' listener failed:`, err)
    }
  }
}
