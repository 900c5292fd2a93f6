/**
 * DOM Segmenter
 *
 * Read-only pass over a live DOM that groups eligible text nodes by their
 * nearest non-inline ancestor, so text split across formatting tags
 * (<em>, <a>, <strong>) is reduced as one unit.
 */

import { MARKERS, REDUCTION } from '../config/constants'
import type { Segment } from './types'

/** Elements whose text is never reduced */
export const PROTECTED_TAGS = new Set([
  'script', 'style', 'noscript', 'template', 'textarea',
  'code', 'pre', 'kbd', 'samp',
])

/** Used only when the environment reports no computed display */
const INLINE_TAGS = new Set([
  'a', 'abbr', 'b', 'bdi', 'bdo', 'cite', 'data', 'dfn', 'em', 'font', 'i',
  'label', 'mark', 'q', 's', 'small', 'span', 'strong', 'sub', 'sup',
  'time', 'u', 'var', 'del', 'ins',
])

export interface SegmenterOptions {
  /** Groups below this word count are skipped */
  minWords?: number
  isInline?: (element: Element) => boolean
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length
}

export function isInlineElement(element: Element): boolean {
  const view = element.ownerDocument.defaultView
  const display = view ? view.getComputedStyle(element).display : ''
  if (display) return display === 'inline'
  return INLINE_TAGS.has(element.localName.toLowerCase())
}

export function isProtectedElement(element: Element): boolean {
  return PROTECTED_TAGS.has(element.localName.toLowerCase()) || element.hasAttribute(MARKERS.ATTRIBUTE)
}

function isTextNode(node: Node): node is Text {
  return node.nodeType === Node.TEXT_NODE
}

function hasProtectedAncestor(node: Text, root: Element): boolean {
  let ancestor = node.parentElement
  while (ancestor) {
    if (isProtectedElement(ancestor)) return true
    if (ancestor === root) return false
    ancestor = ancestor.parentElement
  }
  return false
}

/**
 * Eligible text nodes under root, in document order.
 */
export function collectTextNodes(root: Element): Text[] {
  const walker = root.ownerDocument.createTreeWalker(root, NodeFilter.SHOW_TEXT, {
    acceptNode(node) {
      if (!node.nodeValue?.trim()) return NodeFilter.FILTER_REJECT
      if (!node.parentElement) return NodeFilter.FILTER_REJECT
      return NodeFilter.FILTER_ACCEPT
    },
  })

  const nodes: Text[] = []
  while (walker.nextNode()) {
    const node = walker.currentNode
    if (isTextNode(node) && !hasProtectedAncestor(node, root)) {
      nodes.push(node)
    }
  }
  return nodes
}

/**
 * Nearest ancestor that is not displayed inline, bounded by root.
 */
export function findContainer(
  node: Text,
  root: Element,
  isInline: (element: Element) => boolean = isInlineElement
): Element | null {
  let container = node.parentElement
  while (container && container !== root && isInline(container)) {
    container = container.parentElement
  }
  return container
}

/**
 * Build the ordered work list for one run. Groups keep the order of their
 * first text node; nodes keep document order inside a group.
 */
export function buildSegments(root: Element, options: SegmenterOptions = {}): Segment[] {
  const minWords = options.minWords ?? REDUCTION.MIN_SEGMENT_WORDS
  const isInline = options.isInline ?? isInlineElement

  const groups = new Map<Element, Text[]>()
  for (const node of collectTextNodes(root)) {
    const container = findContainer(node, root, isInline)
    if (!container) continue
    const group = groups.get(container)
    if (group) {
      group.push(node)
    } else {
      groups.set(container, [node])
    }
  }

  const segments: Segment[] = []
  for (const [container, nodes] of groups) {
    const text = nodes
      .map((node) => node.data)
      .join(' ')
      .replace(/\s+/g, ' ')
      .trim()
    const wordCount = countWords(text)
    if (wordCount < minWords) continue
    segments.push({ index: segments.length, container, nodes, text, wordCount })
  }
  return segments
}
