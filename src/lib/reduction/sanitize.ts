/**
 * HTML Sanitizer
 *
 * Model output is untrusted. It is parsed into an inert document, stripped of
 * every attribute, and reduced to a fixed tag allow-list before it may touch
 * the live page. Disallowed wrappers are unwrapped so their content survives
 * at the same position; executable and embedding elements are dropped whole.
 */

import { createLogger } from '../core/debug'

const log = createLogger('Sanitizer')

export const ALLOWED_TAGS = [
  'p',
  'h1', 'h2', 'h3', 'h4', 'h5', 'h6',
  'ul', 'ol', 'li',
  'blockquote', 'hr', 'br',
  'strong', 'em', 'b', 'i',
  'mark', 'del', 'ins', 'sub', 'sup',
  'code', 'pre',
  'table', 'thead', 'tbody', 'tr', 'th', 'td',
  'abbr',
  'details', 'summary',
] as const

export type AllowedTag = (typeof ALLOWED_TAGS)[number]

const ALLOWED = new Set<string>(ALLOWED_TAGS)

/** Removed together with their content */
const DROPPED = new Set([
  'script', 'style', 'noscript', 'template',
  'iframe', 'frame', 'frameset', 'object', 'embed', 'applet',
])

/** Each pass settles every element; a second pass only confirms nothing is left */
const MAX_PASSES = 4

export function isAllowedTag(tag: string): tag is AllowedTag {
  return ALLOWED.has(tag.toLowerCase())
}

function removeComments(root: Element): void {
  const walker = root.ownerDocument.createTreeWalker(root, NodeFilter.SHOW_COMMENT)
  const comments: Node[] = []
  while (walker.nextNode()) {
    comments.push(walker.currentNode)
  }
  comments.forEach((comment) => comment.parentNode?.removeChild(comment))
}

/** One sweep over a static snapshot; returns whether anything changed */
function sweep(root: Element): boolean {
  let changed = false

  for (const el of Array.from(root.querySelectorAll('*'))) {
    // Detached by an earlier removal in this sweep
    if (!root.contains(el)) continue

    const tag = el.localName.toLowerCase()

    if (DROPPED.has(tag)) {
      el.remove()
      changed = true
      continue
    }

    for (const name of el.getAttributeNames()) {
      el.removeAttribute(name)
      changed = true
    }

    if (!ALLOWED.has(tag)) {
      el.replaceWith(...Array.from(el.childNodes))
      changed = true
    }
  }

  return changed
}

/**
 * Reduce arbitrary HTML to the allow-listed, attribute-free subset.
 * Never throws; input without any allowed markup comes back as escaped text.
 *
 * @param doc - Document whose implementation creates the inert parsing document
 */
export function sanitizeHtml(html: string, doc: Document = document): string {
  // Parsing in a document without a browsing context: no script runs, no resource loads
  const inert = doc.implementation.createHTMLDocument('')
  const root = inert.createElement('div')
  root.innerHTML = html

  removeComments(root)

  let passes = 0
  while (sweep(root)) {
    passes++
    if (passes >= MAX_PASSES) {
      log.warn('Sanitizer did not settle, dropping markup')
      return escapeText(root.textContent ?? '', inert)
    }
  }

  return root.innerHTML
}

function escapeText(text: string, doc: Document): string {
  const holder = doc.createElement('div')
  holder.textContent = text
  return holder.innerHTML
}
