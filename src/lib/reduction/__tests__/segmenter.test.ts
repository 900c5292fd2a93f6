import { describe, it, expect, beforeEach } from 'vitest'
import { buildSegments, collectTextNodes, countWords, findContainer } from '../segmenter'

const LONG = 'one two three four five six seven eight nine ten eleven twelve'

function mount(html: string): HTMLElement {
  const root = document.createElement('main')
  root.innerHTML = html
  document.body.appendChild(root)
  return root
}

describe('countWords', () => {
  it('counts whitespace-separated words', () => {
    expect(countWords('  alpha   beta\ngamma ')).toBe(3)
    expect(countWords('')).toBe(0)
    expect(countWords('   ')).toBe(0)
  })
})

describe('buildSegments', () => {
  beforeEach(() => {
    document.body.innerHTML = ''
  })

  it('groups text split by inline formatting into one segment', () => {
    const root = mount('<p>The <em>quick</em> brown fox jumps over <a href="#">the lazy</a> dog today again</p>')
    const segments = buildSegments(root)

    expect(segments).toHaveLength(1)
    expect(segments[0].container).toBe(root.querySelector('p'))
    expect(segments[0].nodes).toHaveLength(5)
    expect(segments[0].text).toBe('The quick brown fox jumps over the lazy dog today again')
    expect(segments[0].wordCount).toBe(11)
  })

  it('skips groups below the word threshold', () => {
    const root = mount(`<p>Too short to bother</p><p>${LONG}</p>`)
    const segments = buildSegments(root)

    expect(segments).toHaveLength(1)
    expect(segments[0].text).toBe(LONG)
    expect(segments[0].index).toBe(0)
  })

  it('honours a custom threshold', () => {
    const root = mount('<p>Too short to bother</p>')
    expect(buildSegments(root, { minWords: 4 })).toHaveLength(1)
    expect(buildSegments(root, { minWords: 5 })).toHaveLength(0)
  })

  it('never includes protected text', () => {
    const root = mount(`
      <pre>${LONG}</pre>
      <p><code>${LONG}</code></p>
      <script>${LONG}</script>
      <style>${LONG}</style>
      <textarea>${LONG}</textarea>
      <div data-distill="badge">${LONG}</div>
    `)
    expect(buildSegments(root)).toEqual([])
    expect(collectTextNodes(root)).toEqual([])
  })

  it('orders segments by their first text node', () => {
    const root = mount(`<div>First ${LONG}<p>Second ${LONG}</p>tail words</div>`)
    const segments = buildSegments(root)

    expect(segments.map((s) => s.text)).toEqual([
      `First ${LONG} tail words`,
      `Second ${LONG}`,
    ])
    expect(segments.map((s) => s.index)).toEqual([0, 1])
    expect(segments[0].container).toBe(root.querySelector('div'))
  })

  it('does not modify the document', () => {
    const root = mount(`<article><h2>Heading</h2><p>${LONG} <b>bold</b></p></article>`)
    const before = root.innerHTML
    buildSegments(root)
    expect(root.innerHTML).toBe(before)
  })

  it('uses the supplied inline test', () => {
    const root = mount(`<section><div>${LONG}</div></section>`)
    const segments = buildSegments(root, { isInline: (el) => el.localName === 'div' })
    expect(segments[0].container).toBe(root.querySelector('section'))
  })
})

describe('findContainer', () => {
  it('stops at the root', () => {
    const root = mount('<span>loose text</span>')
    const node = root.querySelector('span')?.firstChild
    expect(node).toBeInstanceOf(Text)
    if (!(node instanceof Text)) return
    expect(findContainer(node, root, () => true)).toBe(root)
  })
})
