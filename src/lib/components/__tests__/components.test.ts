import { describe, it, expect, vi, beforeAll, afterEach } from 'vitest'
import { act, createElement, type ReactElement } from 'react'
import { createRoot, type Root } from 'react-dom/client'
import { Button, Input } from '../index'

let root: Root | null = null

function render(element: ReactElement): HTMLElement {
  const container = document.createElement('div')
  document.body.appendChild(container)
  act(() => {
    root = createRoot(container)
    root.render(element)
  })
  return container
}

describe('popup primitives', () => {
  beforeAll(() => {
    Reflect.set(globalThis, 'IS_REACT_ACT_ENVIRONMENT', true)
  })

  afterEach(() => {
    act(() => root?.unmount())
    root = null
    document.body.innerHTML = ''
  })

  it('commits the input value on blur and on Enter only', () => {
    const onCommit = vi.fn<(value: string) => void>()
    const container = render(createElement(Input, { defaultValue: 'http://test.local', onCommit }))
    const input = container.querySelector('input')
    if (!input) throw new Error('no input')

    act(() => {
      input.dispatchEvent(new KeyboardEvent('keydown', { key: 'a', bubbles: true }))
      input.dispatchEvent(new KeyboardEvent('keydown', { key: 'Enter', bubbles: true }))
      input.dispatchEvent(new FocusEvent('focusout', { bubbles: true }))
    })

    expect(onCommit.mock.calls).toEqual([['http://test.local'], ['http://test.local']])
  })

  it('renders a non-submitting button per variant', () => {
    const container = render(createElement(Button, { variant: 'icon', title: 'Recheck server' }, 'R'))
    const button = container.querySelector('button')

    expect(button?.getAttribute('type')).toBe('button')
    expect(button?.className).toContain('glass-btn-ghost')
    expect(button?.className).toContain('w-10')
  })
})
