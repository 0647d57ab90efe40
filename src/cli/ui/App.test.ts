import { describe, it, expect } from 'vitest'
import type { Key } from 'ink'
import { computeLayout, toKeyEvent } from './App'

const key = (overrides: Partial<Key> = {}): Key => ({
  upArrow: false,
  downArrow: false,
  leftArrow: false,
  rightArrow: false,
  pageDown: false,
  pageUp: false,
  return: false,
  escape: false,
  ctrl: false,
  shift: false,
  tab: false,
  backspace: false,
  delete: false,
  meta: false,
  ...overrides,
})

describe('computeLayout', () => {
  it('gives the list about a third of the width', () => {
    expect(computeLayout(100, 30)).toEqual({ listWidth: 35, panelWidth: 62, panelHeight: 26 })
  })

  it('keeps the list within its bounds', () => {
    expect(computeLayout(40, 10).listWidth).toBe(24)
    expect(computeLayout(200, 10).listWidth).toBe(42)
  })

  it('never returns an empty panel', () => {
    expect(computeLayout(20, 2)).toEqual({ listWidth: 24, panelWidth: 1, panelHeight: 1 })
  })
})

describe('toKeyEvent', () => {
  it('maps Ctrl+C to interrupt', () => {
    expect(toKeyEvent('c', key({ ctrl: true }))).toEqual({ name: 'interrupt' })
  })

  it('maps named keys', () => {
    expect(toKeyEvent('', key({ tab: true }))).toEqual({ name: 'tab' })
    expect(toKeyEvent('\r', key({ return: true }))).toEqual({ name: 'enter' })
    expect(toKeyEvent('', key({ escape: true }))).toEqual({ name: 'escape' })
    expect(toKeyEvent('', key({ upArrow: true }))).toEqual({ name: 'up' })
    expect(toKeyEvent('', key({ downArrow: true }))).toEqual({ name: 'down' })
  })

  it('treats delete as backspace', () => {
    expect(toKeyEvent('', key({ delete: true }))).toEqual({ name: 'backspace' })
    expect(toKeyEvent('', key({ backspace: true }))).toEqual({ name: 'backspace' })
  })

  it('passes printable input through', () => {
    expect(toKeyEvent('Q', key({ shift: true }))).toEqual({ name: 'char', char: 'Q' })
    expect(toKeyEvent('é', key())).toEqual({ name: 'char', char: 'é' })
  })

  it('ignores other modified keys', () => {
    expect(toKeyEvent('x', key({ ctrl: true }))).toBeNull()
    expect(toKeyEvent('x', key({ meta: true }))).toBeNull()
    expect(toKeyEvent('', key({ leftArrow: true }))).toBeNull()
  })
})
