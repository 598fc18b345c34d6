import { describe, expect, it } from 'vitest'
import { testKeycode } from '../testing/fakes'
import { matchesShortcut, parseAccelerator, resolveKeycode, type KeyEventLike } from './accelerator'

function keyEvent(keycode: number, modifiers: Partial<KeyEventLike> = {}): KeyEventLike {
  return { altKey: false, ctrlKey: false, metaKey: false, shiftKey: false, keycode, ...modifiers }
}

describe('resolveKeycode', () => {
  it('accepts code-style and legacy key names', () => {
    expect(resolveKeycode('MetaRight', testKeycode)).toBe(3676)
    expect(resolveKeycode('Esc', testKeycode)).toBe(1)
    expect(resolveKeycode('KeyA', testKeycode)).toBe(30)
  })

  it('returns undefined for unknown names', () => {
    expect(resolveKeycode('Hyper', testKeycode)).toBeUndefined()
  })
})

describe('parseAccelerator', () => {
  it('parses a single modifier key used as the hotkey', () => {
    expect(parseAccelerator('MetaRight', testKeycode)).toEqual({
      meta: false,
      ctrl: false,
      alt: false,
      shift: false,
      key: 'metaright',
      keycode: 3676,
    })
  })

  it('parses modifier combinations', () => {
    expect(parseAccelerator('Command+Shift+Space', testKeycode)).toEqual({
      meta: true,
      ctrl: false,
      alt: false,
      shift: true,
      key: 'space',
      keycode: 57,
    })
  })

  it('maps CmdOrCtrl by platform', () => {
    expect(parseAccelerator('CmdOrCtrl+V', testKeycode, 'darwin')).toMatchObject({ meta: true, ctrl: false })
    expect(parseAccelerator('CmdOrCtrl+V', testKeycode, 'linux')).toMatchObject({ meta: false, ctrl: true })
  })

  it('leaves the keycode empty for an unknown key', () => {
    expect(parseAccelerator('Ctrl+Hyper', testKeycode)).toMatchObject({ ctrl: true, key: 'hyper', keycode: null })
  })
})

describe('matchesShortcut', () => {
  it('ignores the modifier flag of a modifier hotkey', () => {
    const shortcut = parseAccelerator('MetaRight', testKeycode)
    expect(matchesShortcut(shortcut, keyEvent(3676, { metaKey: true }))).toBe(true)
    expect(matchesShortcut(shortcut, keyEvent(3675, { metaKey: true }))).toBe(false)
  })

  it('requires the exact modifier state', () => {
    const shortcut = parseAccelerator('Command+Shift+Space', testKeycode)
    expect(matchesShortcut(shortcut, keyEvent(57, { metaKey: true, shiftKey: true }))).toBe(true)
    expect(matchesShortcut(shortcut, keyEvent(57, { metaKey: true }))).toBe(false)
    expect(matchesShortcut(shortcut, keyEvent(57, { metaKey: true, shiftKey: true, altKey: true }))).toBe(false)
  })

  it('never matches an unresolved shortcut', () => {
    expect(matchesShortcut(parseAccelerator('Hyper', testKeycode), keyEvent(0))).toBe(false)
  })
})
