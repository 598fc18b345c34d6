import { describe, expect, it, vi } from 'vitest'
import type { HotkeyEvent, ShortcutConfig } from '../../shared/app-state'
import { FakeKeyboardHook, testKeycode } from '../testing/fakes'
import { KeyboardHookService } from './keyboard-hook-service'

const CONFIG: ShortcutConfig = {
  accelerator: 'MetaRight',
  cancelAccelerator: 'Escape',
  repeatAccelerator: 'Alt+V',
  description: 'test',
}

function setup(config: ShortcutConfig = CONFIG) {
  const hook = new FakeKeyboardHook()
  let clock = 0
  const service = new KeyboardHookService(config, hook, testKeycode, () => ++clock)
  const edges: HotkeyEvent[] = []
  const onCancel = vi.fn()
  const onRepeat = vi.fn()
  const started = service.start({ onHotkey: event => edges.push(event), onCancel, onRepeat })
  return { hook, service, edges, onCancel, onRepeat, started }
}

describe('KeyboardHookService', () => {
  it('turns key down and up into pressed and released edges', () => {
    const { hook, edges, started } = setup()
    expect(started).toBe(true)
    expect(hook.started).toBe(true)

    hook.emit('keydown', { keycode: 3676, metaKey: true })
    hook.emit('keyup', { keycode: 3676 })

    expect(edges).toEqual([
      { type: 'pressed', timestamp: 1 },
      { type: 'released', timestamp: 2 },
    ])
  })

  it('forwards only the first keydown of a held key', () => {
    const { hook, edges } = setup()

    hook.emit('keydown', { keycode: 3676, metaKey: true })
    hook.emit('keydown', { keycode: 3676, metaKey: true })
    hook.emit('keydown', { keycode: 3676, metaKey: true })

    expect(edges.map(edge => edge.type)).toEqual(['pressed'])
  })

  it('ignores a release without a matching press', () => {
    const { hook, edges } = setup()
    hook.emit('keyup', { keycode: 3676 })
    hook.emit('keydown', { keycode: 30 })
    hook.emit('keyup', { keycode: 30 })
    expect(edges).toEqual([])
  })

  it('routes the cancel and repeat shortcuts', () => {
    const { hook, edges, onCancel, onRepeat } = setup()

    hook.emit('keydown', { keycode: 1 })
    hook.emit('keydown', { keycode: 47, altKey: true })
    hook.emit('keydown', { keycode: 47 })

    expect(onCancel).toHaveBeenCalledTimes(1)
    expect(onRepeat).toHaveBeenCalledTimes(1)
    expect(edges).toEqual([])
  })

  it('refuses to start with an unknown accelerator', () => {
    const { hook, started } = setup({ accelerator: 'Hyper', description: 'test' })
    expect(started).toBe(false)
    expect(hook.started).toBe(false)
    expect(hook.listenerCount('keydown')).toBe(0)
  })

  it('removes its listeners when the hook fails to start', () => {
    const hook = new FakeKeyboardHook()
    hook.startError = new Error('accessibility permission denied')
    const service = new KeyboardHookService(CONFIG, hook, testKeycode)

    expect(service.start({ onHotkey: () => undefined })).toBe(false)
    expect(hook.listenerCount('keydown')).toBe(0)
    expect(hook.listenerCount('keyup')).toBe(0)
  })

  it('stops listening on destroy', () => {
    const { hook, service, edges } = setup()

    service.destroy()
    hook.emit('keydown', { keycode: 3676, metaKey: true })

    expect(hook.started).toBe(false)
    expect(hook.listenerCount('keyup')).toBe(0)
    expect(edges).toEqual([])
  })
})
