import { uIOhook, UiohookKey } from 'uiohook-napi'
import type { KeycodeLookup } from './accelerator'
import type { KeyboardHook } from './keyboard-hook-service'

const KEYCODES = new Map<string, number>(Object.entries(UiohookKey))

export const uiohookKeycode: KeycodeLookup = name => KEYCODES.get(name)

/**
 * uiohook-napi 全局键盘钩子
 */
export function createUiohookKeyboard(): KeyboardHook {
  return {
    on(event, listener) {
      if (event === 'keydown') {
        uIOhook.on('keydown', listener)
      } else {
        uIOhook.on('keyup', listener)
      }
    },
    off(event, listener) {
      if (event === 'keydown') {
        uIOhook.off('keydown', listener)
      } else {
        uIOhook.off('keyup', listener)
      }
    },
    start() {
      uIOhook.start()
    },
    stop() {
      uIOhook.stop()
    },
  }
}
