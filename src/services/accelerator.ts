import KEY_NAMES from './key-names.json'

/**
 * 按键名称（小写）到 uiohook 键名的映射
 * 支持 e.code 格式（如 KeyA, MetaRight）和传统格式（如 a, esc）
 */
const KEY_NAME_MAP = new Map<string, string>(Object.entries(KEY_NAMES))

/**
 * 由 uiohook 键名查询 keycode
 */
export type KeycodeLookup = (keyName: string) => number | undefined

/**
 * 将 accelerator 字符串解析为按键组合
 * 例如: "Command+Shift+Space" -> { meta: true, shift: true, key: 'space' }
 */
export interface ParsedShortcut {
  meta: boolean
  ctrl: boolean
  alt: boolean
  shift: boolean
  key: string
  keycode: number | null
}

export interface KeyEventLike {
  altKey: boolean
  ctrlKey: boolean
  metaKey: boolean
  shiftKey: boolean
  keycode: number
}

export function resolveKeycode(name: string, lookup: KeycodeLookup): number | undefined {
  const keyName = KEY_NAME_MAP.get(name.toLowerCase())
  return keyName === undefined ? undefined : lookup(keyName)
}

export function parseAccelerator(
  accelerator: string,
  lookup: KeycodeLookup,
  platform: NodeJS.Platform = process.platform
): ParsedShortcut {
  // "Shift++" 之类的写法不支持，'+' 只作分隔符
  const parts = accelerator.split('+').map(p => p.trim().toLowerCase()).filter(Boolean)

  const result: ParsedShortcut = {
    meta: false,
    ctrl: false,
    alt: false,
    shift: false,
    key: '',
    keycode: null,
  }

  for (const part of parts) {
    const keycode = resolveKeycode(part, lookup)
    if (keycode !== undefined) {
      result.key = part
      result.keycode = keycode
      continue
    }

    switch (part) {
      case 'command':
      case 'cmd':
      case 'meta':
      case 'super':
        result.meta = true
        break
      case 'control':
      case 'ctrl':
        result.ctrl = true
        break
      case 'commandorcontrol':
      case 'cmdorctrl':
        // 在 macOS 上映射到 meta，在 Windows/Linux 上映射到 ctrl
        if (platform === 'darwin') {
          result.meta = true
        } else {
          result.ctrl = true
        }
        break
      case 'alt':
      case 'option':
      case 'opt':
        result.alt = true
        break
      case 'shift':
        result.shift = true
        break
      default:
        // 未知的主键
        result.key = part
        result.keycode = null
        break
    }
  }

  return result
}

/**
 * 检查按下事件是否匹配快捷键；主键本身是修饰键时跳过对应修饰状态的检查
 */
export function matchesShortcut(shortcut: ParsedShortcut, e: KeyEventLike): boolean {
  const { meta, ctrl, alt, shift, keycode, key } = shortcut
  if (keycode === null) return false

  const isMetaKey = key.startsWith('meta')
  const isCtrlKey = key.startsWith('control')
  const isAltKey = key.startsWith('alt')
  const isShiftKey = key.startsWith('shift')

  if (!isMetaKey && meta !== e.metaKey) return false
  if (!isCtrlKey && ctrl !== e.ctrlKey) return false
  if (!isAltKey && alt !== e.altKey) return false
  if (!isShiftKey && shift !== e.shiftKey) return false

  return keycode === e.keycode
}
