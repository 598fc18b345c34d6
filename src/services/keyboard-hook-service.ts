/**
 * HoldTalk 键盘钩子服务
 *
 * 把全局键盘事件转换为快捷键边沿：按下 = pressed，松开 = released。
 * 按住不放时系统会持续发 keydown，这里只转发第一次
 */

import type { HotkeyEvent, ShortcutConfig } from '../../shared/app-state'
import { createModuleLogger } from '../utils/logger'
import { matchesShortcut, parseAccelerator, type KeyEventLike, type KeycodeLookup, type ParsedShortcut } from './accelerator'

const logger = createModuleLogger('keyboard-hook')

export type KeyListener = (e: KeyEventLike) => void

/**
 * 全局键盘钩子（生产环境为 uiohook-napi）
 */
export interface KeyboardHook {
  on(event: 'keydown' | 'keyup', listener: KeyListener): void
  off(event: 'keydown' | 'keyup', listener: KeyListener): void
  start(): void
  stop(): void
}

export interface KeyboardHookCallbacks {
  onHotkey: (event: HotkeyEvent) => void
  onCancel?: () => void
  onRepeat?: () => void
}

export class KeyboardHookService {
  private readonly config: ShortcutConfig
  private callbacks: KeyboardHookCallbacks | null = null
  private readonly shortcut: ParsedShortcut
  private readonly cancelShortcut: ParsedShortcut | null
  private readonly repeatShortcut: ParsedShortcut | null
  private isRunning = false
  private isShortcutDown = false

  constructor(
    config: ShortcutConfig,
    private readonly hook: KeyboardHook,
    private readonly lookup: KeycodeLookup,
    private readonly now: () => number = () => performance.now()
  ) {
    this.config = config
    this.shortcut = parseAccelerator(config.accelerator, lookup)
    this.cancelShortcut = this.parseOptional(config.cancelAccelerator)
    this.repeatShortcut = this.parseOptional(config.repeatAccelerator)
  }

  /**
   * 启动键盘监听；快捷键无法识别或钩子启动失败时返回 false
   */
  start(callbacks: KeyboardHookCallbacks): boolean {
    if (this.isRunning) {
      logger.warn('已经在运行中')
      return true
    }
    if (this.shortcut.keycode === null) {
      logger.error(`无法识别的快捷键: ${this.config.accelerator}`)
      return false
    }

    this.callbacks = callbacks
    this.hook.on('keydown', this.handleKeyDown)
    this.hook.on('keyup', this.handleKeyUp)

    try {
      this.hook.start()
      this.isRunning = true
      logger.info('键盘监听已启动', { accelerator: this.config.accelerator })
      return true
    } catch (error) {
      this.hook.off('keydown', this.handleKeyDown)
      this.hook.off('keyup', this.handleKeyUp)
      this.callbacks = null
      logger.error(error instanceof Error ? error : String(error), { operation: 'hook-start' })
      logger.warn('快捷键功能不可用，请检查辅助功能权限')
      return false
    }
  }

  stop(): void {
    if (!this.isRunning) return

    this.hook.off('keydown', this.handleKeyDown)
    this.hook.off('keyup', this.handleKeyUp)
    this.hook.stop()

    this.isRunning = false
    this.isShortcutDown = false
    logger.info('键盘监听已停止')
  }

  destroy(): void {
    this.stop()
    this.callbacks = null
  }

  private parseOptional(accelerator: string | undefined): ParsedShortcut | null {
    if (!accelerator) return null
    const parsed = parseAccelerator(accelerator, this.lookup)
    if (parsed.keycode === null) {
      logger.warn(`无法识别的快捷键，已忽略: ${accelerator}`)
      return null
    }
    return parsed
  }

  private handleKeyDown = (e: KeyEventLike): void => {
    if (matchesShortcut(this.shortcut, e)) {
      // 按住不放会持续触发 keydown
      if (this.isShortcutDown) return
      this.isShortcutDown = true
      this.callbacks?.onHotkey({ type: 'pressed', timestamp: this.now() })
      return
    }

    if (this.cancelShortcut && matchesShortcut(this.cancelShortcut, e)) {
      this.callbacks?.onCancel?.()
      return
    }

    if (this.repeatShortcut && matchesShortcut(this.repeatShortcut, e)) {
      this.callbacks?.onRepeat?.()
    }
  }

  private handleKeyUp = (e: KeyEventLike): void => {
    // 只检查主键释放，松开时修饰键状态可能已变化
    if (this.shortcut.keycode !== e.keycode) return
    if (!this.isShortcutDown) return

    this.isShortcutDown = false
    this.callbacks?.onHotkey({ type: 'released', timestamp: this.now() })
  }
}
