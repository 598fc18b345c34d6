import type { HotkeyEvent } from '../../shared/app-state'

/**
 * 快捷键边沿防抖
 *
 * 与上一次被接受的边沿同类型、且间隔小于窗口的事件被丢弃；
 * 按下后紧接着的松开属于不同类型，始终放行。
 */
export class EdgeDebouncer {
  private lastAccepted: HotkeyEvent | null = null

  constructor(private readonly windowMs: number) {}

  /**
   * 判断事件是否放行；放行时记录为最近一次接受的边沿
   */
  accept(event: HotkeyEvent): boolean {
    const last = this.lastAccepted
    if (last && last.type === event.type && event.timestamp - last.timestamp < this.windowMs) {
      return false
    }
    this.lastAccepted = { ...event }
    return true
  }
}
