/**
 * HoldTalk 状态机
 *
 * 管理会话协调器的状态转换和广播
 */

import type { CoordinatorState, SessionSnapshot, SessionStatus } from '../../shared/app-state'
import { STATUS_HINT } from '../config/constants'
import { createModuleLogger } from '../utils/logger'

const logger = createModuleLogger('state-machine')

export type StateChangeListener = (state: CoordinatorState) => void

/**
 * 允许的状态转换，其余一律拒绝
 */
const STATE_TRANSITIONS: Record<SessionStatus, readonly SessionStatus[]> = {
  idle: ['recording'],
  recording: ['processing', 'idle'],
  processing: ['idle', 'shutting-down'],
  'shutting-down': ['idle'],
}

export function canTransition(from: SessionStatus, to: SessionStatus): boolean {
  return STATE_TRANSITIONS[from].includes(to)
}

/**
 * 状态机类
 * 负责校验并广播状态转换；调用方（协调器信箱）保证串行调用
 */
export class StateMachine {
  private state: CoordinatorState
  private listeners: StateChangeListener[] = []

  constructor(private readonly now: () => number = Date.now) {
    this.state = {
      status: 'idle',
      forced: false,
      message: STATUS_HINT.idle,
      updatedAt: this.now(),
    }
  }

  /**
   * 获取当前状态
   */
  getState(): CoordinatorState {
    return { ...this.state, session: this.state.session ? { ...this.state.session } : undefined }
  }

  getStatus(): SessionStatus {
    return this.state.status
  }

  /**
   * 设置状态；非法转换抛错，属于编程错误
   */
  setState(status: SessionStatus, message: string, patch?: Partial<Pick<CoordinatorState, 'forced' | 'session'>>): void {
    const from = this.state.status
    if (!canTransition(from, status)) {
      throw new Error(`非法状态转换: ${from} -> ${status}`)
    }

    this.state = {
      status,
      message,
      updatedAt: this.now(),
      forced: patch?.forced ?? false,
      session: status === 'idle' ? undefined : patch?.session ?? this.state.session,
    }
    logger.debug('状态转换', { from, to: status, sessionId: this.state.session?.id })
    this.notifyListeners()
  }

  setIdle(message: string = STATUS_HINT.idle): void {
    this.setState('idle', message)
  }

  setRecording(session: SessionSnapshot): void {
    this.setState('recording', STATUS_HINT.recording, { session })
  }

  setProcessing(): void {
    this.setState('processing', STATUS_HINT.processing)
  }

  /**
   * 进入收尾状态；forced 表示由 failsafe 触发
   */
  setShuttingDown(forced: boolean): void {
    this.setState('shutting-down', STATUS_HINT['shutting-down'], { forced })
  }

  addListener(listener: StateChangeListener): void {
    this.listeners.push(listener)
  }

  private notifyListeners(): void {
    const stateCopy = this.getState()
    this.listeners.forEach(listener => {
      try {
        listener(stateCopy)
      } catch (err) {
        logger.error(err instanceof Error ? err : String(err), { operation: 'state-listener' })
      }
    })
  }
}
