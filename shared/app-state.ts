/**
 * 会话协调器状态，覆盖待命/录音/处理/强制收尾四个节点。
 */
export type SessionStatus = 'idle' | 'recording' | 'processing' | 'shutting-down'

/**
 * 快捷键边沿事件，timestamp 为单调时钟毫秒（performance.now() 口径）
 */
export type HotkeyEdge = 'pressed' | 'released'

export interface HotkeyEvent {
  type: HotkeyEdge
  timestamp: number
}

/**
 * 对外广播的统一状态结构（只读快照）。
 */
export interface SessionSnapshot {
  id: number
  startedAt: number
}

export interface CoordinatorState {
  status: SessionStatus
  /** 仅在 shutting-down 时有意义：是否由 failsafe 强制触发 */
  forced: boolean
  message: string
  updatedAt: number
  session?: SessionSnapshot
}

export type ErrorCode =
  | 'device-unavailable'
  | 'too-short'
  | 'engine-unavailable'
  | 'empty'
  | 'malformed'
  | 'sink-unavailable'
  | 'failsafe-triggered'
  | 'unknown'

/**
 * 可序列化的错误描述，随事件流推送给历史/界面
 */
export interface ErrorInfo {
  code: ErrorCode
  message: string
}

export type SkipReason = 'too-short' | 'empty'

/**
 * 单次会话的处理结果，每个会话只产生一次
 */
export type PipelineResult =
  | { kind: 'delivered'; text: string; rawText: string; cleanupUsed: boolean; modelId?: string }
  | { kind: 'skipped'; reason: SkipReason }
  | { kind: 'failed'; error: ErrorInfo }

/**
 * 会话终态：在流水线结果之外，还有取消（无会话）与超时收尾
 */
export type SessionOutcome = PipelineResult | { kind: 'cancelled' } | { kind: 'timed-out' }

export interface SessionTimings {
  recordingMs?: number
  encodeMs?: number
  transcriptionMs?: number
  cleanupMs?: number
  deliveryMs?: number
  totalMs?: number
}

export type NoticeLevel = 'info' | 'warn' | 'error'

export type SessionEvent =
  | { type: 'state'; state: CoordinatorState }
  | {
      type: 'outcome'
      sessionId: number
      outcome: SessionOutcome
      timings: SessionTimings
      /** 录音时长（按采样数计算） */
      audioDurationMs?: number
    }
  | { type: 'notice'; level: NoticeLevel; message: string; sessionId?: number }

/**
 * 全局快捷键信息
 * - accelerator: 按住录音、松开结束
 * - cancelAccelerator: 录音中按下即取消（可选）
 * - repeatAccelerator: 待命时重新粘贴上一次结果（可选）
 */
export interface ShortcutConfig {
  accelerator: string
  cancelAccelerator?: string
  repeatAccelerator?: string
  description: string
}

/**
 * 文本投递方式
 * - paste: 写入剪贴板并模拟粘贴到前台应用
 * - print: 输出到标准输出
 */
export type DeliveryMode = 'paste' | 'print'

/**
 * 会话节奏参数，均可在 settings.json 中覆盖
 */
export interface SessionTimingConfig {
  /** 同类边沿事件的防抖窗口 */
  debounceMs: number
  /** 进入 processing 后的兜底超时 */
  failsafeMs: number
  /** 单次录音最长时长，到达后自动停止；0 表示不限制 */
  maxRecordingMs: number
}
