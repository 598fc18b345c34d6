/**
 * HoldTalk 常量定义
 *
 * 包含状态提示、标签、默认配置等常量
 */

import type { SessionStatus, ShortcutConfig, SessionTimingConfig } from '../../shared/app-state'

/**
 * 状态提示信息
 */
export const STATUS_HINT: Record<SessionStatus, string> = {
  idle: '待命，按住快捷键开始录音',
  recording: '录音中，松开快捷键结束',
  processing: '处理中，请稍候……',
  'shutting-down': '处理超时，正在收尾',
} as const

/**
 * 状态标签，用于日志与简短提示
 */
export const STATUS_LABEL: Record<SessionStatus, string> = {
  idle: '待命',
  recording: '录音中',
  processing: '处理中',
  'shutting-down': '收尾中',
} as const

/**
 * 默认快捷键：按住右 Command
 */
export const DEFAULT_SHORTCUT: ShortcutConfig = {
  accelerator: 'MetaRight',
  cancelAccelerator: 'Escape',
  description: '按住录音，松开转写',
} as const

export const DEFAULT_TIMINGS: SessionTimingConfig = {
  debounceMs: 100,
  failsafeMs: 30_000,
  maxRecordingMs: 60_000,
} as const

/**
 * 应用常量
 */
export const APP_CONSTANTS = {
  /** 最短有效录音时长（毫秒） */
  MIN_RECORDING_MS: 500,
  /** 清理引擎处理的最少词数，低于此值直接使用本地格式化 */
  MIN_WORDS_FOR_ENGINE: 5,
  /** 清理结果短于原文该比例时视为截断 */
  MIN_CLEANUP_RATIO: 0.3,
  /** 转写命令默认超时（毫秒） */
  TRANSCRIBE_TIMEOUT_MS: 20_000,
  /** 清理引擎默认超时（毫秒） */
  CLEANUP_TIMEOUT_MS: 10_000,
  /** 整段录音的峰值电平低于此值时提示检查麦克风 */
  SILENT_PEAK_LEVEL: 0.01,
} as const
