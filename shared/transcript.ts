import type { ErrorInfo } from './app-state'

export interface TranscriptRecord {
  id: string
  sessionId: number
  createdAt: number
  /** 录音时长（毫秒） */
  durationMs: number
  /** 最终投递的文本 */
  text?: string
  /** 转写引擎的原始输出 */
  rawText?: string
  wordCount: number
  modelId?: string
  cleanupUsed: boolean
  error?: ErrorInfo
}

export interface TranscriptStats {
  totalTranscriptions: number
  totalWords: number
  totalMinutes: number
  /** 平均语速（词/分钟） */
  avgWpm: number
  todayCount: number
  todayWords: number
}
