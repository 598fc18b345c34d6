import type { TranscriberConfig } from '../config'
import { CommandTranscriber } from './command-transcriber'

// 类型定义
export interface TranscriptionResult {
  text: string
  modelId: string
  durationMs: number
  language?: string
}

export interface Transcriber {
  /**
   * 预热：检查引擎是否可用，启动时调用，避免首次录音时才发现问题
   */
  warmup?(): Promise<void>
  /**
   * 转写一段 WAV 音频；引擎无法运行时抛 PipelineError('engine-unavailable')，
   * 结果为空白时抛 PipelineError('empty')
   */
  transcribe(wav: Buffer): Promise<TranscriptionResult>
  destroy?(): void
}

export function createTranscriber(config: TranscriberConfig, options: { cacheDir: string }): Transcriber {
  return new CommandTranscriber(config, { cacheDir: options.cacheDir })
}
