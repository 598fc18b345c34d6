/**
 * HoldTalk 处理流水线
 *
 * 编码 → 转写 → 清理 → 投递。在协调器信箱之外运行，
 * 结果以 PipelineResult 返回，从不抛错
 */

import type { PipelineResult, SessionTimings } from '../../shared/app-state'
import type { SampleBuffer } from '../audio/audio-capture'
import { encodeWav } from '../audio/wav'
import type { DeliverySink } from '../delivery'
import type { CleanupResult } from '../services/cleanup-engine'
import type { Transcriber, TranscriptionResult } from '../transcriber'
import { DeliveryError, PipelineError, TimeoutError, describeError, toError } from '../utils/errors'
import { createModuleLogger } from '../utils/logger'
import { metrics as sharedMetrics, type MetricsCollector } from '../utils/metrics'

const logger = createModuleLogger('pipeline')

/**
 * 文本清理能力；CleanupEngine 的实现从不抛错
 */
export interface TextCleaner {
  warmup?(): Promise<void>
  clean(transcript: string): Promise<CleanupResult>
}

export interface PipelineDependencies {
  transcriber: Transcriber
  cleaner?: TextCleaner
  sink: DeliverySink
  metrics?: MetricsCollector
}

export interface PipelineRunOptions {
  cleanupEnabled: boolean
  /** 投递前的最后检查：会话已被取代时返回 false，结果不再投递 */
  shouldDeliver: () => boolean
}

export interface PipelineRun {
  result: PipelineResult
  timings: SessionTimings
}

export class ProcessingPipeline {
  private readonly metrics: MetricsCollector

  constructor(private readonly deps: PipelineDependencies) {
    this.metrics = deps.metrics ?? sharedMetrics
  }

  encode(buffer: SampleBuffer): Buffer {
    return encodeWav(buffer)
  }

  async transcribe(wav: Buffer): Promise<TranscriptionResult> {
    let result: TranscriptionResult
    try {
      result = await this.deps.transcriber.transcribe(wav)
    } catch (error) {
      if (error instanceof PipelineError) throw error
      throw new PipelineError('engine-unavailable', `转写失败: ${toError(error).message}`, { cause: error })
    }
    if (!result.text.trim()) {
      throw new PipelineError('empty', '转写结果为空')
    }
    return result
  }

  /**
   * 关闭清理时原样返回转写文本
   */
  async cleanup(transcript: string, enabled: boolean): Promise<CleanupResult> {
    if (!enabled || !this.deps.cleaner) {
      return { text: transcript, engineUsed: false, durationMs: 0 }
    }
    return this.deps.cleaner.clean(transcript)
  }

  async deliver(text: string): Promise<void> {
    try {
      await this.deps.sink.deliver(text)
    } catch (error) {
      if (error instanceof DeliveryError) throw error
      throw new DeliveryError('sink-unavailable', `投递失败: ${toError(error).message}`, { cause: error })
    }
  }

  /**
   * 运行完整流水线并收集各阶段耗时
   */
  async run(sessionId: number, buffer: SampleBuffer, options: PipelineRunOptions): Promise<PipelineRun> {
    const log = logger.child({ sessionId })
    const timings: SessionTimings = {}
    const startedAt = Date.now()

    try {
      const encodeTimer = this.metrics.startTimer('encode')
      const wav = this.encode(buffer)
      timings.encodeMs = this.metrics.endTimer(encodeTimer, 'encode', { samples: buffer.samples.length })?.duration ?? 0

      const transcribed = await this.metrics.measure('transcription', () => this.transcribe(wav))
      timings.transcriptionMs = transcribed.duration
      const transcript = transcribed.value
      log.info('转写完成', { chars: transcript.text.length, modelId: transcript.modelId })

      const cleaned = await this.metrics.measure('cleanup', () => this.cleanup(transcript.text, options.cleanupEnabled))
      timings.cleanupMs = cleaned.duration
      const text = cleaned.value.text
      if (!text.trim()) {
        throw new PipelineError('empty', '清理后文本为空')
      }

      if (!options.shouldDeliver()) {
        throw new TimeoutError('failsafe-triggered', '会话已超时，结果不再投递')
      }

      const delivered = await this.metrics.measure('delivery', () => this.deliver(text))
      timings.deliveryMs = delivered.duration
      timings.totalMs = Date.now() - startedAt
      log.info('投递完成', { duration: timings.totalMs, cleanupUsed: cleaned.value.engineUsed })

      return {
        result: {
          kind: 'delivered',
          text,
          rawText: transcript.text,
          cleanupUsed: cleaned.value.engineUsed,
          modelId: transcript.modelId,
        },
        timings,
      }
    } catch (error) {
      timings.totalMs = Date.now() - startedAt
      if (error instanceof PipelineError && error.kind === 'empty') {
        log.info('没有识别到语音，跳过')
        return { result: { kind: 'skipped', reason: 'empty' }, timings }
      }
      log.warn('流水线失败', { error: toError(error).message })
      return { result: { kind: 'failed', error: describeError(error) }, timings }
    }
  }
}
