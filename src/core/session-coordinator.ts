/**
 * HoldTalk 会话协调器
 *
 * 把快捷键边沿事件变成互不重叠的 录音 → 转写 → 清理 → 投递 会话。
 * 所有状态转换和录音设备调用都经过同一个信箱串行执行；
 * 流水线在信箱之外运行，完成后再投递消息回来。
 */

import type {
  CoordinatorState,
  HotkeyEvent,
  SessionEvent,
  SessionOutcome,
  SessionStatus,
  SessionTimingConfig,
  SessionTimings,
} from '../../shared/app-state'
import type { SampleBuffer } from '../audio/audio-capture'
import { describeError, isCaptureError, toError } from '../utils/errors'
import { createModuleLogger } from '../utils/logger'
import { EdgeDebouncer } from './edge-debouncer'
import { Mailbox } from './mailbox'
import type { PipelineRun, PipelineRunOptions } from './processing-pipeline'
import { StateMachine } from './state-machine'

const logger = createModuleLogger('coordinator')

/**
 * 协调器对录音组件的需求（AudioCapture 满足该接口）
 */
export interface CaptureControl {
  start(): Promise<void>
  stop(): Promise<SampleBuffer>
  cancel(): Promise<void>
  isOpen(): boolean
}

/**
 * 协调器对流水线的需求（ProcessingPipeline 满足该接口）
 */
export interface PipelineRunner {
  run(sessionId: number, buffer: SampleBuffer, options: PipelineRunOptions): Promise<PipelineRun>
  deliver(text: string): Promise<void>
}

export interface RecordingSession {
  id: number
  state: SessionStatus
  /** 单调时钟毫秒 */
  startedAt: number
}

export type SessionEventListener = (event: SessionEvent) => void

export interface SessionCoordinatorOptions {
  capture: CaptureControl
  pipeline: PipelineRunner
  timings: SessionTimingConfig
  /** 每次派发流水线时读取，便于运行中切换 */
  isCleanupEnabled?: () => boolean
  /** 单调时钟，默认 performance.now() */
  now?: () => number
}

type CoordinatorMessage =
  | { type: 'hotkey'; event: HotkeyEvent }
  | { type: 'cancel' }
  | { type: 'max-duration'; sessionId: number }
  | { type: 'pipeline-complete'; sessionId: number; run: PipelineRun; recordingMs: number; audioDurationMs: number }
  | { type: 'failsafe'; sessionId: number }
  | { type: 'redeliver' }
  | { type: 'shutdown' }

interface LiveSession {
  id: number
  startedAt: number
}

export class SessionCoordinator {
  private readonly machine: StateMachine
  private readonly mailbox: Mailbox<CoordinatorMessage>
  private readonly debouncer: EdgeDebouncer
  private readonly listeners = new Set<SessionEventListener>()
  private readonly inflight = new Set<Promise<void>>()
  private readonly now: () => number

  private session: LiveSession | null = null
  private nextSessionId = 1
  private failsafeTimer: NodeJS.Timeout | null = null
  private maxDurationTimer: NodeJS.Timeout | null = null
  private lastDeliveredText: string | null = null
  private lastDeliveredId = 0
  private stopped = false

  constructor(private readonly options: SessionCoordinatorOptions) {
    this.now = options.now ?? (() => performance.now())
    this.machine = new StateMachine()
    this.debouncer = new EdgeDebouncer(options.timings.debounceMs)
    this.mailbox = new Mailbox(message => this.handleMessage(message))
    this.machine.addListener(state => this.emit({ type: 'state', state }))
  }

  /**
   * 快捷键回调入口：同步完成防抖后入队，立即返回
   */
  handleHotkey(event: HotkeyEvent): void {
    if (this.stopped) return
    if (!this.debouncer.accept(event)) {
      logger.debug('防抖丢弃边沿事件', { edge: event.type, timestamp: event.timestamp })
      return
    }
    this.mailbox.post({ type: 'hotkey', event })
  }

  /**
   * 取消正在进行的录音，不派发流水线
   */
  cancel(): void {
    if (this.stopped) return
    this.mailbox.post({ type: 'cancel' })
  }

  /**
   * 待命时重新投递上一次的结果
   */
  redeliverLast(): void {
    if (this.stopped) return
    this.mailbox.post({ type: 'redeliver' })
  }

  getState(): CoordinatorState {
    return this.machine.getState()
  }

  getSession(): RecordingSession | null {
    if (!this.session) return null
    return { id: this.session.id, state: this.machine.getStatus(), startedAt: this.session.startedAt }
  }

  /**
   * 订阅事件流，返回取消订阅函数
   */
  onEvent(listener: SessionEventListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /**
   * 信箱中已有的消息全部处理完后 resolve
   */
  drain(): Promise<void> {
    return this.mailbox.drain()
  }

  /**
   * 等待在途流水线结束并处理完它们的完成消息
   */
  async settle(): Promise<void> {
    await this.mailbox.drain()
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight])
      await this.mailbox.drain()
    }
  }

  /**
   * 停止接收事件：取消录音、清除计时器；在途流水线被放弃
   */
  async shutdown(): Promise<void> {
    if (this.stopped) {
      await this.mailbox.drain()
      return
    }
    this.stopped = true
    this.mailbox.post({ type: 'shutdown' })
    this.mailbox.close()
    await this.mailbox.drain()
  }

  private async handleMessage(message: CoordinatorMessage): Promise<void> {
    switch (message.type) {
      case 'hotkey':
        if (message.event.type === 'pressed') {
          await this.onPressed()
        } else {
          await this.onReleased()
        }
        return
      case 'cancel':
        await this.onCancel()
        return
      case 'max-duration':
        await this.onMaxDuration(message.sessionId)
        return
      case 'pipeline-complete':
        this.onPipelineComplete(message)
        return
      case 'failsafe':
        this.onFailsafe(message.sessionId)
        return
      case 'redeliver':
        this.onRedeliver()
        return
      case 'shutdown':
        await this.onShutdown()
        return
    }
  }

  private async onPressed(): Promise<void> {
    const status = this.machine.getStatus()
    if (status === 'recording') {
      logger.debug('已在录音中，忽略重复按下')
      return
    }
    if (status !== 'idle') {
      logger.info('上一次会话尚未结束，忽略按下', { status })
      return
    }

    try {
      await this.options.capture.start()
    } catch (error) {
      const info = describeError(error)
      logger.warn('无法开始录音', { error: info.message })
      this.emit({ type: 'notice', level: 'error', message: `无法开始录音：${info.message}` })
      return
    }

    const session: LiveSession = { id: this.nextSessionId++, startedAt: this.now() }
    this.session = session
    this.machine.setRecording({ id: session.id, startedAt: session.startedAt })
    logger.info('开始录音', { sessionId: session.id })

    const { maxRecordingMs } = this.options.timings
    if (maxRecordingMs > 0) {
      this.maxDurationTimer = setTimeout(() => {
        this.maxDurationTimer = null
        this.mailbox.post({ type: 'max-duration', sessionId: session.id })
      }, maxRecordingMs)
    }
  }

  private async onReleased(): Promise<void> {
    if (this.machine.getStatus() !== 'recording') {
      logger.debug('未在录音，忽略松开')
      return
    }
    await this.endRecording()
  }

  private async onMaxDuration(sessionId: number): Promise<void> {
    if (this.machine.getStatus() !== 'recording' || this.session?.id !== sessionId) return
    logger.info('达到最长录音时长，自动结束', { sessionId, maxRecordingMs: this.options.timings.maxRecordingMs })
    this.emit({ type: 'notice', level: 'info', message: '已达到最长录音时长，自动结束录音', sessionId })
    await this.endRecording()
  }

  private async endRecording(): Promise<void> {
    const session = this.session
    if (!session) return
    this.clearMaxDurationTimer()
    const recordingMs = Math.round(this.now() - session.startedAt)

    let buffer: SampleBuffer
    try {
      buffer = await this.options.capture.stop()
    } catch (error) {
      this.session = null
      this.machine.setIdle()
      if (isCaptureError(error, 'too-short')) {
        logger.info('录音过短，丢弃', { sessionId: session.id, recordingMs })
        this.emitOutcome(session.id, { kind: 'skipped', reason: 'too-short' }, { recordingMs })
        return
      }
      const info = describeError(error)
      logger.warn('结束录音失败', { sessionId: session.id, error: info.message })
      this.emitOutcome(session.id, { kind: 'failed', error: info }, { recordingMs })
      this.emit({ type: 'notice', level: 'error', message: `录音失败：${info.message}`, sessionId: session.id })
      return
    }

    this.machine.setProcessing()
    this.failsafeTimer = setTimeout(() => {
      this.failsafeTimer = null
      this.mailbox.post({ type: 'failsafe', sessionId: session.id })
    }, this.options.timings.failsafeMs)

    logger.info('录音结束，开始处理', { sessionId: session.id, audioMs: buffer.durationMs })
    this.dispatch(session.id, buffer, recordingMs)
  }

  /**
   * 在信箱之外运行流水线，结束后把结果作为消息投回
   */
  private dispatch(sessionId: number, buffer: SampleBuffer, recordingMs: number): void {
    const isCleanupEnabled = this.options.isCleanupEnabled ?? (() => true)
    const task = this.options.pipeline
      .run(sessionId, buffer, {
        cleanupEnabled: isCleanupEnabled(),
        shouldDeliver: () => this.isCurrent(sessionId),
      })
      .catch((error: unknown): PipelineRun => ({
        result: { kind: 'failed', error: describeError(error) },
        timings: {},
      }))
      .then(run => {
        const posted = this.mailbox.post({
          type: 'pipeline-complete',
          sessionId,
          run,
          recordingMs,
          audioDurationMs: buffer.durationMs,
        })
        if (!posted) {
          logger.debug('协调器已停止，丢弃流水线结果', { sessionId })
        }
      })
    this.inflight.add(task)
    void task.finally(() => {
      this.inflight.delete(task)
    })
  }

  private isCurrent(sessionId: number): boolean {
    return !this.stopped && this.session?.id === sessionId && this.machine.getStatus() === 'processing'
  }

  private onPipelineComplete(message: Extract<CoordinatorMessage, { type: 'pipeline-complete' }>): void {
    const { sessionId, run } = message
    if (!this.isCurrent(sessionId)) {
      if (run.result.kind === 'delivered') {
        // 超时前已通过投递检查，文本实际已经粘贴；状态不变，只记下文本供重新粘贴
        this.rememberDelivered(sessionId, run.result.text)
        logger.warn('超时会话的结果已完成投递', { sessionId })
        this.emit({ type: 'notice', level: 'warn', message: '超时会话的结果已粘贴，未写入历史记录', sessionId })
        return
      }
      logger.info('丢弃过期会话的结果', { sessionId, kind: run.result.kind })
      return
    }

    this.clearFailsafeTimer()
    this.session = null
    this.machine.setIdle()

    const { result } = run
    if (result.kind === 'delivered') {
      this.rememberDelivered(sessionId, result.text)
    }
    this.emitOutcome(sessionId, result, { recordingMs: message.recordingMs, ...run.timings }, message.audioDurationMs)
    if (result.kind === 'failed') {
      this.emit({ type: 'notice', level: 'error', message: `处理失败：${result.error.message}`, sessionId })
    }
  }

  private onFailsafe(sessionId: number): void {
    if (!this.isCurrent(sessionId)) return
    logger.warn('处理超时，强制回到待命', { sessionId, failsafeMs: this.options.timings.failsafeMs })

    this.session = null
    this.machine.setShuttingDown(true)
    this.emitOutcome(sessionId, { kind: 'timed-out' }, {})
    this.emit({ type: 'notice', level: 'warn', message: '处理时间过长，已放弃本次结果', sessionId })
    this.machine.setIdle()
  }

  private async onCancel(): Promise<void> {
    const session = this.session
    if (this.machine.getStatus() !== 'recording' || !session) {
      if (this.options.capture.isOpen()) {
        await this.options.capture.cancel()
      }
      logger.debug('没有进行中的录音，忽略取消')
      return
    }

    this.clearMaxDurationTimer()
    await this.options.capture.cancel()
    this.session = null
    this.machine.setIdle()
    logger.info('录音已取消', { sessionId: session.id })
    this.emitOutcome(session.id, { kind: 'cancelled' }, { recordingMs: Math.round(this.now() - session.startedAt) })
  }

  private onRedeliver(): void {
    const text = this.lastDeliveredText
    if (this.machine.getStatus() !== 'idle') {
      logger.debug('会话进行中，忽略重新投递')
      return
    }
    if (!text) {
      this.emit({ type: 'notice', level: 'info', message: '还没有可以重新粘贴的内容' })
      return
    }
    // 投递可能较慢，不占用信箱
    void this.options.pipeline.deliver(text).then(
      () => {
        logger.info('已重新投递上一次结果', { chars: text.length })
      },
      (error: unknown) => {
        this.emit({ type: 'notice', level: 'error', message: `重新粘贴失败：${describeError(error).message}` })
      }
    )
  }

  private async onShutdown(): Promise<void> {
    this.clearMaxDurationTimer()
    this.clearFailsafeTimer()
    const session = this.session
    const status = this.machine.getStatus()
    this.session = null

    if (status === 'recording' && session) {
      await this.options.capture.cancel()
      this.machine.setIdle()
      this.emitOutcome(session.id, { kind: 'cancelled' }, {})
    } else if (status === 'processing') {
      this.machine.setShuttingDown(false)
      this.machine.setIdle()
    } else if (this.options.capture.isOpen()) {
      await this.options.capture.cancel()
    }
    logger.info('协调器已停止')
  }

  private rememberDelivered(sessionId: number, text: string): void {
    if (sessionId < this.lastDeliveredId) return
    this.lastDeliveredId = sessionId
    this.lastDeliveredText = text
  }

  private emitOutcome(sessionId: number, outcome: SessionOutcome, timings: SessionTimings, audioDurationMs?: number): void {
    this.emit({ type: 'outcome', sessionId, outcome, timings, audioDurationMs })
  }

  /**
   * 推送事件；监听器异常只记录，不影响协调器
   */
  private emit(event: SessionEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event)
      } catch (error) {
        logger.error(toError(error), { operation: 'event-listener', event: event.type })
      }
    }
  }

  private clearFailsafeTimer(): void {
    if (this.failsafeTimer) {
      clearTimeout(this.failsafeTimer)
      this.failsafeTimer = null
    }
  }

  private clearMaxDurationTimer(): void {
    if (this.maxDurationTimer) {
      clearTimeout(this.maxDurationTimer)
      this.maxDurationTimer = null
    }
  }
}
