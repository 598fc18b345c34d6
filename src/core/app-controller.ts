/**
 * HoldTalk 应用控制器
 *
 * 整合所有服务：快捷键 → 会话协调器 → 流水线 → 投递，以及历史记录
 */

import type { SessionEvent } from '../../shared/app-state'
import { AudioCapture } from '../audio/audio-capture'
import type { AudioDevice } from '../audio/audio-device'
import { SoxAudioDevice } from '../audio/sox-device'
import {
  getCacheDir,
  getHistoryDir,
  initializeDirectories,
  loadAppSettings,
  loadCleanupConfig,
  loadRecorderConfig,
  loadTranscriberConfig,
  type AppSettings,
} from '../config'
import { APP_CONSTANTS, STATUS_LABEL } from '../config/constants'
import { createDeliverySink, type DeliverySink } from '../delivery'
import type { KeycodeLookup } from '../services/accelerator'
import { CleanupEngine } from '../services/cleanup-engine'
import { KeyboardHookService, type KeyboardHook } from '../services/keyboard-hook-service'
import { TranscriptStore } from '../storage/transcript-store'
import { createTranscriber, type Transcriber } from '../transcriber'
import { toError } from '../utils/errors'
import { createModuleLogger } from '../utils/logger'
import { metrics } from '../utils/metrics'
import { ProcessingPipeline, type TextCleaner } from './processing-pipeline'
import { SessionCoordinator } from './session-coordinator'

const logger = createModuleLogger('app-controller')

export interface AppControllerOptions {
  keyboardHook: KeyboardHook
  keycodeLookup: KeycodeLookup
  /** 覆盖 settings.json 中的设置（命令行参数） */
  settings?: Partial<AppSettings>
  device?: AudioDevice
  transcriber?: Transcriber
  cleaner?: TextCleaner
  sink?: DeliverySink
  /** 传 null 关闭历史记录 */
  store?: TranscriptStore | null
  now?: () => number
}

export class AppController {
  private readonly settings: AppSettings
  private readonly capture: AudioCapture
  private readonly transcriber: Transcriber
  private readonly cleaner: TextCleaner | null
  private readonly coordinator: SessionCoordinator
  private readonly keyboardHookService: KeyboardHookService
  private readonly store: TranscriptStore | null
  private readonly pendingWrites = new Set<Promise<void>>()
  private unsubscribe: (() => void) | null = null
  /** 当前会话录音的峰值电平 */
  private peakLevel = 0
  private initialized = false

  constructor(options: AppControllerOptions) {
    this.settings = { ...loadAppSettings(), ...options.settings }
    const recorderConfig = loadRecorderConfig()

    this.capture = new AudioCapture(options.device ?? new SoxAudioDevice(recorderConfig.recorder), {
      sampleRate: recorderConfig.sampleRate,
      channels: recorderConfig.channels,
      device: recorderConfig.device,
      minDurationMs: recorderConfig.minDurationMs,
      onLevel: level => {
        this.peakLevel = Math.max(this.peakLevel, level)
      },
    })
    this.transcriber = options.transcriber ?? createTranscriber(loadTranscriberConfig(), { cacheDir: getCacheDir() })
    this.cleaner = this.settings.cleanupEnabled ? options.cleaner ?? new CleanupEngine(loadCleanupConfig()) : null

    const pipeline = new ProcessingPipeline({
      transcriber: this.transcriber,
      cleaner: this.cleaner ?? undefined,
      sink: options.sink ?? createDeliverySink(this.settings.deliveryMode),
      metrics,
    })

    this.coordinator = new SessionCoordinator({
      capture: this.capture,
      pipeline,
      timings: this.settings.timings,
      isCleanupEnabled: () => this.cleaner !== null,
      now: options.now,
    })

    this.keyboardHookService = new KeyboardHookService(
      this.settings.shortcut,
      options.keyboardHook,
      options.keycodeLookup,
      options.now
    )

    if (options.store !== undefined) {
      this.store = options.store
    } else {
      this.store = this.settings.historyEnabled ? new TranscriptStore(getHistoryDir()) : null
    }
  }

  /**
   * 初始化：预热引擎、订阅事件、启动键盘监听
   * @returns 键盘监听是否启动成功
   */
  async init(): Promise<boolean> {
    if (this.initialized) {
      logger.info('应用已初始化，跳过')
      return true
    }

    const done = logger.startTimer('初始化')
    initializeDirectories()
    this.unsubscribe = this.coordinator.onEvent(event => this.handleEvent(event))

    // 启动时预热，避免首次录音时才加载引擎
    await this.warmup()

    const hookStarted = this.keyboardHookService.start({
      onHotkey: event => this.coordinator.handleHotkey(event),
      onCancel: () => this.coordinator.cancel(),
      onRepeat: () => this.coordinator.redeliverLast(),
    })

    this.initialized = true
    done()
    logger.info('HoldTalk 已就绪', {
      accelerator: this.settings.shortcut.accelerator,
      cleanup: this.cleaner !== null,
      deliveryMode: this.settings.deliveryMode,
    })
    return hookStarted
  }

  getCoordinator(): SessionCoordinator {
    return this.coordinator
  }

  getSettings(): AppSettings {
    return { ...this.settings }
  }

  /**
   * 停止监听并关闭协调器；在途的历史写入会等待完成
   */
  async destroy(): Promise<void> {
    this.keyboardHookService.destroy()
    await this.coordinator.shutdown()
    this.unsubscribe?.()
    this.unsubscribe = null
    await Promise.all([...this.pendingWrites])
    this.transcriber.destroy?.()
    this.initialized = false
    logger.debug('性能统计', { stats: metrics.getAllStats() })
    logger.info('应用已退出')
    logger.flush()
  }

  private async warmup(): Promise<void> {
    const tasks: Array<{ name: string; run: () => Promise<void> }> = []
    const { transcriber, cleaner } = this
    if (transcriber.warmup) {
      tasks.push({ name: '转写引擎', run: () => transcriber.warmup?.() ?? Promise.resolve() })
    }
    if (cleaner?.warmup) {
      tasks.push({ name: '清理引擎', run: () => cleaner.warmup?.() ?? Promise.resolve() })
    }

    const results = await Promise.allSettled(tasks.map(task => task.run()))
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        // 引擎不可用不阻止启动，会话失败时会再次提示
        logger.warn(`${tasks[index].name}预热失败`, { error: toError(result.reason).message })
      }
    })
  }

  private handleEvent(event: SessionEvent): void {
    switch (event.type) {
      case 'state':
        if (event.state.status === 'recording') {
          this.peakLevel = 0
        }
        logger.debug(`状态: ${STATUS_LABEL[event.state.status]}`, { sessionId: event.state.session?.id })
        return
      case 'notice':
        if (event.level === 'error') {
          logger.error(event.message, { sessionId: event.sessionId })
        } else if (event.level === 'warn') {
          logger.warn(event.message, { sessionId: event.sessionId })
        } else {
          logger.info(event.message, { sessionId: event.sessionId })
        }
        return
      case 'outcome': {
        const peakLevel = Math.round(this.peakLevel * 1000) / 1000
        logger.info('会话结束', { sessionId: event.sessionId, outcome: event.outcome.kind, peakLevel, ...event.timings })
        if (event.audioDurationMs !== undefined && this.peakLevel < APP_CONSTANTS.SILENT_PEAK_LEVEL) {
          logger.warn('录音几乎没有声音，请检查麦克风输入', { sessionId: event.sessionId, peakLevel })
        }
        this.persist(event)
        return
      }
    }
  }

  /**
   * 历史写入不阻塞协调器
   */
  private persist(event: SessionEvent): void {
    const store = this.store
    if (!store) return
    const write = store.recordOutcome(event).then(
      () => undefined,
      (error: unknown) => {
        logger.warn('保存历史记录失败', { error: toError(error).message })
      }
    )
    this.pendingWrites.add(write)
    void write.finally(() => {
      this.pendingWrites.delete(write)
    })
  }
}
