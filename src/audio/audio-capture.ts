import type { AudioDevice, AudioStreamHandle } from './audio-device'
import { CaptureError, toError } from '../utils/errors'
import { createModuleLogger } from '../utils/logger'

const logger = createModuleLogger('audio-capture')

/**
 * 一次录音的采样数据（16-bit PCM，多声道交错）
 */
export interface SampleBuffer {
  samples: Int16Array
  sampleRate: number
  channels: number
  durationMs: number
}

export interface AudioCaptureOptions {
  sampleRate: number
  channels: number
  device?: string
  /** 低于该时长的录音以 CaptureError('too-short') 结束 */
  minDurationMs: number
  /** 每个数据块的 RMS 电平（0~1），供外部指示器使用 */
  onLevel?: (level: number) => void
}

/**
 * 计算 16-bit PCM 数据块的 RMS 电平
 */
export function computeRmsLevel(chunk: Buffer): number {
  const count = Math.floor(chunk.length / 2)
  if (count === 0) return 0
  let sum = 0
  for (let i = 0; i < count; i++) {
    const value = chunk.readInt16LE(i * 2) / 32768
    sum += value * value
  }
  return Math.sqrt(sum / count)
}

/**
 * 录音组件
 *
 * 独占持有唯一的设备句柄：start 前先清理旧句柄，stop/cancel 都会关闭句柄。
 * 关闭过程中出现的错误只记录日志，不向调用方抛出。
 * 调用方（会话协调器）保证同一时刻只有一个调用在执行。
 */
export class AudioCapture {
  private handle: AudioStreamHandle | null = null
  /** 正在接收数据的句柄；stop 时保留到关闭完成，以收下刷新出的尾部数据 */
  private active: AudioStreamHandle | null = null
  private closing: Promise<void> | null = null
  private chunks: Buffer[] = []
  /** 管道读出的数据块可能停在奇数字节，留到下一块再算电平 */
  private levelCarry: Buffer | null = null

  constructor(
    private readonly device: AudioDevice,
    private readonly options: AudioCaptureOptions
  ) {}

  isOpen(): boolean {
    return this.handle !== null
  }

  /**
   * 打开新的输入流
   */
  async start(): Promise<void> {
    this.active = null
    await this.release('restart')
    this.chunks = []
    this.levelCarry = null

    let handle: AudioStreamHandle
    try {
      handle = await this.device.open({
        sampleRate: this.options.sampleRate,
        channels: this.options.channels,
        device: this.options.device,
      })
    } catch (error) {
      if (error instanceof CaptureError) throw error
      throw new CaptureError('device-unavailable', `无法打开录音设备：${toError(error).message}`, { cause: error })
    }

    this.handle = handle
    this.active = handle
    handle.onData(chunk => this.receive(handle, chunk))
    handle.onError(error => {
      logger.warn('录音流出错，等待会话结束时关闭', { error: error.message })
    })
    logger.debug('录音已开始', { sampleRate: this.options.sampleRate, channels: this.options.channels })
  }

  /**
   * 关闭句柄并返回采样；录音过短时句柄同样会被关闭
   */
  async stop(): Promise<SampleBuffer> {
    const handle = this.handle
    if (!handle) {
      throw new CaptureError('device-unavailable', '当前没有打开的录音流')
    }

    await this.closeHandle(handle, 'stop')
    const buffer = this.collect()
    this.active = null
    this.chunks = []
    this.levelCarry = null

    if (buffer.durationMs < this.options.minDurationMs) {
      throw new CaptureError(
        'too-short',
        `录音时长 ${buffer.durationMs}ms 低于下限 ${this.options.minDurationMs}ms`
      )
    }
    return buffer
  }

  /**
   * 丢弃录音；重复调用或并发调用都是安全的
   */
  async cancel(): Promise<void> {
    this.active = null
    await this.release('cancel')
    this.chunks = []
    this.levelCarry = null
  }

  private receive(handle: AudioStreamHandle, chunk: Buffer): void {
    // 已取消或已被替换的句柄，数据不计入当前会话
    if (handle !== this.active) return
    this.chunks.push(chunk)
    if (this.options.onLevel) {
      const data = this.levelCarry ? Buffer.concat([this.levelCarry, chunk]) : chunk
      const aligned = data.length - (data.length % 2)
      this.levelCarry = aligned < data.length ? Buffer.from(data.subarray(aligned)) : null
      if (aligned === 0) return
      try {
        this.options.onLevel(computeRmsLevel(data.subarray(0, aligned)))
      } catch (error) {
        logger.warn('电平回调执行出错', { error: toError(error).message })
      }
    }
  }

  private async release(reason: string): Promise<void> {
    if (this.handle) {
      await this.closeHandle(this.handle, reason)
    } else if (this.closing) {
      await this.closing
    }
  }

  private closeHandle(handle: AudioStreamHandle, reason: string): Promise<void> {
    // 先解除持有，保证并发调用者看到的是“无句柄”
    this.handle = null
    const closing = Promise.resolve()
      .then(() => handle.close())
      .then(
        () => {
          logger.debug('录音句柄已关闭', { reason })
        },
        (error: unknown) => {
          logger.warn('关闭录音句柄失败，已忽略', { reason, error: toError(error).message })
        }
      )
      .finally(() => {
        if (this.closing === closing) {
          this.closing = null
        }
      })
    this.closing = closing
    return closing
  }

  private collect(): SampleBuffer {
    const data = Buffer.concat(this.chunks)
    const samples = new Int16Array(Math.floor(data.length / 2))
    for (let i = 0; i < samples.length; i++) {
      samples[i] = data.readInt16LE(i * 2)
    }
    const frames = samples.length / this.options.channels
    return {
      samples,
      sampleRate: this.options.sampleRate,
      channels: this.options.channels,
      durationMs: Math.round((frames / this.options.sampleRate) * 1000),
    }
  }
}
