/**
 * 基于 SoX 子进程的录音设备
 *
 * sox -d 从默认输入设备读取，原始 PCM 写到 stdout；
 * 指定设备时通过 AUDIODEV 环境变量传入
 */

import { spawn, type ChildProcess } from 'node:child_process'
import type { AudioDevice, AudioDeviceOptions, AudioStreamHandle } from './audio-device'
import { CaptureError, toError } from '../utils/errors'
import { createModuleLogger } from '../utils/logger'

const logger = createModuleLogger('sox-device')

/** 等待首个数据块的时限，超时视为设备不可用 */
const OPEN_TIMEOUT_MS = 2000
/** SIGTERM 后等待进程退出的时限 */
const CLOSE_TIMEOUT_MS = 1000

export function buildSoxArgs(options: AudioDeviceOptions): string[] {
  return [
    '-q',
    '-d',
    '-t', 'raw',
    '-r', String(options.sampleRate),
    '-c', String(options.channels),
    '-b', '16',
    '-e', 'signed-integer',
    '-L',
    '-',
  ]
}

class SoxStreamHandle implements AudioStreamHandle {
  private dataListener: ((chunk: Buffer) => void) | null = null
  private errorListener: ((error: Error) => void) | null = null
  private readonly pending: Buffer[] = []
  private exited = false
  private closing: Promise<void> | null = null
  private stderrTail = ''

  constructor(private readonly proc: ChildProcess) {
    proc.stdout?.on('data', (chunk: Buffer) => {
      if (this.dataListener) {
        this.dataListener(chunk)
      } else {
        this.pending.push(chunk)
      }
    })
    proc.stderr?.on('data', (chunk: Buffer) => {
      this.stderrTail = (this.stderrTail + chunk.toString('utf-8')).slice(-500)
    })
    // spawn 失败时不会再有 exit/close 事件
    proc.on('error', () => {
      this.exited = true
    })
    proc.on('exit', (code, signal) => {
      this.exited = true
      if (!this.closing && code !== 0) {
        const detail = this.stderrTail.trim() || `code=${code ?? 'null'} signal=${signal ?? 'null'}`
        this.errorListener?.(new Error(`录音进程意外退出：${detail}`))
      }
    })
  }

  get lastError(): string {
    return this.stderrTail.trim()
  }

  onData(listener: (chunk: Buffer) => void): void {
    this.dataListener = listener
    for (const chunk of this.pending.splice(0)) {
      listener(chunk)
    }
  }

  onError(listener: (error: Error) => void): void {
    this.errorListener = listener
  }

  close(): Promise<void> {
    if (this.closing) return this.closing
    this.closing = new Promise<void>((resolve) => {
      if (this.exited) {
        resolve()
        return
      }
      const killTimer = setTimeout(() => {
        logger.warn('录音进程未响应 SIGTERM，强制结束')
        this.proc.kill('SIGKILL')
      }, CLOSE_TIMEOUT_MS)
      // 'close' 在 stdout 读尽之后触发，保证尾部数据已交付
      this.proc.once('close', () => {
        clearTimeout(killTimer)
        resolve()
      })
      this.proc.kill('SIGTERM')
    })
    return this.closing
  }
}

export class SoxAudioDevice implements AudioDevice {
  constructor(private readonly recorder = 'sox') {}

  open(options: AudioDeviceOptions): Promise<AudioStreamHandle> {
    const env = { ...process.env }
    if (options.device) {
      env.AUDIODEV = options.device
    }

    return new Promise<AudioStreamHandle>((resolve, reject) => {
      let settled = false
      const proc = spawn(this.recorder, buildSoxArgs(options), { env, stdio: ['ignore', 'pipe', 'pipe'] })
      const handle = new SoxStreamHandle(proc)

      const fail = (message: string, cause?: unknown) => {
        if (settled) return
        settled = true
        clearTimeout(timer)
        void handle.close().then(() => {
          reject(new CaptureError('device-unavailable', message, { cause }))
        })
      }

      const timer = setTimeout(() => {
        fail(`录音设备 ${OPEN_TIMEOUT_MS}ms 内无数据`)
      }, OPEN_TIMEOUT_MS)

      proc.once('error', (error) => {
        fail(`无法启动录音程序 ${this.recorder}：${toError(error).message}`, error)
      })
      proc.once('exit', () => {
        fail(`没有可用的录音设备：${handle.lastError || '录音进程已退出'}`)
      })
      proc.stdout?.once('data', () => {
        if (settled) return
        settled = true
        clearTimeout(timer)
        logger.debug('录音设备已打开', { recorder: this.recorder, device: options.device ?? 'default' })
        resolve(handle)
      })
    })
  }
}
