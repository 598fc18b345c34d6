/**
 * 本地命令行转写器
 *
 * 将 WAV 写入缓存目录的临时文件，调用 whisper.cpp 风格的 CLI，读取标准输出作为转写文本
 */

import { execFile } from 'node:child_process'
import fs from 'node:fs/promises'
import path from 'node:path'
import { randomUUID } from 'node:crypto'
import { promisify } from 'node:util'
import type { TranscriberConfig } from '../config'
import type { Transcriber, TranscriptionResult } from './index'
import { PipelineError, getErrnoCode, toError } from '../utils/errors'
import { createModuleLogger } from '../utils/logger'

const logger = createModuleLogger('command-transcriber')

const WARMUP_TIMEOUT_MS = 5000

export interface CommandOutput {
  stdout: string
  stderr: string
}

export type RunCommand = (command: string, args: string[], options: { timeout: number }) => Promise<CommandOutput>

const execFileAsync = promisify(execFile)

const defaultRunCommand: RunCommand = async (command, args, options) => {
  const { stdout, stderr } = await execFileAsync(command, args, {
    timeout: options.timeout,
    maxBuffer: 4 * 1024 * 1024,
    encoding: 'utf-8',
  })
  return { stdout, stderr }
}

/**
 * 替换参数模板中的 {input} {model} {language} 占位符；
 * 未配置模型时，连同前一个选项（如 -m）一起去掉
 */
export function buildTranscriberArgs(
  template: string[],
  values: { input: string; model?: string; language: string }
): string[] {
  const args: string[] = []
  for (const item of template) {
    if (item.includes('{model}') && !values.model) {
      const previous = args[args.length - 1]
      if (previous !== undefined && previous.startsWith('-')) {
        args.pop()
      }
      continue
    }
    args.push(
      item
        .replace(/\{input\}/g, values.input)
        .replace(/\{model\}/g, values.model ?? '')
        .replace(/\{language\}/g, values.language)
    )
  }
  return args
}

/**
 * 整理命令输出：去掉 [BLANK_AUDIO] 之类的标记和时间戳，合并为一行
 */
export function parseTranscriptOutput(stdout: string): string {
  return stdout
    .split(/\r?\n/)
    .map(line => line.replace(/\[[^\]]*\]/g, ' ').trim())
    .filter(Boolean)
    .join(' ')
    .replace(/\s+/g, ' ')
    .trim()
}

function wasKilled(error: unknown): boolean {
  return error instanceof Error && 'killed' in error && error.killed === true
}

export class CommandTranscriber implements Transcriber {
  private readonly runCommand: RunCommand

  constructor(
    private readonly config: TranscriberConfig,
    private readonly options: { cacheDir: string; runCommand?: RunCommand }
  ) {
    this.runCommand = options.runCommand ?? defaultRunCommand
  }

  async warmup(): Promise<void> {
    if (this.config.modelPath) {
      try {
        await fs.access(this.config.modelPath)
      } catch (error) {
        throw new PipelineError('engine-unavailable', `转写模型不存在: ${this.config.modelPath}`, { cause: error })
      }
    }

    try {
      await this.runCommand(this.config.command, ['--help'], { timeout: WARMUP_TIMEOUT_MS })
    } catch (error) {
      // 部分 CLI 的 --help 以非零码退出，只有找不到命令才算不可用
      if (getErrnoCode(error) === 'ENOENT') {
        throw new PipelineError('engine-unavailable', `找不到转写命令: ${this.config.command}`, { cause: error })
      }
    }
    logger.info('转写引擎已就绪', { command: this.config.command, modelId: this.config.modelId })
  }

  async transcribe(wav: Buffer): Promise<TranscriptionResult> {
    const startTime = Date.now()
    await fs.mkdir(this.options.cacheDir, { recursive: true })
    const input = path.join(this.options.cacheDir, `holdtalk-${randomUUID()}.wav`)
    await fs.writeFile(input, wav)

    try {
      const args = buildTranscriberArgs(this.config.args, {
        input,
        model: this.config.modelPath,
        language: this.config.language,
      })
      logger.debug('调用转写命令', { command: this.config.command, args })

      let output: CommandOutput
      try {
        output = await this.runCommand(this.config.command, args, { timeout: this.config.timeoutMs })
      } catch (error) {
        throw this.mapFailure(error)
      }

      const text = parseTranscriptOutput(output.stdout)
      if (!text) {
        throw new PipelineError('empty', '转写结果为空')
      }

      const durationMs = Date.now() - startTime
      logger.info('转写完成', { modelId: this.config.modelId, duration: durationMs, chars: text.length })
      return {
        text,
        modelId: this.config.modelId,
        durationMs,
        language: this.config.language,
      }
    } finally {
      await fs.rm(input, { force: true }).catch((error: unknown) => {
        logger.warn('清理临时音频失败', { error: toError(error).message })
      })
    }
  }

  private mapFailure(error: unknown): PipelineError {
    if (getErrnoCode(error) === 'ENOENT') {
      return new PipelineError('engine-unavailable', `找不到转写命令: ${this.config.command}`, { cause: error })
    }
    if (wasKilled(error)) {
      return new PipelineError('engine-unavailable', `转写超时（${this.config.timeoutMs}ms）`, { cause: error })
    }
    return new PipelineError('engine-unavailable', `转写命令执行失败: ${toError(error).message}`, { cause: error })
  }
}
