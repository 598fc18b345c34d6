import { execFile } from 'node:child_process'
import { promisify } from 'node:util'
import type { DeliverySink } from './index'
import { DeliveryError, toError } from '../utils/errors'
import { createModuleLogger } from '../utils/logger'

const logger = createModuleLogger('apple-script')

const execFileAsync = promisify(execFile)

/** 每一步之间的等待，确保剪贴板更新/粘贴完成 */
const STEP_DELAY_MS = 100
const SCRIPT_TIMEOUT_MS = 5000

export type ScriptRunner = (script: string) => Promise<string>

const runOsaScript: ScriptRunner = async (script) => {
  // 通过参数传入脚本，不经过 shell
  const { stdout } = await execFileAsync('osascript', ['-e', script], { timeout: SCRIPT_TIMEOUT_MS, encoding: 'utf-8' })
  return stdout
}

/**
 * 处理 AppleScript 字符串字面量中的特殊字符
 */
export function escapeAppleScriptText(text: string): string {
  return text
    .replace(/\\/g, '\\\\')  // 反斜杠
    .replace(/"/g, '\\"')    // 双引号
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t')
}

export interface AppleScriptInserterOptions {
  platform?: NodeJS.Platform
  runScript?: ScriptRunner
  delay?: (ms: number) => Promise<void>
}

/**
 * AppleScript 文本注入器
 * 剪贴板 + ⌘V 粘贴到前台应用，完成后恢复原剪贴板内容
 */
export class AppleScriptTextInserter implements DeliverySink {
  readonly name = 'apple-script'
  private readonly available: boolean
  private readonly runScript: ScriptRunner
  private readonly delay: (ms: number) => Promise<void>

  constructor(options: AppleScriptInserterOptions = {}) {
    this.available = (options.platform ?? process.platform) === 'darwin'
    this.runScript = options.runScript ?? runOsaScript
    this.delay = options.delay ?? (ms => new Promise(resolve => setTimeout(resolve, ms)))
  }

  async deliver(text: string): Promise<void> {
    if (!this.available) {
      throw new DeliveryError('sink-unavailable', 'AppleScript 仅在 macOS 上可用')
    }

    const originalClipboard = await this.readClipboard()

    try {
      await this.runScript(`set the clipboard to "${escapeAppleScriptText(text)}"`)
      await this.delay(STEP_DELAY_MS)
      await this.runScript('tell application "System Events" to keystroke "v" using command down')
      await this.delay(STEP_DELAY_MS)
      logger.debug('文本已粘贴', { chars: text.length })
    } catch (error) {
      throw new DeliveryError('sink-unavailable', `粘贴失败: ${toError(error).message}`, { cause: error })
    } finally {
      await this.restoreClipboard(originalClipboard)
    }
  }

  private async readClipboard(): Promise<string | null> {
    try {
      return await this.runScript('the clipboard as text')
    } catch (error) {
      // 剪贴板为空或不是文本
      logger.debug('读取剪贴板失败', { error: toError(error).message })
      return null
    }
  }

  private async restoreClipboard(content: string | null): Promise<void> {
    if (content === null) return
    try {
      // osascript 输出末尾带换行
      await this.runScript(`set the clipboard to "${escapeAppleScriptText(content.replace(/\n$/, ''))}"`)
      logger.debug('已恢复剪贴板内容')
    } catch (error) {
      logger.warn('恢复剪贴板失败', { error: toError(error).message })
    }
  }
}
