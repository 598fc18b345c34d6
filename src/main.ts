#!/usr/bin/env node
/**
 * HoldTalk 命令行入口
 */

import { parseCliArgs, USAGE, type CliOptions } from './cli-options'
import { getHistoryDir } from './config'
import { AppController } from './core/app-controller'
import { createUiohookKeyboard, uiohookKeycode } from './services/uiohook'
import { TranscriptStore } from './storage/transcript-store'
import { toError } from './utils/errors'
import { logger } from './utils/logger'

async function printStats(): Promise<void> {
  const stats = await new TranscriptStore(getHistoryDir()).getStats()
  process.stdout.write(
    [
      `转写次数: ${stats.totalTranscriptions}`,
      `总词数: ${stats.totalWords}`,
      `总时长: ${stats.totalMinutes} 分钟`,
      `平均语速: ${stats.avgWpm} 词/分钟`,
      `今日: ${stats.todayCount} 次，${stats.todayWords} 词`,
    ].join('\n') + '\n'
  )
}

async function main(): Promise<void> {
  let options: CliOptions
  try {
    options = parseCliArgs(process.argv.slice(2))
  } catch (error) {
    process.stderr.write(`${toError(error).message}\n\n${USAGE}\n`)
    process.exitCode = 2
    return
  }

  if (options.help) {
    process.stdout.write(`${USAGE}\n`)
    return
  }
  if (options.stats) {
    await printStats()
    return
  }

  const controller = new AppController({
    keyboardHook: createUiohookKeyboard(),
    keycodeLookup: uiohookKeycode,
    settings: options.settings,
  })

  let shuttingDown = false
  const shutdown = (signal: string) => {
    if (shuttingDown) return
    shuttingDown = true
    logger.info(`收到 ${signal}，正在退出`)
    controller.destroy().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error(toError(error))
        process.exit(1)
      }
    )
  }
  process.on('SIGINT', () => shutdown('SIGINT'))
  process.on('SIGTERM', () => shutdown('SIGTERM'))

  const hookStarted = await controller.init()
  if (!hookStarted) {
    logger.error('键盘监听启动失败，请检查快捷键配置和辅助功能权限')
    await controller.destroy()
    process.exitCode = 1
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error(toError(error), { operation: 'main' })
    process.exitCode = 1
  })
}
