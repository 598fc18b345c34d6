import { parseArgs } from 'node:util'
import { loadAppSettings, type AppSettings } from './config'

export const USAGE = `用法: holdtalk [选项]

  --no-cleanup          关闭文本清理，直接投递转写结果
  --print               输出到标准输出，而不是粘贴到前台应用
  --accelerator <key>   按住录音的快捷键（默认 MetaRight）
  --stats               打印历史统计后退出
  -h, --help            显示帮助`

export interface CliOptions {
  help: boolean
  stats: boolean
  settings: Partial<AppSettings>
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      'no-cleanup': { type: 'boolean', default: false },
      print: { type: 'boolean', default: false },
      accelerator: { type: 'string' },
      stats: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
  })

  const settings: Partial<AppSettings> = {}
  if (values['no-cleanup']) {
    settings.cleanupEnabled = false
  }
  if (values.print) {
    settings.deliveryMode = 'print'
  }
  if (values.accelerator) {
    settings.shortcut = { ...loadAppSettings().shortcut, accelerator: values.accelerator }
  }
  return { help: values.help === true, stats: values.stats === true, settings }
}
