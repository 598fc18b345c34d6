/**
 * HoldTalk 结构化日志系统
 *
 * 基于 pino 实现的日志系统，支持：
 * - 结构化日志输出
 * - 上下文传递
 * - 性能追踪
 * - 文件输出（生产环境）
 */

import pino from 'pino'
import path from 'node:path'
import { ensureDir, getLogsDir } from '../config/paths'

export interface LogContext {
  sessionId?: number
  operation?: string
  duration?: number
  [key: string]: unknown
}

interface LoggerConfig {
  level: pino.LevelWithSilent
  enableFile: boolean
  enableConsole: boolean
}

const LEVELS: readonly pino.LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']

function resolveLevel(raw: string | undefined): pino.LevelWithSilent {
  return LEVELS.find(level => level === raw) ?? 'info'
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: resolveLevel(process.env.LOG_LEVEL),
  enableFile: process.env.NODE_ENV === 'production',
  enableConsole: process.env.NODE_ENV !== 'test',
}

/**
 * 创建 pino 日志实例
 */
function createPinoLogger(config: LoggerConfig): pino.Logger {
  const targets: pino.TransportTargetOptions[] = []

  if (config.enableConsole) {
    targets.push({
      target: 'pino-pretty',
      level: config.level,
      options: {
        colorize: true,
        translateTime: 'SYS:HH:MM:ss',
        ignore: 'pid,hostname',
        // 标准输出留给 print 投递模式
        destination: 2,
      },
    })
  }

  if (config.enableFile) {
    const logDir = getLogsDir()
    ensureDir(logDir)
    const logFile = path.join(logDir, `holdtalk-${new Date().toISOString().split('T')[0]}.log`)
    targets.push({
      target: 'pino/file',
      level: config.level,
      options: { destination: logFile },
    })
  }

  if (targets.length === 0 || config.level === 'silent') {
    return pino({ level: 'silent' })
  }

  return pino({
    level: config.level,
    base: { app: 'HoldTalk' },
    timestamp: pino.stdTimeFunctions.isoTime,
    transport: { targets },
  })
}

/**
 * Logger 类
 *
 * 提供统一的日志接口，支持上下文传递和子日志器创建
 */
export class Logger {
  private logger: pino.Logger
  private readonly context: LogContext

  constructor(context: LogContext = {}, base?: pino.Logger) {
    this.logger = base ?? createPinoLogger(DEFAULT_CONFIG)
    this.context = context
  }

  info(message: string, context?: LogContext): void {
    this.logger.info({ ...this.context, ...context }, message)
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn({ ...this.context, ...context }, message)
  }

  /**
   * 错误级别日志
   */
  error(error: Error | string, context?: LogContext): void {
    if (error instanceof Error) {
      this.logger.error({ err: error, ...this.context, ...context }, error.message)
    } else {
      this.logger.error({ ...this.context, ...context }, error)
    }
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug({ ...this.context, ...context }, message)
  }

  /**
   * 创建子日志器，继承当前上下文并共享底层 transport
   */
  child(context: LogContext): Logger {
    return new Logger({ ...this.context, ...context }, this.logger)
  }

  /**
   * 计时器：开始计时，返回的函数结束计时并写日志
   */
  startTimer(operation: string): () => number {
    const start = Date.now()
    return () => {
      const duration = Date.now() - start
      this.debug(`${operation} 完成`, { operation, duration })
      return duration
    }
  }

  /**
   * 刷新缓冲区（退出前调用）
   */
  flush(): void {
    this.logger.flush()
  }
}

/**
 * 全局日志实例
 */
export const logger = new Logger({ module: 'main' })

/**
 * 创建模块专用日志器
 */
export function createModuleLogger(moduleName: string): Logger {
  return logger.child({ module: moduleName })
}
