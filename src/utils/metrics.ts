/**
 * HoldTalk 性能监控
 *
 * 收集各阶段耗时：编码、转写、清理、投递
 */

import { createModuleLogger } from './logger'

const logger = createModuleLogger('metrics')

export type MetricOperation = 'encode' | 'transcription' | 'cleanup' | 'delivery'

/**
 * 单次操作的性能指标
 */
export interface PerformanceMetric {
  operation: MetricOperation
  startTime: number
  duration: number
  metadata?: Record<string, unknown>
}

/**
 * 聚合统计数据
 */
export interface AggregatedStats {
  count: number
  totalDuration: number
  avgDuration: number
  minDuration: number
  maxDuration: number
  lastUpdated: number
}

export class MetricsCollector {
  private readonly stats = new Map<MetricOperation, AggregatedStats>()
  private readonly activeTimers = new Map<string, number>()
  private timerSeq = 0

  constructor(private readonly now: () => number = Date.now) {}

  /**
   * 开始计时
   * @returns 计时器 ID
   */
  startTimer(operation: MetricOperation, timerId?: string): string {
    const id = timerId ?? `${operation}_${++this.timerSeq}`
    this.activeTimers.set(id, this.now())
    return id
  }

  /**
   * 结束计时并记录指标；计时器不存在时返回 null
   */
  endTimer(timerId: string, operation: MetricOperation, metadata?: Record<string, unknown>): PerformanceMetric | null {
    const startTime = this.activeTimers.get(timerId)
    if (startTime === undefined) {
      logger.warn(`计时器不存在: ${timerId}`)
      return null
    }

    this.activeTimers.delete(timerId)
    const metric: PerformanceMetric = {
      operation,
      startTime,
      duration: this.now() - startTime,
      metadata,
    }
    this.recordMetric(metric)
    return metric
  }

  /**
   * 计时执行一个异步操作，无论成功失败都记录耗时
   */
  async measure<T>(operation: MetricOperation, task: () => Promise<T>): Promise<{ value: T; duration: number }> {
    const timerId = this.startTimer(operation)
    try {
      const value = await task()
      const metric = this.endTimer(timerId, operation)
      return { value, duration: metric?.duration ?? 0 }
    } catch (error) {
      this.endTimer(timerId, operation, { failed: true })
      throw error
    }
  }

  recordMetric(metric: PerformanceMetric): void {
    this.updateStats(metric)
    logger.debug(`记录指标: ${metric.operation}`, { duration: metric.duration })
  }

  private updateStats(metric: PerformanceMetric): void {
    const existing = this.stats.get(metric.operation)
    const now = this.now()
    if (existing) {
      existing.count++
      existing.totalDuration += metric.duration
      existing.avgDuration = Math.round(existing.totalDuration / existing.count)
      existing.minDuration = Math.min(existing.minDuration, metric.duration)
      existing.maxDuration = Math.max(existing.maxDuration, metric.duration)
      existing.lastUpdated = now
    } else {
      this.stats.set(metric.operation, {
        count: 1,
        totalDuration: metric.duration,
        avgDuration: metric.duration,
        minDuration: metric.duration,
        maxDuration: metric.duration,
        lastUpdated: now,
      })
    }
  }

  getStats(operation: MetricOperation): AggregatedStats | null {
    const stats = this.stats.get(operation)
    return stats ? { ...stats } : null
  }

  getAllStats(): Partial<Record<MetricOperation, AggregatedStats>> {
    const result: Partial<Record<MetricOperation, AggregatedStats>> = {}
    this.stats.forEach((value, key) => {
      result[key] = { ...value }
    })
    return result
  }
}

/**
 * 全局性能收集器实例
 */
export const metrics = new MetricsCollector()
