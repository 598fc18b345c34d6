import fs from 'node:fs/promises'
import path from 'node:path'
import { randomUUID } from 'node:crypto'
import type { ErrorCode, ErrorInfo, SessionEvent } from '../../shared/app-state'
import type { TranscriptRecord, TranscriptStats } from '../../shared/transcript'
import { countWords } from '../services/text-formatter'
import { getErrnoCode, toError } from '../utils/errors'
import { createModuleLogger } from '../utils/logger'

const logger = createModuleLogger('transcript-store')

/** UUID 格式正则表达式 */
const UUID_PATTERN = /^[a-f0-9]{8}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{12}$/i

const DAY_MS = 24 * 60 * 60 * 1000

const ERROR_CODES: readonly ErrorCode[] = [
  'device-unavailable',
  'too-short',
  'engine-unavailable',
  'empty',
  'malformed',
  'sink-unavailable',
  'failsafe-triggered',
  'unknown',
]

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function parseErrorInfo(value: unknown): ErrorInfo | undefined {
  if (!isRecord(value) || typeof value.message !== 'string') return undefined
  const code = ERROR_CODES.find(item => item === value.code) ?? 'unknown'
  return { code, message: value.message }
}

/**
 * 校验 meta.json 内容，字段缺失或类型不对时返回 null
 */
export function parseTranscriptRecord(raw: unknown): TranscriptRecord | null {
  if (!isRecord(raw)) return null
  const { id, sessionId, createdAt, durationMs, wordCount, cleanupUsed } = raw
  if (typeof id !== 'string' || typeof sessionId !== 'number' || typeof createdAt !== 'number') return null
  return {
    id,
    sessionId,
    createdAt,
    durationMs: typeof durationMs === 'number' ? durationMs : 0,
    text: optionalString(raw.text),
    rawText: optionalString(raw.rawText),
    wordCount: typeof wordCount === 'number' ? wordCount : 0,
    modelId: optionalString(raw.modelId),
    cleanupUsed: cleanupUsed === true,
    error: parseErrorInfo(raw.error),
  }
}

/**
 * 由会话结果事件生成历史记录；只记录已投递和失败的会话
 */
export function createTranscriptRecord(event: SessionEvent, createdAt = Date.now()): TranscriptRecord | null {
  if (event.type !== 'outcome') return null
  const { outcome } = event
  const base = {
    id: randomUUID(),
    sessionId: event.sessionId,
    createdAt,
    durationMs: event.audioDurationMs ?? event.timings.recordingMs ?? 0,
  }

  if (outcome.kind === 'delivered') {
    return {
      ...base,
      text: outcome.text,
      rawText: outcome.rawText,
      wordCount: countWords(outcome.text),
      modelId: outcome.modelId,
      cleanupUsed: outcome.cleanupUsed,
    }
  }
  if (outcome.kind === 'failed') {
    return { ...base, wordCount: 0, cleanupUsed: false, error: outcome.error }
  }
  return null
}

/**
 * 判断是否为预期的文件读取错误（文件不存在或JSON解析失败）
 */
function isExpectedMetaError(error: unknown): boolean {
  return error instanceof SyntaxError || getErrnoCode(error) === 'ENOENT'
}

function startOfDay(now: number): number {
  const date = new Date(now)
  date.setHours(0, 0, 0, 0)
  return date.getTime()
}

export interface ListOptions {
  limit?: number
  offset?: number
}

/**
 * 转写历史：每条记录一个目录，目录下一个 meta.json
 */
export class TranscriptStore {
  constructor(private readonly baseDir: string) {}

  async save(record: TranscriptRecord): Promise<string> {
    // 验证 ID 格式，防止路径遍历
    if (!UUID_PATTERN.test(record.id)) {
      throw new Error(`记录ID无效: ${record.id}`)
    }
    const recordDir = path.join(this.baseDir, record.id)
    await fs.mkdir(recordDir, { recursive: true })
    const metaPath = path.join(recordDir, 'meta.json')
    await fs.writeFile(metaPath, JSON.stringify(record, null, 2), 'utf-8')
    return metaPath
  }

  /**
   * 记录一次会话结果；不需要记录的结果返回 null
   */
  async recordOutcome(event: SessionEvent): Promise<TranscriptRecord | null> {
    const record = createTranscriptRecord(event)
    if (!record) return null
    await this.save(record)
    logger.debug('历史记录已保存', { sessionId: record.sessionId, recordId: record.id })
    return record
  }

  /**
   * 获取历史记录列表
   * @returns 按时间倒序排列的记录
   */
  async list(options: ListOptions = {}): Promise<TranscriptRecord[]> {
    const { limit = 50, offset = 0 } = options
    const records = await this.readAll()
    records.sort((a, b) => b.createdAt - a.createdAt)
    return records.slice(offset, offset + limit)
  }

  async get(id: string): Promise<TranscriptRecord | null> {
    if (!UUID_PATTERN.test(id)) {
      return null
    }
    try {
      return await this.readMeta(id)
    } catch (error) {
      if (isExpectedMetaError(error)) {
        return null
      }
      throw error
    }
  }

  async delete(id: string): Promise<boolean> {
    if (!UUID_PATTERN.test(id)) {
      logger.warn('删除失败：无效的记录 ID 格式', { recordId: id })
      return false
    }
    const recordDir = path.join(this.baseDir, id)
    try {
      await fs.access(recordDir)
    } catch (error) {
      if (getErrnoCode(error) === 'ENOENT') return false
      throw error
    }
    await fs.rm(recordDir, { recursive: true, force: true })
    logger.info('记录已删除', { recordId: id })
    return true
  }

  /**
   * 按时间范围清除历史记录
   * @param maxAgeDays 清除多少天前的记录，0 表示清除全部
   */
  async clearByAge(maxAgeDays: number, now = Date.now()): Promise<{ deletedCount: number }> {
    let deletedCount = 0
    const maxAgeMs = maxAgeDays * DAY_MS

    for (const name of await this.listRecordDirs()) {
      let shouldDelete = maxAgeDays === 0
      if (!shouldDelete) {
        try {
          const record = await this.readMeta(name)
          // 内容无法识别的记录同样视为过期
          shouldDelete = !record || now - record.createdAt > maxAgeMs
        } catch (error) {
          if (isExpectedMetaError(error)) {
            shouldDelete = true
          } else {
            // 非预期错误（权限、IO等）跳过该记录，避免误删
            logger.error(toError(error), { operation: 'clearByAge', recordId: name })
          }
        }
      }

      if (shouldDelete) {
        await fs.rm(path.join(this.baseDir, name), { recursive: true, force: true })
        deletedCount++
      }
    }

    return { deletedCount }
  }

  /**
   * 统计已投递的转写：总数、总词数、总时长、平均语速、今日数据
   */
  async getStats(now = Date.now()): Promise<TranscriptStats> {
    const records = (await this.readAll()).filter(record => record.text !== undefined)
    const todayStart = startOfDay(now)

    let totalWords = 0
    let totalDurationMs = 0
    let todayCount = 0
    let todayWords = 0
    for (const record of records) {
      totalWords += record.wordCount
      totalDurationMs += record.durationMs
      if (record.createdAt >= todayStart) {
        todayCount++
        todayWords += record.wordCount
      }
    }

    const totalMinutes = totalDurationMs / 60_000
    return {
      totalTranscriptions: records.length,
      totalWords,
      totalMinutes: Math.round(totalMinutes * 10) / 10,
      avgWpm: totalMinutes > 0 ? Math.round((totalWords / totalMinutes) * 10) / 10 : 0,
      todayCount,
      todayWords,
    }
  }

  private async listRecordDirs(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.baseDir, { withFileTypes: true })
      return entries.filter(entry => entry.isDirectory() && UUID_PATTERN.test(entry.name)).map(entry => entry.name)
    } catch (error) {
      if (getErrnoCode(error) === 'ENOENT') {
        return []
      }
      throw error
    }
  }

  private async readMeta(id: string): Promise<TranscriptRecord | null> {
    const metaContent = await fs.readFile(path.join(this.baseDir, id, 'meta.json'), 'utf-8')
    const parsed: unknown = JSON.parse(metaContent)
    return parseTranscriptRecord(parsed)
  }

  private async readAll(): Promise<TranscriptRecord[]> {
    const records: TranscriptRecord[] = []
    for (const name of await this.listRecordDirs()) {
      try {
        const record = await this.readMeta(name)
        if (record) records.push(record)
      } catch (error) {
        // 跳过无法读取的记录
        if (!isExpectedMetaError(error)) {
          logger.warn('读取历史记录失败', { recordId: name, error: toError(error).message })
        }
      }
    }
    return records
  }
}
