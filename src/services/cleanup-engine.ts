/**
 * HoldTalk 文本清理引擎
 *
 * 使用本机 OpenAI-compatible 接口（默认 Ollama）清理转写文本。
 * 引擎输出必须是纯文本；夹带说明文字、被截断或调用失败时，
 * 丢弃引擎结果，改用本地格式化
 */

import type { CleanupConfig } from '../config'
import { APP_CONSTANTS } from '../config/constants'
import { PipelineError, toError } from '../utils/errors'
import { createModuleLogger } from '../utils/logger'
import { countWords, formatTranscript } from './text-formatter'

const logger = createModuleLogger('cleanup-engine')

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export type FallbackReason = 'too-short' | 'commentary' | 'truncated' | 'engine-failed'

export interface CleanupResult {
  text: string
  /** 最终文本是否来自引擎 */
  engineUsed: boolean
  fallbackReason?: FallbackReason
  durationMs: number
}

const DEFAULT_CLEANUP_PROMPT = `Format this transcription. Output ONLY the formatted text.

Rules:
- Fix grammar and punctuation
- Add quotation marks around dialogue (spoken words)
- Remove filler words (um, uh, like, you know)
- Keep all meaning and content intact
- Output the formatted text only, no explanations, no preface

Example:
Input: he said what are you doing here I said I dont know
Output: He said, "What are you doing here?" I said, "I don't know."`

// 只匹配真正的前言：Here's the / Here is your，或标记词后不远处跟冒号
const COMMENTARY_PREFACE =
  /^\s*(?:here(?:['’]s|\s+is)\s+(?:the|your)\b|(?:the\s+)?(?:cleaned|formatted|output|result)\b[^:\n.!?]{0,24}:|-\s)/i
const COMMENTARY_PHRASES = /\b(?:it seems|i can|the text|however|here is)\b/i

/**
 * 判断引擎输出是否夹带说明文字
 */
export function hasCommentary(output: string): boolean {
  return COMMENTARY_PREFACE.test(output) || COMMENTARY_PHRASES.test(output)
}

export type SanitizeResult = { accepted: true; text: string } | { accepted: false; reason: 'commentary' | 'truncated' }

/**
 * 校验引擎输出是否满足纯文本约定
 */
export function sanitizeEngineOutput(output: string, transcript: string): SanitizeResult {
  const trimmed = output.trim()
  if (hasCommentary(trimmed)) {
    return { accepted: false, reason: 'commentary' }
  }
  if (!trimmed || trimmed.length < transcript.trim().length * APP_CONSTANTS.MIN_CLEANUP_RATIO) {
    return { accepted: false, reason: 'truncated' }
  }
  return { accepted: true, text: trimmed }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

/**
 * 从 chat/completions 响应中取出第一条回复内容
 */
function extractContent(data: unknown): string | undefined {
  if (!isRecord(data) || !Array.isArray(data.choices)) return undefined
  const first: unknown = data.choices[0]
  if (!isRecord(first) || !isRecord(first.message)) return undefined
  const content = first.message.content
  return typeof content === 'string' ? content : undefined
}

function extractApiError(data: unknown): string | undefined {
  if (!isRecord(data) || !isRecord(data.error)) return undefined
  const message = data.error.message
  return typeof message === 'string' ? message : 'API 返回错误'
}

function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.trim().replace(/\/+$/, '')
}

/**
 * 文本清理引擎类
 */
export class CleanupEngine {
  private readonly config: CleanupConfig
  private readonly fetchImpl: FetchLike

  constructor(config: CleanupConfig, options: { fetch?: FetchLike } = {}) {
    this.config = config
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init))
  }

  /**
   * 启动时探测接口是否可达
   */
  async warmup(): Promise<void> {
    const url = `${normalizeBaseUrl(this.config.baseUrl)}/models`
    let response: Response
    try {
      response = await this.request(url, { method: 'GET' })
    } catch (error) {
      throw new PipelineError('engine-unavailable', `清理引擎不可达: ${toError(error).message}`, { cause: error })
    }
    if (!response.ok) {
      throw new PipelineError('engine-unavailable', `清理引擎探测失败: HTTP ${response.status}`)
    }
    logger.info('清理引擎已就绪', { baseUrl: this.config.baseUrl, modelId: this.config.modelId })
  }

  /**
   * 调用引擎，返回原始回复文本
   * 不可达/超时抛 engine-unavailable，响应结构不对抛 malformed
   */
  async complete(rawText: string): Promise<string> {
    const url = `${normalizeBaseUrl(this.config.baseUrl)}/chat/completions`
    const body = JSON.stringify({
      model: this.config.modelId,
      messages: [
        { role: 'system', content: this.config.systemPrompt || DEFAULT_CLEANUP_PROMPT },
        { role: 'user', content: rawText },
      ],
      temperature: 0.2,
      max_tokens: Math.min(countWords(rawText) * 2 + 16, 512),
      stream: false,
    })

    let response: Response
    try {
      response = await this.request(url, { method: 'POST', body })
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new PipelineError('engine-unavailable', `清理超时（${this.config.timeoutMs / 1000}秒）`, { cause: error })
      }
      throw new PipelineError('engine-unavailable', `清理引擎请求失败: ${toError(error).message}`, { cause: error })
    }

    if (!response.ok) {
      throw new PipelineError('engine-unavailable', `API 请求失败: HTTP ${response.status}`)
    }

    let data: unknown
    try {
      data = await response.json()
    } catch (error) {
      throw new PipelineError('malformed', '清理引擎返回的不是 JSON', { cause: error })
    }

    const apiError = extractApiError(data)
    if (apiError) {
      throw new PipelineError('malformed', apiError)
    }
    const content = extractContent(data)
    if (content === undefined) {
      throw new PipelineError('malformed', 'API 未返回有效的清理结果')
    }
    return content
  }

  /**
   * 清理转写文本；任何失败都回退到本地格式化，不会抛错
   */
  async clean(transcript: string): Promise<CleanupResult> {
    const startTime = Date.now()
    const fallback = (reason: FallbackReason): CleanupResult => ({
      text: formatTranscript(transcript),
      engineUsed: false,
      fallbackReason: reason,
      durationMs: Date.now() - startTime,
    })

    if (countWords(transcript) < this.config.minWordsForEngine) {
      return fallback('too-short')
    }

    logger.info('开始清理', { modelId: this.config.modelId, textLength: transcript.length })

    let output: string
    try {
      output = await this.complete(transcript)
    } catch (error) {
      logger.warn('清理引擎失败，使用本地格式化', { error: toError(error).message })
      return fallback('engine-failed')
    }

    const sanitized = sanitizeEngineOutput(output, transcript)
    if (!sanitized.accepted) {
      logger.warn('清理结果不符合纯文本约定，使用本地格式化', { reason: sanitized.reason })
      return fallback(sanitized.reason)
    }

    const durationMs = Date.now() - startTime
    logger.info('清理完成', { duration: durationMs, inputLength: transcript.length, outputLength: sanitized.text.length })
    return { text: sanitized.text, engineUsed: true, durationMs }
  }

  private async request(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs)
    const headers: Record<string, string> = { 'Content-Type': 'application/json' }
    if (this.config.apiKey) {
      headers.Authorization = `Bearer ${this.config.apiKey}`
    }
    try {
      return await this.fetchImpl(url, { ...init, headers, signal: controller.signal })
    } finally {
      clearTimeout(timeoutId)
    }
  }
}
