/**
 * HoldTalk 错误分类
 *
 * 每类错误携带 kind 判别字段，协调器据此决定是否对用户可见
 */

import type { ErrorCode, ErrorInfo } from '../../shared/app-state'

export type CaptureErrorKind = 'device-unavailable' | 'too-short'
export type PipelineErrorKind = 'engine-unavailable' | 'empty' | 'malformed'
export type DeliveryErrorKind = 'sink-unavailable'
export type TimeoutErrorKind = 'failsafe-triggered'

export abstract class AppError<K extends ErrorCode = ErrorCode> extends Error {
  readonly kind: K

  constructor(kind: K, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.kind = kind
  }
}

/**
 * 录音设备错误：设备不可用，或录音过短（业务规则，非硬件故障）
 */
export class CaptureError extends AppError<CaptureErrorKind> {
  name = 'CaptureError'
}

export class PipelineError extends AppError<PipelineErrorKind> {
  name = 'PipelineError'
}

export class DeliveryError extends AppError<DeliveryErrorKind> {
  name = 'DeliveryError'
}

export class TimeoutError extends AppError<TimeoutErrorKind> {
  name = 'TimeoutError'
}

/**
 * 将任意抛出值规范为 Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}

export function isCaptureError(error: unknown, kind?: CaptureErrorKind): error is CaptureError {
  return error instanceof CaptureError && (kind === undefined || error.kind === kind)
}

/**
 * 转换为可序列化的错误描述
 */
export function describeError(error: unknown): ErrorInfo {
  if (error instanceof AppError) {
    return { code: error.kind, message: error.message }
  }
  return { code: 'unknown', message: toError(error).message }
}

/**
 * 读取 Node 系统错误码（ENOENT 等）
 */
export function getErrnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}
