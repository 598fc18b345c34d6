import fs from 'node:fs'
import path from 'node:path'
import type { DeliveryMode, SessionTimingConfig, ShortcutConfig } from '../../shared/app-state'
import { APP_CONSTANTS, DEFAULT_SHORTCUT, DEFAULT_TIMINGS } from './constants'
import { getBundledConfigDir, getConfigDir, ensureDir } from './paths'

export interface RecorderConfig {
  sampleRate: number
  channels: number
  /** 录音程序（SoX），需要在 PATH 中可用 */
  recorder: string
  /** 指定输入设备名称，留空则使用系统默认设备 */
  device?: string
  minDurationMs: number
}

export interface TranscriberConfig {
  engine: 'command'
  /** 本地转写命令，例如 whisper.cpp 的 whisper-cli */
  command: string
  /** 参数模板，支持 {input} {model} {language} 占位符 */
  args: string[]
  modelPath?: string
  language: string
  timeoutMs: number
  modelId: string
}

export interface CleanupConfig {
  /** OpenAI 兼容接口地址，默认指向本机 Ollama */
  baseUrl: string
  modelId: string
  apiKey?: string
  timeoutMs: number
  systemPrompt?: string
  minWordsForEngine: number
}

export interface AppSettings {
  shortcut: ShortcutConfig
  cleanupEnabled: boolean
  deliveryMode: DeliveryMode
  historyEnabled: boolean
  timings: SessionTimingConfig
}

type RawConfig = Record<string, unknown>

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readString(raw: RawConfig, key: string, fallback: string): string {
  const value = raw[key]
  return typeof value === 'string' && value.trim() ? value : fallback
}

function readOptionalString(raw: RawConfig, key: string, fallback?: string): string | undefined {
  const value = raw[key]
  return typeof value === 'string' && value.trim() ? value : fallback
}

function readBoolean(raw: RawConfig, key: string, fallback: boolean): boolean {
  const value = raw[key]
  return typeof value === 'boolean' ? value : fallback
}

/**
 * 读取非负数值；allowZero 为 false 时要求严格为正
 */
function readNumber(raw: RawConfig, key: string, fallback: number, allowZero = false): number {
  const value = raw[key]
  if (typeof value !== 'number' || !Number.isFinite(value)) return fallback
  if (value < 0 || (!allowZero && value === 0)) return fallback
  return value
}

function readStringArray(raw: RawConfig, key: string, fallback: string[]): string[] {
  const value = raw[key]
  if (!Array.isArray(value)) return fallback
  const items = value.filter((item): item is string => typeof item === 'string')
  return items.length === value.length ? items : fallback
}

function parseJsonFile(filePath: string): RawConfig | null {
  if (!fs.existsSync(filePath)) return null
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'))
  if (!isRecord(parsed)) {
    throw new Error(`${path.basename(filePath)} 格式不正确：应为 JSON 对象`)
  }
  return parsed
}

/**
 * 优先从用户配置目录加载，回退到项目内置配置，两者都没有时返回空对象
 */
function loadRawConfig(filename: string): RawConfig {
  try {
    return (
      parseJsonFile(path.join(getConfigDir(), filename)) ??
      parseJsonFile(path.join(getBundledConfigDir(), filename)) ??
      {}
    )
  } catch (error) {
    console.warn(`[config] Failed to read ${filename}, using defaults`, error)
    return {}
  }
}

export function normalizeTimings(raw: unknown): SessionTimingConfig {
  const source = isRecord(raw) ? raw : {}
  return {
    debounceMs: readNumber(source, 'debounceMs', DEFAULT_TIMINGS.debounceMs, true),
    failsafeMs: readNumber(source, 'failsafeMs', DEFAULT_TIMINGS.failsafeMs),
    maxRecordingMs: readNumber(source, 'maxRecordingMs', DEFAULT_TIMINGS.maxRecordingMs, true),
  }
}

function normalizeShortcut(raw: unknown): ShortcutConfig {
  const source = isRecord(raw) ? raw : {}
  return {
    accelerator: readString(source, 'accelerator', DEFAULT_SHORTCUT.accelerator),
    cancelAccelerator: readOptionalString(source, 'cancelAccelerator', DEFAULT_SHORTCUT.cancelAccelerator),
    repeatAccelerator: readOptionalString(source, 'repeatAccelerator', DEFAULT_SHORTCUT.repeatAccelerator),
    description: readString(source, 'description', DEFAULT_SHORTCUT.description),
  }
}

export function normalizeRecorderConfig(raw: RawConfig): RecorderConfig {
  return {
    sampleRate: readNumber(raw, 'sampleRate', 16000),
    channels: readNumber(raw, 'channels', 1),
    recorder: readString(raw, 'recorder', 'sox'),
    device: readOptionalString(raw, 'device'),
    minDurationMs: readNumber(raw, 'minDurationMs', APP_CONSTANTS.MIN_RECORDING_MS, true),
  }
}

export function normalizeTranscriberConfig(raw: RawConfig): TranscriberConfig {
  const modelPath = readOptionalString(raw, 'modelPath')
  return {
    engine: 'command',
    command: readString(raw, 'command', 'whisper-cli'),
    args: readStringArray(raw, 'args', ['-m', '{model}', '-f', '{input}', '-l', '{language}', '-nt', '-np']),
    modelPath,
    language: readString(raw, 'language', 'en'),
    timeoutMs: readNumber(raw, 'timeoutMs', APP_CONSTANTS.TRANSCRIBE_TIMEOUT_MS),
    modelId: readString(raw, 'modelId', modelPath ? path.basename(modelPath) : 'whisper.cpp'),
  }
}

export function normalizeCleanupConfig(raw: RawConfig): CleanupConfig {
  return {
    baseUrl: readString(raw, 'baseUrl', 'http://127.0.0.1:11434/v1'),
    modelId: readString(raw, 'modelId', 'llama3.2:3b'),
    apiKey: readOptionalString(raw, 'apiKey'),
    timeoutMs: readNumber(raw, 'timeoutMs', APP_CONSTANTS.CLEANUP_TIMEOUT_MS),
    systemPrompt: readOptionalString(raw, 'systemPrompt'),
    minWordsForEngine: readNumber(raw, 'minWordsForEngine', APP_CONSTANTS.MIN_WORDS_FOR_ENGINE, true),
  }
}

export function normalizeAppSettings(raw: RawConfig): AppSettings {
  const deliveryMode = raw.deliveryMode === 'print' ? 'print' : 'paste'
  return {
    shortcut: normalizeShortcut(raw.shortcut),
    cleanupEnabled: readBoolean(raw, 'cleanupEnabled', true),
    deliveryMode,
    historyEnabled: readBoolean(raw, 'historyEnabled', true),
    timings: normalizeTimings(raw.timings),
  }
}

export function loadRecorderConfig(): RecorderConfig {
  return normalizeRecorderConfig(loadRawConfig('audio.json'))
}

export function loadTranscriberConfig(): TranscriberConfig {
  return normalizeTranscriberConfig(loadRawConfig('transcriber.json'))
}

export function loadCleanupConfig(): CleanupConfig {
  return normalizeCleanupConfig(loadRawConfig('cleanup.json'))
}

export function loadAppSettings(): AppSettings {
  return normalizeAppSettings(loadRawConfig('settings.json'))
}

export function saveAppSettings(settings: Partial<AppSettings>): AppSettings {
  const updated: AppSettings = { ...loadAppSettings(), ...settings }
  const configDir = getConfigDir()
  ensureDir(configDir)
  fs.writeFileSync(path.join(configDir, 'settings.json'), JSON.stringify(updated, null, 2), 'utf-8')
  return updated
}

export * from './paths'
