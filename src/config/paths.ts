/**
 * HoldTalk 路径配置模块
 *
 * 提供用户数据目录与内置配置目录的动态检测
 * HOLDTALK_HOME 可覆盖用户数据目录，APP_ROOT 可覆盖项目根目录
 */

import path from 'node:path'
import os from 'node:os'
import fs from 'node:fs'

const APP_DIR_NAME = 'HoldTalk'

let cachedAppRoot: string | null = null

/**
 * 获取项目根目录
 * 从当前模块向上查找 package.json（兼容 src/ 直接运行与 dist/ 构建产物）
 */
export function getAppRoot(): string {
  if (process.env.APP_ROOT) {
    return process.env.APP_ROOT
  }
  if (cachedAppRoot) return cachedAppRoot

  let searchDir = __dirname
  const rootDir = path.parse(searchDir).root
  while (searchDir !== rootDir) {
    if (fs.existsSync(path.join(searchDir, 'package.json'))) {
      cachedAppRoot = searchDir
      return cachedAppRoot
    }
    searchDir = path.dirname(searchDir)
  }

  cachedAppRoot = process.cwd()
  return cachedAppRoot
}

/**
 * 获取用户数据目录
 * - macOS: ~/Library/Application Support/HoldTalk/
 * - Windows: %APPDATA%/HoldTalk/
 * - Linux: ~/.config/HoldTalk/
 */
export function getUserDataPath(): string {
  if (process.env.HOLDTALK_HOME) {
    return process.env.HOLDTALK_HOME
  }

  if (process.platform === 'darwin') {
    return path.join(os.homedir(), 'Library', 'Application Support', APP_DIR_NAME)
  }
  if (process.platform === 'win32') {
    return path.join(os.homedir(), 'AppData', 'Roaming', APP_DIR_NAME)
  }
  return path.join(os.homedir(), '.config', APP_DIR_NAME)
}

/**
 * 获取配置目录（用户配置）
 */
export function getConfigDir(): string {
  return path.join(getUserDataPath(), 'config')
}

/**
 * 获取项目内置配置目录（默认配置模板）
 */
export function getBundledConfigDir(): string {
  return path.join(getAppRoot(), 'config')
}

export function getLogsDir(): string {
  return path.join(getUserDataPath(), 'logs')
}

export function getHistoryDir(): string {
  return path.join(getUserDataPath(), 'history')
}

/**
 * 临时音频目录，转写完成后即删除
 */
export function getCacheDir(): string {
  return path.join(getUserDataPath(), 'cache')
}

/**
 * 确保目录存在
 */
export function ensureDir(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true })
  }
}

/**
 * 初始化所有必要的目录
 */
export function initializeDirectories(): void {
  const dirs = [getUserDataPath(), getConfigDir(), getLogsDir(), getHistoryDir(), getCacheDir()]
  for (const dir of dirs) {
    ensureDir(dir)
  }
}
