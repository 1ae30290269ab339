/**
 * 统一日志系统
 *
 * - 分级日志（debug/info/warn/error），按 scope 创建
 * - 全部写到 stderr：stdout 只留给命令结果，方便管道使用
 *
 * 使用：
 * - const logger = createLogger('config')
 * - setLogLevel('debug')（CLI 的 --verbose）
 */

import chalk from 'chalk'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

const LEVEL_COLORS: Record<Exclude<LogLevel, 'silent'>, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
}

const LEVEL_LABELS: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: 'DBG',
  info: 'INF',
  warn: 'WRN',
  error: 'ERR',
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY
}

// ============ 全局状态 ============

// 从环境变量初始化日志级别；CLI 默认只输出警告
function initLogLevel(): LogLevel {
  if (process.env.NODE_ENV === 'test') return 'silent'
  if (process.env.SILENT === '1') return 'silent'
  if (process.env.DEBUG === '1') return 'debug'
  const level = process.env.LCP_LOG_LEVEL
  if (level && isLogLevel(level)) return level
  return 'warn'
}

let currentLevel: LogLevel = initLogLevel()

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

export function getLogLevel(): LogLevel {
  return currentLevel
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel]
}

function formatTime(): string {
  const now = new Date()
  return chalk.dim(
    `${now.getHours().toString().padStart(2, '0')}:${now.getMinutes().toString().padStart(2, '0')}:${now.getSeconds().toString().padStart(2, '0')}`
  )
}

function formatMessage(
  level: Exclude<LogLevel, 'silent'>,
  scope: string,
  message: string
): string {
  const color = LEVEL_COLORS[level]
  const label = LEVEL_LABELS[level]
  const scopeStr = scope ? ` ${chalk.cyan(`[${scope}]`)}` : ''
  return `${formatTime()} ${color(label)}${scopeStr} ${message}`
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

export function createLogger(scope: string = ''): Logger {
  function logWithLevel(
    level: Exclude<LogLevel, 'silent'>,
    message: string,
    args: unknown[]
  ): void {
    if (!shouldLog(level)) return
    console.error(formatMessage(level, scope, message), ...args)
  }

  return {
    debug(message: string, ...args: unknown[]) {
      logWithLevel('debug', message, args)
    },
    info(message: string, ...args: unknown[]) {
      logWithLevel('info', message, args)
    },
    warn(message: string, ...args: unknown[]) {
      logWithLevel('warn', message, args)
    },
    error(message: string, ...args: unknown[]) {
      logWithLevel('error', message, args)
    },
  }
}
