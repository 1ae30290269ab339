/**
 * 统一错误处理
 * 错误分类 + 修复建议；prefix 核心函数是全函数，不会抛错，这里只服务 CLI 与配置层
 */

import chalk from 'chalk'
import { getErrorMessage } from './assertError.js'

// ============ 错误分类定义 ============

export type ErrorCategory =
  | 'CONFIG' // 配置错误
  | 'VALIDATION' // 输入验证错误（参数缺失等）
  | 'UNKNOWN' // 未知错误

export type ErrorCode = 'USAGE' | 'CONFIG_INVALID' | 'UNKNOWN'

// ============ 统一错误类 ============

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly category: ErrorCategory = 'UNKNOWN',
    public readonly cause?: unknown,
    public readonly suggestion?: string
  ) {
    super(message)
    this.name = 'AppError'
  }

  /**
   * 格式化错误输出到终端
   */
  format(): string {
    const lines: string[] = []
    const colorFn = categoryColors[this.category]

    lines.push('')
    lines.push(
      chalk.red('✗') + ' ' + chalk.bold('错误') + ` [${colorFn(categoryLabels[this.category])}]`
    )
    lines.push('')
    lines.push(chalk.dim(`  代码: ${this.code}`))
    lines.push(`  ${this.message}`)

    if (this.suggestion) {
      lines.push('')
      lines.push(chalk.cyan('  建议修复:'))
      lines.push(chalk.dim('    →') + ` ${this.suggestion}`)
    }

    lines.push('')
    return lines.join('\n')
  }

  // ============ 工厂方法 ============

  static usage(usageLine: string): AppError {
    return new AppError('USAGE', usageLine, 'VALIDATION')
  }

  static configInvalid(reason: string, cause?: unknown): AppError {
    return new AppError(
      'CONFIG_INVALID',
      `Invalid config: ${reason}`,
      'CONFIG',
      cause,
      '检查 .lcp.yaml 的格式（placeholder / format）'
    )
  }

  static unknown(cause: unknown): AppError {
    return new AppError('UNKNOWN', getErrorMessage(cause), 'UNKNOWN', cause)
  }
}

// ============ 格式化输出 ============

const categoryLabels: Record<ErrorCategory, string> = {
  CONFIG: '配置',
  VALIDATION: '验证',
  UNKNOWN: '未知',
}

const categoryColors: Record<ErrorCategory, (text: string) => string> = {
  CONFIG: chalk.yellow,
  VALIDATION: chalk.yellow,
  UNKNOWN: chalk.gray,
}

/**
 * 打印错误到终端（stderr）
 */
export function printError(error: unknown): void {
  const appError = error instanceof AppError ? error : AppError.unknown(error)
  console.error(appError.format())
}

// ============ 错误断言 ============

export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${String(x)}`)
}
