/**
 * CLI 用户输出工具
 * stdout 只写命令结果（一行），其他提示一律写 stderr，方便在管道里使用
 *
 * 诊断日志请使用 shared/logger.ts
 */

import chalk from 'chalk'

/** 命令结果 */
export function result(line: string): void {
  console.log(line)
}

/** 用法提示：单行、无颜色 */
export function usage(line: string): void {
  console.error(line)
}

/** 警告消息 */
export function warn(message: string): void {
  console.warn(chalk.yellow('!'), message)
}
