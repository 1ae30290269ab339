/**
 * 根命令：计算所有参数的最长公共前缀
 *
 * Usage:
 *   lcp interview internet interval     → inter
 *   lcp apple banana                    → <empty>
 *   lcp --json harbor harbinger hard    → {"prefix":"har","count":3}
 *   lcp -- -ab -ac                      → -a（以 - 开头的单词放在 -- 之后）
 */

import { Command, InvalidArgumentError } from 'commander'
import { longestCommonPrefixIn } from '../../prefix/index.js'
import { loadConfig, type OutputFormat } from '../../config/index.js'
import { AppError, assertNever, createLogger, setLogLevel } from '../../shared/index.js'
import { result, warn } from '../output.js'

const logger = createLogger('cli')

export const USAGE = 'Usage: lcp [word...]'

interface PrefixOptions {
  placeholder?: string
  json?: boolean
  verbose?: boolean
}

export interface PrefixCommandContext {
  /** 配置文件查找目录，默认 process.cwd() */
  cwd?: string
}

/** -p 的值与配置的 min(1) 保持一致：空占位符直接拒绝 */
export function parsePlaceholder(value: string): string {
  if (value === '') throw new InvalidArgumentError('占位符不能为空')
  return value
}

/**
 * 把结果格式化为输出行
 * text 模式下空前缀替换为占位符；json 模式原样输出
 */
export function formatPrefixLine(
  prefix: string,
  count: number,
  format: OutputFormat,
  placeholder: string
): string {
  switch (format) {
    case 'text':
      return prefix === '' ? placeholder : prefix
    case 'json':
      return JSON.stringify({ prefix, count })
    default:
      return assertNever(format)
  }
}

export function registerPrefixCommand(program: Command, context: PrefixCommandContext = {}): void {
  program
    .argument('[words...]', '参与比较的单词')
    .option(
      '-p, --placeholder <token>',
      '公共前缀为空时输出的占位符（默认 <empty>）',
      parsePlaceholder
    )
    .option('--json', '以 JSON 输出 {"prefix","count"}')
    .option('-v, --verbose', '显示详细日志 (debug 级别)')
    .action(async (words: string[], options: PrefixOptions) => {
      if (options.verbose) setLogLevel('debug')

      const prefix = longestCommonPrefixIn(words)
      if (prefix === null) {
        throw AppError.usage(USAGE)
      }

      const config = await loadConfig({ cwd: context.cwd })
      const format: OutputFormat = options.json ? 'json' : config.format
      if (options.placeholder !== undefined && format === 'json') {
        warn('--placeholder 在 JSON 输出下无效')
      }
      const placeholder = options.placeholder ?? config.placeholder

      logger.debug(`${words.length} word(s), prefix length ${[...prefix].length}`)
      result(formatPrefixLine(prefix, words.length, format, placeholder))
    })
}
