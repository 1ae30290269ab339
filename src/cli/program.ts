import { Command, CommanderError } from 'commander'
import { AppError, printError } from '../shared/index.js'
import { registerPrefixCommand, type PrefixCommandContext } from './commands/prefix.js'
import { usage } from './output.js'

/**
 * 构建 commander 程序（不解析参数）
 * exitOverride：错误以异常形式抛出，由 run 统一转换为退出码
 */
export function createProgram(context: PrefixCommandContext = {}): Command {
  const program = new Command()

  program
    .name('lcp')
    .description('输出所有参数的最长公共前缀')
    .version('0.1.0')
    .exitOverride()

  registerPrefixCommand(program, context)
  return program
}

/**
 * 执行 CLI，返回进程退出码
 * @param args - 不含 node 与脚本路径的参数
 */
export async function run(args: string[], context: PrefixCommandContext = {}): Promise<number> {
  try {
    await createProgram(context).parseAsync(args, { from: 'user' })
    return 0
  } catch (error) {
    if (error instanceof AppError && error.code === 'USAGE') {
      usage(error.message)
      return 1
    }
    // commander 已经自行输出了帮助或错误信息
    if (error instanceof CommanderError) return error.exitCode
    printError(error)
    return 1
  }
}
