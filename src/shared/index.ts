/**
 * @entry Shared 公共基础设施模块
 *
 * 底层工具函数，无业务逻辑依赖
 *
 * 能力分组：
 * - Result<T,E>: 函数式错误处理（ok/err/mapErr/fromThrowable）
 * - AppError: 统一错误类型（assertNever/printError）
 * - Logger: 日志系统（createLogger/setLogLevel）
 * - 错误守卫: getErrorMessage/ensureError
 */

// Result 类型
export {
  type Result,
  ok,
  err,
  mapErr,
  fromThrowable,
} from './result.js'

// 错误类型
export {
  type ErrorCode,
  type ErrorCategory,
  AppError,
  assertNever,
  printError,
} from './error.js'

// 日志
export {
  type LogLevel,
  type Logger,
  isLogLevel,
  setLogLevel,
  getLogLevel,
  createLogger,
} from './logger.js'

// 错误类型守卫与消息提取
export { getErrorMessage, ensureError } from './assertError.js'
