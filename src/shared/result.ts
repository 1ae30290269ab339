/**
 * Result 类型 - 统一处理成功/失败结果
 * 避免 try-catch 污染调用方，使错误处理显式化
 */

import { ensureError } from './assertError.js'

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E }

// 构造函数
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}

// 映射错误
export function mapErr<T, E, F>(result: Result<T, E>, fn: (error: E) => F): Result<T, F> {
  return result.ok ? result : err(fn(result.error))
}

// 将可能抛出异常的函数包装为 Result
export function fromThrowable<T>(fn: () => T): Result<T, Error> {
  try {
    return ok(fn())
  } catch (e) {
    return err(ensureError(e))
  }
}
