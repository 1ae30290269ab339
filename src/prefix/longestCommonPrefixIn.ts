import { longestCommonPrefix } from './longestCommonPrefix.js'

/**
 * 一组字符串的最长公共前缀
 *
 * - 空集合返回 null（没有输入），与 ''（有输入但无公共前缀）区分
 * - 按顺序惰性消费，前缀一旦为空立即停止，剩余元素不再读取
 */
export function longestCommonPrefixIn(items: Iterable<string>): string | null {
  let prefix: string | null = null

  for (const item of items) {
    if (prefix === null) {
      prefix = item
    } else {
      prefix = longestCommonPrefix(prefix, item)
    }
    if (prefix === '') break
  }

  return prefix
}
