/**
 * @entry Prefix 最长公共前缀模块
 *
 * 纯函数，无状态、无 I/O：
 * - longestCommonPrefix: 两两比较
 * - longestCommonPrefixIn: 对任意 Iterable 折叠，空集合返回 null
 */

export { longestCommonPrefix } from './longestCommonPrefix.js'
export { longestCommonPrefixIn } from './longestCommonPrefixIn.js'
