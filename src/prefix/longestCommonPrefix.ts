/**
 * 两个字符串的最长公共前缀
 *
 * 按 code point 逐个比较：代理对（emoji 等）作为一个字符，不会被从中间截断。
 * 不做 Unicode 规范化，'é' 与 'é' 视为不同。
 *
 * 一方是另一方的前缀（或两者相同）时直接返回较短的那个输入本身，不做 slice；
 * 长度相同时返回 b。
 */
export function longestCommonPrefix(a: string, b: string): string {
  const limit = Math.min(a.length, b.length)
  let i = 0

  while (i < limit) {
    const ac = a.codePointAt(i)
    const bc = b.codePointAt(i)
    if (ac !== bc) return a.slice(0, i)
    // 同一个 astral code point 在两边都占两个 code unit
    i += ac !== undefined && ac > 0xffff ? 2 : 1
  }

  return a.length < b.length ? a : b
}
