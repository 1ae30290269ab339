/**
 * Pairwise longest common prefix tests
 * Covers code point iteration, empty inputs and argument-order properties
 */

import { describe, it, expect } from 'vitest'
import { longestCommonPrefix } from '../longestCommonPrefix.js'

const EMPTY = ''
const HELLO = 'hello'

/** Length in code points, not code units */
function charCount(s: string): number {
  return [...s].length
}

describe('longestCommonPrefix', () => {
  it('should stop at the first differing character', () => {
    expect(longestCommonPrefix('HELLO WORLD', 'HELLO world')).toBe('HELLO ')
  })

  it('should return empty string when first characters differ', () => {
    expect(longestCommonPrefix('nothing in', 'common')).toBe('')
    expect(longestCommonPrefix(HELLO, 'nothing')).toBe('')
    expect(longestCommonPrefix('nothing', HELLO)).toBe('')
  })

  it('should return the same prefix regardless of argument order', () => {
    expect(longestCommonPrefix(HELLO, 'help')).toBe('hel')
    expect(longestCommonPrefix('help', HELLO)).toBe('hel')
  })

  it('should return empty string when either side is empty', () => {
    expect(longestCommonPrefix(HELLO, EMPTY)).toBe('')
    expect(longestCommonPrefix(EMPTY, HELLO)).toBe('')
    expect(longestCommonPrefix(EMPTY, EMPTY)).toBe('')
  })

  it('should return the whole string for identical inputs', () => {
    expect(longestCommonPrefix(HELLO, HELLO)).toBe(HELLO)
    const built = ['he', 'llo'].join('')
    expect(longestCommonPrefix(HELLO, built)).toBe(HELLO)
  })

  it('should return the shorter input when it is a prefix of the other', () => {
    expect(longestCommonPrefix('hell', HELLO)).toBe('hell')
    expect(longestCommonPrefix(HELLO, 'hell')).toBe('hell')
  })

  it('should compare by code point, not by UTF-16 code unit', () => {
    // U+1F600 与 U+1F601 的高位代理都是 \uD83D
    expect(longestCommonPrefix('a\u{1F600}b', 'a\u{1F601}b')).toBe('a')
    expect(longestCommonPrefix('\u{1F600}', '\u{1F601}')).toBe('')
  })

  it('should keep astral characters whole when they match', () => {
    expect(longestCommonPrefix('a😀b', 'a😀c')).toBe('a😀')
    expect(longestCommonPrefix('日本語', '日本人')).toBe('日本')
  })

  it('should not treat a lone high surrogate as matching a full pair', () => {
    expect(longestCommonPrefix('x\uD83D', 'x😀')).toBe('x')
  })

  it('should not normalize composed and decomposed forms', () => {
    expect(longestCommonPrefix('caf\u00e9', 'cafe\u0301')).toBe('caf')
  })

  describe('properties', () => {
    const samples = [
      'hello',
      'help',
      'helvetica',
      '',
      'HELLO',
      'a😀b',
      'a😀',
      'a😁',
      '日本語',
      '日本',
      'whatever',
      'what',
    ]

    it('should be commutative by content', () => {
      for (const a of samples) {
        for (const b of samples) {
          expect(longestCommonPrefix(a, b)).toBe(longestCommonPrefix(b, a))
        }
      }
    })

    it('should be bounded by the shorter input', () => {
      for (const a of samples) {
        for (const b of samples) {
          const prefix = longestCommonPrefix(a, b)
          expect(charCount(prefix)).toBeLessThanOrEqual(Math.min(charCount(a), charCount(b)))
        }
      }
    })

    it('should be a prefix of both inputs', () => {
      for (const a of samples) {
        for (const b of samples) {
          const prefix = longestCommonPrefix(a, b)
          expect(a.startsWith(prefix)).toBe(true)
          expect(b.startsWith(prefix)).toBe(true)
        }
      }
    })

    it('should be maximal', () => {
      for (const a of samples) {
        for (const b of samples) {
          const prefix = longestCommonPrefix(a, b)
          const nextA = [...a][charCount(prefix)]
          const nextB = [...b][charCount(prefix)]
          if (nextA !== undefined && nextB !== undefined) {
            expect(nextA).not.toBe(nextB)
          }
        }
      }
    })

    it('should return the input itself when comparing a string with itself', () => {
      for (const s of samples) {
        expect(longestCommonPrefix(s, s)).toBe(s)
      }
    })
  })
})
