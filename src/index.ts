/**
 * common-prefix 库入口
 *
 * @example
 * longestCommonPrefix('HELLO WORLD', 'HELLO world')      // 'HELLO '
 * longestCommonPrefixIn(['whatever', 'whatabout'])        // 'what'
 * longestCommonPrefixIn([])                               // null
 */

export { longestCommonPrefix, longestCommonPrefixIn } from './prefix/index.js'
