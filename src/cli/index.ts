#!/usr/bin/env node
/**
 * @entry lcp CLI 主入口
 *
 *   lcp word1 word2 ...    - 输出最长公共前缀，无公共前缀时输出 <empty>
 *   lcp                    - 输出用法并以 1 退出
 */

import { run } from './program.js'

process.exitCode = await run(process.argv.slice(2))
