import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    env: {
      // 日志在测试中默认静默
      NODE_ENV: 'test',
    },
    include: ['src/**/*.test.ts'],
    pool: 'threads',
    testTimeout: 10000,
    coverage: {
      reporter: ['text', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.test.ts'],
    },
  },
})
