import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      // CLI 入口只做参数解析与打印，逻辑在 cli/run.ts 中测试
      exclude: ['src/**/*.test.ts', 'src/**/__test__/**', 'src/cli/index.ts'],
      reportsDirectory: './coverage',
      reporter: ['text', 'html'],
    },
  },
});
