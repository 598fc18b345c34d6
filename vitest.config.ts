import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts', 'shared/**/*.test.ts'],
    environment: 'node',
    env: {
      NODE_ENV: 'test',
    },
    restoreMocks: true,
  },
})
