import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['pendulum-sim/src/tests/**/*.test.ts'],
    testTimeout: 20000,
  },
})
