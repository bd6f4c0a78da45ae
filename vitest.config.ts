import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: false,
    isolate: true,
    include: ['tests/**/*.{test,spec}.ts'],
    testTimeout: 10000,
  },
})
