import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    include: ['packages/*/src/**/*.test.ts'],
    // Multipart tests write files of several MiB
    testTimeout: 20_000,
  },
})
