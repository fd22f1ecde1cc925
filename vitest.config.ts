import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    // Beam search over every start face is slow on the larger solids
    testTimeout: 20000,
  },
})
