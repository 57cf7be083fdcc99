import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    name: 'search',
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Orchestrator tests run real timers against short provider budgets
    testTimeout: 15000,
  },
})
