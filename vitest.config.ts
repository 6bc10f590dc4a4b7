import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/cli/src/cli.ts'],
    },
    projects: [
      {
        test: {
          name: 'unit',
          environment: 'node',
          include: ['packages/*/tests/**/*.test.ts'],
          exclude: ['packages/*/tests/**/*.integration.test.ts'],
          testTimeout: 15000,
        },
      },
      {
        test: {
          name: 'integration',
          environment: 'node',
          include: ['packages/*/tests/**/*.integration.test.ts'],
          testTimeout: 30000,
        },
      },
    ],
  },
})
