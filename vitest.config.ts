import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
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
          globals: true,
          environment: 'node',
          include: ['packages/*/tests/**/*.test.ts'],
          exclude: ['packages/*/tests/**/*.integration.test.ts'],
          testTimeout: 10000,
        },
      },
      {
        test: {
          name: 'integration',
          globals: true,
          environment: 'node',
          include: ['packages/*/tests/**/*.integration.test.ts'],
          testTimeout: 30000,
        },
      },
    ],
  },
})
