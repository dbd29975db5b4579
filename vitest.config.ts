import { defineConfig, coverageConfigDefaults } from 'vitest/config'
import { resolve, dirname } from 'path'
import { fileURLToPath } from 'url'

const __dirname = dirname(fileURLToPath(import.meta.url))
const isCI = process.env.CI === 'true'

export default defineConfig({
  resolve: {
    alias: {
      '@roundscreen/core': resolve(__dirname, 'packages/core/src/index.ts'),
      '@roundscreen/widgets': resolve(__dirname, 'packages/widgets/src/index.ts'),
    },
  },
  test: {
    include: [
      'packages/*/src/**/*.test.ts',
      'packages/*/src/**/*.spec.ts',
    ],
    exclude: ['node_modules/**', 'dist/**'],

    coverage: {
      provider: 'v8',
      reporter: isCI ? ['text', 'json', 'lcov'] : ['text', 'html'],
      reportsDirectory: './coverage',

      include: [
        'packages/core/src/**/*.ts',
        'packages/widgets/src/**/*.ts',
        'packages/preview/src/**/*.ts',
      ],

      exclude: [
        ...coverageConfigDefaults.exclude,
        '**/*.test.ts',
        '**/*.spec.ts',
        '**/__tests__/**',
        '**/*.d.ts',
        '**/*.config.ts',
        '**/index.ts',
        'packages/preview/src/cli.ts',
      ],

      thresholds: {
        lines: 60,
        branches: 50,
        functions: 60,
        statements: 60,
      },
    },
  },
})
