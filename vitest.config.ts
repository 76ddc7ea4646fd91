import { fileURLToPath } from 'node:url'

import { defineConfig } from 'vitest/config'

function fromRoot(relative: string): string {
  return fileURLToPath(new URL(relative, import.meta.url))
}

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    isolate: true,
    pool: 'threads',

    // Only call history is cleared between tests; stub implementations survive
    clearMocks: true,
    unstubGlobals: true,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/**',
        '**/*.test.ts',
        '**/*.config.ts',
        'coverage/**',
        'dist/**',
        'test/**',
        'tools/**',
      ],
      thresholds: {
        branches: 90,
        functions: 95,
        lines: 95,
        statements: 95,
      },
    },

    include: ['src/**/*.test.ts', 'tools/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '$test-utils': fromRoot('./test'),
      '$types': fromRoot('./src/types'),
      '@acquisition': fromRoot('./src/acquisition'),
      '@boot': fromRoot('./src/boot'),
      '@core': fromRoot('./src/core'),
      '@logging': fromRoot('./src/logging'),
      '@system': fromRoot('./src/system'),
      '@transport': fromRoot('./src/transport'),
      '@utils': fromRoot('./src/utils'),
      '@validation': fromRoot('./src/validation'),
    },
  },
})
