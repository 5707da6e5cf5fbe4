import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        'node_modules/**',
        'dist/**',
        '**/*.d.ts',
        'vitest.config.ts',
        'src/cli/index.ts',     // Process entry point
        'src/cli/lib/colors.ts',
        'src/index.ts',         // Re-exports only
        'src/domain/index.ts'   // Re-exports only
      ]
    },
    testTimeout: 30000
  }
})
