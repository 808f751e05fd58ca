import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment configuration
    environment: 'node',

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/**',
        'dist/**',
        '**/*.d.ts',
        'vitest.config.ts',
        'vitest.performance.config.ts',
        'src/bin.ts' // Process entry point, exercised through cli.ts
      ]
    },

    // Test file patterns
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['node_modules/**', 'dist/**'],

    testTimeout: 10000,
    hookTimeout: 10000,

    pool: 'threads',

    // Watch options
    watch: false
  }
});
