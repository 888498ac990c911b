import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    testTimeout: 10000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        'tests/',
        '**/*.d.ts',
        '**/*.config.*',
        'src/index.ts',
        'src/cli/index.ts',
      ],
    },
    // Keep structured logs out of the test output
    env: {
      ORA_AUDIT_LOG_LEVEL: 'silent',
    },
  },
});
