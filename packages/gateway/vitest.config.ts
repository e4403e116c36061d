import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'gateway',
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['src/test-setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        '**/*.test.ts',
        '**/test-setup.ts',
        '**/test-helpers.ts',
        '**/index.ts',
        'src/services/log.ts',
        'src/server.ts',
      ],
    },
  },
});
