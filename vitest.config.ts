import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    // Each file gets its own module graph so vi.mock of the logger stays local
    pool: 'threads',
    isolate: true,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.test.ts',
        '**/types.ts',
        'src/cli/',
        'tests/',
      ],
    },
    testTimeout: 30000,
    hookTimeout: 10000,
  },
});
