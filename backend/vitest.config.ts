import { defineConfig } from 'vitest/config';

// Tests run against the in-memory store (test/setup-env.ts); no Postgres needed.
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.spec.ts'],
    setupFiles: ['test/setup-env.ts'],
    clearMocks: true,
    restoreMocks: true,
  },
});
