import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: ['tests/setup.ts'],
    // Container state is module-level; keep each file in its own worker.
    isolate: true,
    env: {
      REFSTORE_LOG_LEVEL: 'silent',
    },
  },
});
