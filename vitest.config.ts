import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    // Keep debug logging off regardless of the caller's shell
    env: {
      JSON_TO_STRUCT_DEBUG: '0',
    },
  },
});
