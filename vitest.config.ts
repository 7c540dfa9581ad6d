import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // tree-sitter's native binding is loaded once per worker; threads keep that cheap.
    pool: 'threads',
    // Subprocess tests spawn node itself; give slow CI hosts room.
    testTimeout: 30_000,
    hookTimeout: 30_000,
  },
});
