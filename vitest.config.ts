/**
 * Vitest configuration for bloomsift
 *
 * Runs every Node.js test (unit and integration). Tests use fresh
 * MemoryBackend instances or temporary directories, so files run in
 * parallel across forks.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,

    pool: 'forks',
    fileParallelism: true,
    sequence: {
      shuffle: false,
    },

    include: ['tests/**/*.test.ts'],

    setupFiles: ['tests/setup.ts'],

    testTimeout: 30000,
  },
})
