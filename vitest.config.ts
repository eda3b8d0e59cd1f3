import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/test-*.ts'],
    environment: 'node',
    // Process-level tests spawn real children and wait on real timeouts
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
