import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['./src/test-setup.ts'],
    // bcrypt at cost 10 makes auth-heavy tests slower than the default allows
    testTimeout: 20000
  }
});
