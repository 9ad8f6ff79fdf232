/// <reference types="vitest" />
import tsconfigPaths from 'vite-tsconfig-paths';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  plugins: [
    // Resolves the @/, @core/, @adapter/ and @utils/ aliases
    tsconfigPaths({ projects: ['./tsconfig.json'] }),
  ],
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    setupFiles: 'tests/vitest.setup.ts',
  },
});
