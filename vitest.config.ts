import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    setupFiles: ['tests/setup.ts'],
    environment: 'node',
    globals: true,
    include: [
      'core/**/*.test.ts',
      'services/**/*.test.ts',
      'api/**/*.test.ts',
      'cli/**/*.test.ts'
    ],
    exclude: ['node_modules', 'dist'],
    env: {
      NODE_ENV: 'test'
    }
  }
});
