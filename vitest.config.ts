import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    testTimeout: 10000, // 10 second default for tests
    hookTimeout: 10000,
    include: ['tests/**/*.test.ts'],
    // Keep tests from picking up a developer's .env or group document
    env: {
      REPOS_CONFIG_FILE: 'REPO-GROUPS.md',
      PARALLEL_JOBS: '5',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        // Entry points are thin wrappers around runCli
        'src/cli.ts',
        'src/index.ts',
        // Type-only files
        '**/types.ts',
      ],
    },
  },
});
