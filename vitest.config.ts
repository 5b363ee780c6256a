import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    // Calendar arithmetic is local-time; pin the zone so expectations hold anywhere.
    // Suites covering daylight saving switch zones with useTimeZone (tests/helpers.ts).
    env: {
      TZ: 'UTC',
      TIMETREE_LOG_LEVEL: 'error',
      TIMETREE_DB_PATH: ':memory:',
      TIMETREE_CONFIG_PATH: 'tests/fixtures/config.yaml',
    },
    setupFiles: ['tests/setup.ts'],
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },
    testTimeout: 10000,
    hookTimeout: 10000,
    reporters: process.env.CI ? ['verbose'] : ['default'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/types/**', 'src/index.ts', 'src/server.ts'],
    },
  },
});
