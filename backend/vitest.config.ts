import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.spec.ts'],
    setupFiles: ['test/setup-env.ts'],
    // e2e specs hash real passwords with argon2
    testTimeout: 15_000,
    // DAL specs boot an in-process Postgres in beforeAll
    hookTimeout: 30_000,
    clearMocks: true,
    restoreMocks: true,
    // migrator.ts loads the .ts migrations with a native import(); the
    // workers need the tsx loader for that, as the CLI scripts run under tsx
    poolOptions: {
      forks: { execArgv: ['--import', 'tsx'] },
      threads: { execArgv: ['--import', 'tsx'] },
    },
  },
});
