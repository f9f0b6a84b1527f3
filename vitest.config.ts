import { defineConfig } from 'vitest/config';

/**
 * Vitest Configuration
 *
 * Stratifies tests into two projects:
 * - unit: fast, isolated tests (*.unit.test.ts)
 * - integration: tests across packages (*.integration.test.ts)
 *
 * Usage:
 *   npx vitest run --project=unit
 *   npx vitest run --project=integration
 */

const PACKAGES = ['core', 'query', 'config', 'benchmark'];

export default defineConfig({
  test: {
    environment: 'node',
    exclude: ['**/node_modules/**', '**/dist/**'],
    pool: 'forks',
    projects: [
      {
        extends: true,
        test: {
          name: 'unit',
          include: PACKAGES.map(pkg => `${pkg}/src/__tests__/**/*.unit.test.ts`),
        },
      },
      {
        extends: true,
        test: {
          name: 'integration',
          include: PACKAGES.map(pkg => `${pkg}/src/__tests__/**/*.integration.test.ts`),
          // Integration tests generate larger datasets
          testTimeout: 30000,
        },
      },
    ],
  },
});
