/**
 * Vitest Workspace Configuration
 *
 * Stratifies tests into three categories:
 * - unit: Fast, isolated tests (*.unit.test.ts)
 * - integration: Tests that integrate multiple modules (*.integration.test.ts)
 * - e2e: Client-to-emulator system tests (e2e directory)
 *
 * Usage:
 *   npm run test:unit                 # Run only unit tests
 *   npm run test:integration          # Run only integration tests
 *   npm run test:e2e                  # Run only e2e tests
 */
const PACKAGES = ['core', 'config', 'client', 'emulator', 'test-utils'];

export default [
  {
    extends: './vitest.shared.ts',
    test: {
      name: 'unit',
      include: PACKAGES.map(pkg => `${pkg}/src/__tests__/**/*.unit.test.ts`),
      exclude: ['**/node_modules/**', '**/dist/**'],
    },
  },
  {
    extends: './vitest.shared.ts',
    test: {
      name: 'integration',
      include: PACKAGES.map(pkg => `${pkg}/src/__tests__/**/*.integration.test.ts`),
      exclude: ['**/node_modules/**', '**/dist/**'],
      // Integration tests may need more time
      testTimeout: 15000,
      passWithNoTests: true,
    },
  },
  {
    extends: './vitest.shared.ts',
    test: {
      name: 'e2e',
      include: ['e2e/src/**/*.test.ts'],
      exclude: ['**/node_modules/**', '**/dist/**'],
      testTimeout: 30000,
    },
  },
];
