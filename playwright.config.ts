import { defineConfig } from '@playwright/test';

// Pipeline code logs through Logger; keep test output readable.
process.env.LOG_LEVEL ??= 'silent';

export default defineConfig({
  testDir: './tests',
  testMatch: '**/*.spec.ts',
  fullyParallel: true,
  timeout: 30_000,
});
