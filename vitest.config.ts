import { fileURLToPath } from 'node:url';
import path from 'node:path';

import { defineConfig } from 'vitest/config';

const repoRoot = fileURLToPath(new URL('.', import.meta.url));

/**
 * Vitest runs against TypeScript source, not built `dist/` artifacts.
 *
 * Workspace packages resolve `default` to `dist/*`, so workspace imports are
 * aliased back to their source entrypoints for local testing.
 */
export default defineConfig({
  resolve: {
    alias: [
      {
        find: '@siteaudit/core/testing',
        replacement: path.join(repoRoot, 'packages/core/src/testing/index.ts'),
      },
      { find: '@siteaudit/core/types', replacement: path.join(repoRoot, 'packages/core/src/types-entry.ts') },
      { find: '@siteaudit/core', replacement: path.join(repoRoot, 'packages/core/src/index.ts') },
      {
        find: '@siteaudit/ai-providers',
        replacement: path.join(repoRoot, 'packages/ai-providers/src/index.ts'),
      },
    ],
  },
  test: {
    globals: true,
    include: ['packages/**/src/**/*.test.ts'],
  },
});
