import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const entry = (pkg: string): string =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      // Workspace packages resolve to their TypeScript sources
      { find: '@parley/utils', replacement: entry('utils') },
      { find: '@parley/config', replacement: entry('config') },
      { find: '@parley/storage', replacement: entry('storage') },
      { find: '@parley/groupchat', replacement: entry('groupchat') },
    ],
  },
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./test/vitest.setup.ts'],
    include: ['packages/**/src/**/*.test.ts'],
  },
});
