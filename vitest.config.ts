import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const src = (pkg: string, file = 'index.ts'): string =>
  fileURLToPath(new URL(`./packages/${pkg}/src/${file}`, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
    },
  },
  resolve: {
    extensions: ['.ts', '.js', '.mts', '.mjs'],
    alias: [
      { find: /^@turnkit\/agent-contracts$/, replacement: src('agent-contracts') },
      { find: /^@turnkit\/agent-sdk\/testing$/, replacement: src('agent-sdk', 'testing.ts') },
      { find: /^@turnkit\/agent-sdk$/, replacement: src('agent-sdk') },
      { find: /^@turnkit\/agent-core$/, replacement: src('agent-core') },
    ],
  },
});
