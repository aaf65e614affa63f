import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@fiscal-intake/types': path.resolve(rootDir, 'packages/types/src/index.ts'),
      '@fiscal-intake/nfe-parser': path.resolve(rootDir, 'packages/nfe-parser/src/index.ts'),
      '@fiscal-intake/receipt-parser': path.resolve(rootDir, 'packages/receipt-parser/src/index.ts'),
      '@fiscal-intake/pdf-text': path.resolve(rootDir, 'packages/pdf-text/src/index.ts'),
      '@fiscal-intake/ledger': path.resolve(rootDir, 'packages/ledger/src/index.ts'),
      '@fiscal-intake/intake': path.resolve(rootDir, 'packages/intake/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
