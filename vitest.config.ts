import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const packageSource = (name: string, file = 'index.ts'): string =>
  fileURLToPath(new URL(`./packages/${name}/src/${file}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@astrolabe\/types\/services$/, replacement: packageSource('types', 'services/index.ts') },
      { find: /^@astrolabe\/swiss\/signs$/, replacement: packageSource('swiss', 'signs.ts') },
      { find: /^@astrolabe\/types$/, replacement: packageSource('types') },
      { find: /^@astrolabe\/core$/, replacement: packageSource('core') },
      { find: /^@astrolabe\/swiss$/, replacement: packageSource('swiss') },
      { find: /^@astrolabe\/test-utils$/, replacement: packageSource('test-utils') },
    ],
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'tests/**/*.test.ts'],
    testTimeout: 30000,
  },
});
