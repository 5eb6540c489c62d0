import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const sharedEntry = fileURLToPath(new URL('./shared/src/index.ts', import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['server/test/**/*.test.ts'],
    alias: {
      '@hustle/shared': sharedEntry,
    },
  },
});
