import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    server: {
      deps: {
        // clipanion's .mjs build uses a directory import that Node's ESM loader rejects
        inline: ['clipanion'],
      },
    },
  },
});
