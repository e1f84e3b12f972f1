import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['shared/**/*.test.ts', 'playlist-cache/**/*.test.ts'],
    environment: 'node',
  },
});
