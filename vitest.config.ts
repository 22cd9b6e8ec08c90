import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['shared/**/test/**/*.test.ts', 'services/**/test/**/*.test.ts', 'interfaces/**/test/**/*.test.ts'],
    environment: 'node',
    pool: 'forks'
  }
});
