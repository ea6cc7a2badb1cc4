import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['*.test.ts'],
    // field_simp runs mathjs rationalize, which is slow on the three-variable laws
    testTimeout: 30000,
  },
});
