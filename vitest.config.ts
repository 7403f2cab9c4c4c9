import { defineConfig } from 'vitest/config';

export default defineConfig({
  // Lower class fields so vi.mock hoisting does not mistake field names
  // (e.g. `connect`) for imported bindings.
  esbuild: { target: 'es2020' },
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
  },
});
