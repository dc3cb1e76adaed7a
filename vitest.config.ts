import { transformWithEsbuild } from 'vite';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  // Vite's built-in esbuild step forces keepNames off, which renames function expressions that
  // shadow an outer binding (e.g. `function searchTickets` becomes `searchTickets2`). Transform
  // TypeScript with keepNames on so `fn.name` matches what tsc emits.
  esbuild: false,
  plugins: [
    {
      name: 'transform-ts-keep-names',
      enforce: 'pre',
      async transform(code, id) {
        if (!/\.(m?ts|tsx)$/.test(id.split('?')[0] ?? id)) return null;
        const result = await transformWithEsbuild(code, id, { target: 'es2022', keepNames: true, sourcemap: true });
        return { code: result.code, map: JSON.stringify(result.map) };
      },
    },
  ],
  test: {
    environment: 'node',
    pool: 'forks',
    testTimeout: 30000,
    hookTimeout: 30000,
    sequence: {
      concurrent: false,
    },
    coverage: {
      provider: 'v8',
      enabled: false,
    },
    include: ['src/tests/unit/**/*.spec.ts'],
  },
});
