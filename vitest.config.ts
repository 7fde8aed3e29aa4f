import { transformWithEsbuild } from 'vite';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  // track() names spans after fn.name. Vite's built-in esbuild plugin forces
  // keepNames off, so TypeScript is transformed here with keepNames on.
  esbuild: false,
  plugins: [
    {
      name: 'esbuild-keep-names',
      async transform(code, id) {
        if (!/\.(m?ts|tsx)$/.test(id.split('?')[0])) return null;
        const result = await transformWithEsbuild(code, id, {
          target: 'node18',
          sourcemap: 'inline',
          keepNames: true,
        });
        return { code: result.code };
      },
    },
  ],
  test: {
    environment: 'node',
    include: ['src/__tests__/**/*.test.ts'],
    testTimeout: 10000,
  },
});
