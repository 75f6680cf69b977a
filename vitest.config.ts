import { defineConfig } from 'vitest/config';

export default defineConfig({
  plugins: [
    {
      // Sources import siblings as './x.js'; point Vite at the .ts file.
      name: 'resolve-js-to-ts',
      resolveId(source, importer) {
        if (source.startsWith('.') && source.endsWith('.js') && importer) {
          return this.resolve(source.replace(/\.js$/, '.ts'), importer, { skipSelf: true });
        }
        return null;
      },
    },
  ],
  test: {
    include: ['src/**/*.test.ts'],
    globals: true,
    pool: 'forks',
    unstubEnvs: true,
  },
});
