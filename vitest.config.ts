import { defineConfig } from 'vitest/config';

export default defineConfig({
  plugins: [
    {
      // Source files import siblings with .js extensions (NodeNext style)
      name: 'resolve-js-to-ts',
      resolveId(source, importer) {
        if (source.endsWith('.js') && importer && !source.includes('node_modules')) {
          const tsPath = source.replace(/\.js$/, '.ts');
          return this.resolve(tsPath, importer, { skipSelf: true });
        }
        return null;
      },
    },
  ],
  test: {
    include: ['src/**/__tests__/*.test.ts'],
    globals: true,
    pool: 'forks',
    env: {
      GOOGLE_API_KEY: 'test-secret',
      STORAGE_BACKEND: 'sqlite',
      SQLITE_PATH: ':memory:',
    },
  },
});
