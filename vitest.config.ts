import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const resolvePath = (relativePath: string) => fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
  test: {
    mockReset: true,
    coverage: {
      reporter: ['text'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.{mock,types,error,const}.ts'],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80,
      },
    },
  },
  resolve: {
    alias: {
      '@errors': resolvePath('./src/errors'),
      '@models': resolvePath('./src/models'),
      '@services': resolvePath('./src/services'),
      '@utils': resolvePath('./src/utils'),
    },
  },
});
