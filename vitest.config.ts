import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const src = (subdir = '') =>
  fileURLToPath(new URL(`./src/${subdir}`, import.meta.url))

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    pool: 'forks',
    poolOptions: {
      forks: {
        execArgv: ['--import', 'tsx'],
      },
    },
    include: ['test/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['**/node_modules/**', '**/dist/**', '**/test/**'],
      include: ['src/**/*.ts'],
    },
    globalSetup: './test/setup/global-setup.ts',
    testTimeout: 10000,
    hookTimeout: 10000,
  },
  resolve: {
    alias: [
      // Map .js imports to .ts files for path aliases
      { find: /^@root\/(.*)\.js$/, replacement: `${src()}$1.ts` },
      { find: /^@services\/(.*)\.js$/, replacement: `${src('services/')}$1.ts` },
      { find: /^@plugins\/(.*)\.js$/, replacement: `${src('plugins/')}$1.ts` },
      { find: /^@utils\/(.*)\.js$/, replacement: `${src('utils/')}$1.ts` },
      { find: /^@schemas\/(.*)\.js$/, replacement: `${src('schemas/')}$1.ts` },
    ],
    extensions: ['.ts', '.js', '.json'],
  },
})
