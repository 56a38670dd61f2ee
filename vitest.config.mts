import { transformWithEsbuild } from 'vite'
import { defineConfig } from 'vitest/config'

export default defineConfig({
  // Vite's built-in esbuild transform forces keepNames off, which lets esbuild
  // rename shadowed function expressions (function f -> f2) and changes fn.name.
  esbuild: false,
  plugins: [
    {
      name: 'ts-keep-names',
      transform(code, id) {
        if (!/\.[cm]?ts$/.test(id.split('?')[0] ?? id)) return null
        return transformWithEsbuild(code, id, { target: 'esnext', keepNames: true, sourcemap: true })
      }
    }
  ],
  test: {
    globals: true,
    include: ['src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.test.ts', 'src/cli.ts', 'src/index.ts']
    }
  }
})
