import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    watch: false,
    environment: 'node',
    include: ['packages/*/test/**/*.{test,spec}.ts'],
    exclude: ['node_modules', 'bin', 'dist'],
  },
})
