import { defineConfig } from 'vitest/config'
import { fileURLToPath } from 'node:url'
import path from 'node:path'

const __dirname = path.dirname(fileURLToPath(import.meta.url))

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts', 'apps/**/__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    // e2e suites drive real git processes
    testTimeout: 20000
  },
  resolve: {
    alias: {
      '@shared': path.resolve(__dirname, './src/shared'),
      '@node': path.resolve(__dirname, './src/node')
    }
  }
})
