import { defineConfig } from 'vitest/config'
import { fileURLToPath } from 'url'

export default defineConfig({
  test: {
    name: 'api',
    globals: true,
    environment: 'node',
  },
  resolve: {
    alias: {
      '@sale-records/domain': fileURLToPath(new URL('../domain/src/index.ts', import.meta.url)),
    },
  },
})
