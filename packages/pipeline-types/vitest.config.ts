import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    name: 'pipeline-types',
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts']
  }
})
