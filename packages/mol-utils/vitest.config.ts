import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    name: 'mol-utils',
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts']
  }
})
