import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    name: 'pipeline',
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts', 'src/**/__tests__/**/*.test.ts'],
    setupFiles: ['test/setup.ts'],
    env: {
      FRAGFLOW_LOGS: '/tmp/fragflow-logs-test',
      LOG_LEVEL: 'error',
      SBATCH: 'sbatch',
      SLURM_PARTITION: 'short'
    }
  }
})
