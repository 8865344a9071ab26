import { vi } from 'vitest'
import fs from 'fs-extra'
import path from 'path'
import { fileURLToPath } from 'url'
import { v4 as uuid } from 'uuid'
import type { JobRecord, JobStage } from '@fragflow/pipeline-types'

export const fixturesDir = fileURLToPath(new URL('./fixtures/', import.meta.url))

export const makeTempDir = async (prefix: string): Promise<string> => {
  const dir = path.join('/tmp', `${prefix}-${uuid()}`)
  await fs.ensureDir(dir)
  return dir
}

export const jobRecord = (dir: string, stage: JobStage = 'discovered'): JobRecord => ({
  name: path.basename(dir),
  path: dir,
  stage,
  status: 'Ready',
  completed: false,
  diagnostics: []
})

// Job directory with AMBER outputs copied from the fixtures
export const makeAmberJob = async (root: string, name: string): Promise<string> => {
  const jobDir = path.join(root, name)
  await fs.copy(path.join(fixturesDir, 'amber'), path.join(jobDir, 'RESP', 'AMBER'))
  return jobDir
}

export const testLogger = () => ({
  info: vi.fn(),
  error: vi.fn(),
  warn: vi.fn(),
  debug: vi.fn()
})
