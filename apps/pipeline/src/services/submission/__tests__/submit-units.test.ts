import { describe, it, expect, vi } from 'vitest'
import { submitUnits } from '../submit-units.js'
import type { SubmissionUnit } from '../submit-units.js'
import { aggregateOutcomes, formatSummary, processingLabels } from '../summary.js'
import type { SubmitResult } from '../sbatch.js'

const unit = (label: string, jobs: string[], prepare?: () => Promise<string>): SubmissionUnit => ({
  label,
  jobs,
  prepare: prepare ?? (async () => `/tmp/${label}.sh`)
})

describe('submitUnits', () => {
  it('submits units in order and records an outcome per job', async () => {
    const order: string[] = []
    const submit = vi.fn(async (scriptPath: string): Promise<SubmitResult> => {
      order.push(scriptPath)
      return scriptPath.includes('batch_2')
        ? { ok: false, reason: 'sbatch: error: QOSMaxSubmitJobPerUserLimit\n' }
        : { ok: true, jobId: String(100 + order.length) }
    })

    const outcomes = await submitUnits(
      [unit('batch_1', ['m1', 'm2']), unit('batch_2', ['m3', 'm4']), unit('batch_3', ['m5'])],
      { submit }
    )

    expect(order).toEqual(['/tmp/batch_1.sh', '/tmp/batch_2.sh', '/tmp/batch_3.sh'])
    expect(outcomes).toEqual([
      { name: 'm1', success: true, jobId: '101' },
      { name: 'm2', success: true, jobId: '101' },
      { name: 'm3', success: false, reason: 'sbatch: error: QOSMaxSubmitJobPerUserLimit\n' },
      { name: 'm4', success: false, reason: 'sbatch: error: QOSMaxSubmitJobPerUserLimit\n' },
      { name: 'm5', success: true, jobId: '103' }
    ])
  })

  it('records a failed script preparation and keeps going', async () => {
    const submit = vi.fn(async (): Promise<SubmitResult> => ({ ok: true, jobId: '7' }))
    const outcomes = await submitUnits(
      [
        unit('frag_001', ['frag_001'], async () => {
          throw new Error('EACCES: permission denied')
        }),
        unit('frag_002', ['frag_002'])
      ],
      { submit }
    )
    expect(submit).toHaveBeenCalledTimes(1)
    expect(outcomes).toEqual([
      { name: 'frag_001', success: false, reason: 'EACCES: permission denied' },
      { name: 'frag_002', success: true, jobId: '7' }
    ])
  })
})

describe('aggregateOutcomes', () => {
  it('splits outcomes so the counts add up to the total', () => {
    const summary = aggregateOutcomes([
      { name: 'A', success: true, jobId: '1' },
      { name: 'B', success: false, reason: 'sbatch: error: bad\n' },
      { name: 'C', success: true }
    ])
    expect(summary.total).toBe(3)
    expect(summary.successes).toEqual([
      { name: 'A', jobId: '1' },
      { name: 'C', jobId: undefined }
    ])
    expect(summary.failures).toEqual([{ name: 'B', reason: 'sbatch: error: bad\n' }])
    expect(formatSummary(summary)).toBe(
      [
        'Submission Summary:',
        'Successfully submitted: 2',
        'Failed to submit: 1',
        'Failed jobs:',
        '- B: sbatch: error: bad'
      ].join('\n')
    )
  })

  it('formats a clean run without a failure list', () => {
    const summary = aggregateOutcomes([{ name: 'A', success: true }])
    expect(formatSummary(summary, processingLabels)).toBe(
      'Processing Summary:\nSuccessfully processed: 1\nFailed: 0'
    )
  })
})
