import { describe, it, expect } from 'vitest'
import { resolveSelectionPolicy, selectJobs, SelectionError } from '../select-jobs.js'
import { ConfigurationError } from '../../errors.js'

const jobs = ['A', 'B', 'C', 'D', 'E']

describe('resolveSelectionPolicy', () => {
  it('resolves each kind of selection', () => {
    expect(resolveSelectionPolicy({ all: true })).toEqual({ kind: 'all' })
    expect(resolveSelectionPolicy({ indices: '1, 3,5' })).toEqual({
      kind: 'indices',
      indices: [1, 3, 5]
    })
    expect(resolveSelectionPolicy({ count: '3', start: '2' })).toEqual({
      kind: 'count',
      count: 3,
      start: 2
    })
  })

  it('defaults the start index to 1', () => {
    expect(resolveSelectionPolicy({ count: 2 })).toEqual({ kind: 'count', count: 2, start: 1 })
  })

  it('rejects an empty selection', () => {
    expect(() => resolveSelectionPolicy({})).toThrow(SelectionError)
    expect(() => resolveSelectionPolicy({ start: 2 })).toThrow(/No jobs selected/)
  })

  it('uses the fallback policy when nothing is selected', () => {
    expect(resolveSelectionPolicy({ start: 3 }, { kind: 'all' })).toEqual({ kind: 'all' })
  })

  it('rejects more than one selection', () => {
    expect(() => resolveSelectionPolicy({ all: true, count: 2 })).toThrow(
      'Only one selection may be given, got: all, count'
    )
    expect(() => resolveSelectionPolicy({ list: true, all: true })).toThrow(
      'Only one selection may be given, got: list, all'
    )
  })

  it('treats listing as its own choice', () => {
    expect(resolveSelectionPolicy({ list: true })).toEqual({ kind: 'list' })
    expect(resolveSelectionPolicy({ list: true }, { kind: 'all' })).toEqual({ kind: 'list' })
  })

  it('rejects malformed values as configuration errors', () => {
    expect(() => resolveSelectionPolicy({ indices: '1,x' })).toThrow(ConfigurationError)
    expect(() => resolveSelectionPolicy({ count: 0 })).toThrow('Job count must be at least 1')
    expect(() => resolveSelectionPolicy({ count: 'many' })).toThrow(
      'Job count must be a number'
    )
  })
})

describe('selectJobs', () => {
  it('returns every job for all', () => {
    expect(selectJobs(jobs, { kind: 'all' })).toEqual(jobs)
  })

  it('slices a count window from the start index', () => {
    expect(selectJobs(jobs, { kind: 'count', count: 3, start: 2 })).toEqual(['B', 'C', 'D'])
  })

  it('clamps a count window at the end of the list', () => {
    expect(selectJobs(jobs, { kind: 'count', count: 5, start: 4 })).toEqual(['D', 'E'])
  })

  it('rejects a start index outside the list', () => {
    expect(() => selectJobs(jobs, { kind: 'count', count: 1, start: 6 })).toThrow(
      'Invalid start index 6: choose between 1 and 5'
    )
  })

  it('resolves 1-based indices in the given order, keeping duplicates', () => {
    expect(selectJobs(jobs, { kind: 'indices', indices: [3] })).toEqual(['C'])
    expect(selectJobs(jobs, { kind: 'indices', indices: [5, 1, 5] })).toEqual(['E', 'A', 'E'])
  })

  it('fails the whole selection on one invalid index', () => {
    expect(() => selectJobs(jobs, { kind: 'indices', indices: [1, 6] })).toThrow(
      'Invalid index 6: choose between 1 and 5'
    )
    expect(() => selectJobs(jobs, { kind: 'indices', indices: [0] })).toThrow(SelectionError)
  })

  it('rejects any start index on an empty list', () => {
    expect(() => selectJobs([], { kind: 'count', count: 1, start: 1 })).toThrow(
      /Invalid start index/
    )
  })
})
