import * as yup from 'yup'
import type {
  SelectionOptions,
  SelectionPolicy,
  SelectionRequest
} from '@fragflow/pipeline-types'
import { ConfigurationError } from '../errors.js'

export class SelectionError extends ConfigurationError {
  constructor(message: string) {
    super(message)
    this.name = 'SelectionError'
  }
}

const positiveInteger = (label: string) =>
  yup
    .number()
    .typeError(`${label} must be a number`)
    .integer(`${label} must be an integer`)
    .min(1, `${label} must be at least 1`)

const selectionSchema = yup.object({
  list: yup.boolean().default(false),
  all: yup.boolean().default(false),
  indices: yup
    .string()
    .trim()
    .matches(/^\s*-?\d+(\s*,\s*-?\d+)*\s*$/, {
      message: 'Indices must be comma-separated integers, e.g. 1,3,5',
      excludeEmptyString: false
    })
    .optional(),
  count: positiveInteger('Job count').optional(),
  start: positiveInteger('Start index').default(1)
})

export const SELECTION_HINT = [
  'Please specify one of:',
  '  -a/--all: select all listed jobs',
  '  -n/--number N [-s/--start S]: select N jobs starting at index S',
  '  -i/--indices 1,3,5: select specific job indices',
  '  -l/--list: list jobs only'
].join('\n')

const parseIndices = (raw: string): number[] =>
  raw.split(',').map((part) => parseInt(part.trim(), 10))

/**
 * Turns raw command line options into exactly one request: list only, or a
 * selection policy. Throws a SelectionError when more than one is given, or
 * when none is given and the command has no fallback.
 */
const resolveSelectionPolicy = (
  options: SelectionOptions,
  fallback?: SelectionPolicy
): SelectionRequest => {
  let parsed: yup.InferType<typeof selectionSchema>
  try {
    parsed = selectionSchema.validateSync(options, { abortEarly: false, stripUnknown: true })
  } catch (error) {
    if (error instanceof yup.ValidationError) {
      throw new SelectionError(error.errors.join('; '))
    }
    throw error
  }

  const policies: SelectionRequest[] = []
  if (parsed.list) policies.push({ kind: 'list' })
  if (parsed.all) policies.push({ kind: 'all' })
  if (parsed.indices !== undefined) {
    policies.push({ kind: 'indices', indices: parseIndices(parsed.indices) })
  }
  if (parsed.count !== undefined) {
    policies.push({ kind: 'count', count: parsed.count, start: parsed.start })
  }

  if (policies.length === 0) {
    if (fallback) return fallback
    throw new SelectionError(`No jobs selected.\n${SELECTION_HINT}`)
  }
  if (policies.length > 1) {
    const kinds = policies.map((policy) => policy.kind).join(', ')
    throw new SelectionError(`Only one selection may be given, got: ${kinds}`)
  }
  return policies[0]
}

/**
 * Applies a policy to the sorted job list. Indices are 1-based; one bad
 * index fails the whole selection.
 */
const selectJobs = <T>(ordered: readonly T[], policy: SelectionPolicy): T[] => {
  switch (policy.kind) {
    case 'all':
      return [...ordered]
    case 'indices':
      return policy.indices.map((index) => {
        if (!Number.isInteger(index) || index < 1 || index > ordered.length) {
          throw new SelectionError(
            `Invalid index ${index}: choose between 1 and ${ordered.length}`
          )
        }
        return ordered[index - 1]
      })
    case 'count': {
      const startIdx = policy.start - 1
      if (startIdx < 0 || startIdx >= ordered.length) {
        throw new SelectionError(
          `Invalid start index ${policy.start}: choose between 1 and ${ordered.length}`
        )
      }
      return ordered.slice(startIdx, Math.min(startIdx + policy.count, ordered.length))
    }
  }
}

export { resolveSelectionPolicy, selectJobs, parseIndices }
