export type SelectionPolicy =
  | { kind: 'all' }
  | { kind: 'indices'; indices: number[] }
  | { kind: 'count'; count: number; start: number }

export type SelectionKind = SelectionPolicy['kind']

/** What the command line asked for: a policy, or a listing with no selection */
export type SelectionRequest = SelectionPolicy | { kind: 'list' }

export interface SelectionOptions {
  list?: boolean | string
  all?: boolean | string
  indices?: string
  count?: number | string
  start?: number | string
}
