export {
  SelectionError,
  SELECTION_HINT,
  resolveSelectionPolicy,
  selectJobs,
  parseIndices
} from './select-jobs.js'
