export { renderSlurmScript, writeSlurmScript } from './slurm-script.js'
export type {
  SlurmDirectives,
  SlurmTemplate,
  SlurmTemplateBodies,
  GaussianScriptBody,
  MmcBatchScriptBody
} from './slurm-script.js'
export { submitScript, parseJobId } from './sbatch.js'
export type { SubmitResult, ScriptSubmitter } from './sbatch.js'
export { submitUnits } from './submit-units.js'
export type { SubmissionUnit, SubmitUnitsOptions } from './submit-units.js'
export {
  aggregateOutcomes,
  formatSummary,
  submissionLabels,
  processingLabels
} from './summary.js'
export type { SummaryLabels } from './summary.js'
export { checkNodeAvailability } from './nodes.js'
