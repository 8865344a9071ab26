import path from 'path'
import moment from 'moment-timezone'
import type {
  JobRecord,
  Logger,
  SelectionOptions,
  SelectionPolicy,
  SubmissionOutcome
} from '@fragflow/pipeline-types'
import { config } from '../config/config.js'
import type { SlurmProfiles } from '../config/config.js'
import { ConfigurationError } from '../services/errors.js'
import {
  amberCandidates,
  anyJob,
  mmcJobs,
  optimizationJobs,
  respJobs,
  respSetupCandidates,
  scanJobs,
  slvCandidates
} from '../services/tracker/index.js'
import type { JobPredicate } from '../services/tracker/index.js'
import { resolveSelectionPolicy, selectJobs } from '../services/selection/index.js'
import {
  aggregateOutcomes,
  checkNodeAvailability,
  formatSummary,
  processingLabels,
  submissionLabels
} from '../services/submission/index.js'
import type { SummaryLabels } from '../services/submission/index.js'
import { prepareGaussianInputs } from '../services/functions/gaussian-prep.js'
import { submitGaussianJobs } from '../services/functions/gaussian-submit.js'
import { setupRespFolders } from '../services/functions/resp-setup.js'
import { generateAmberParams } from '../services/functions/amber-params.js'
import { convertSlvFiles } from '../services/functions/slv-convert.js'
import {
  createSacpCollections,
  verifySacpCollections
} from '../services/functions/sacp-setup.js'
import { resolveSacpDir, writeMmcInputs } from '../services/functions/mmc-input.js'
import { submitMmcBatches } from '../services/functions/mmc-submit.js'
import type { CliOptions, CommandName } from './args.js'
import { formatJobTable } from './table.js'

export interface CommandContext {
  options: CliOptions
  cwd: string
  logger: Logger
  profiles: SlurmProfiles
}

/** Process exit code */
export type CommandHandler = (ctx: CommandContext) => Promise<number>

const EXIT_OK = 0
const EXIT_FAILURE = 1

const required = (value: string | undefined, flag: string): string => {
  if (!value) throw new ConfigurationError(`${flag} is required`)
  return value
}

const positiveInt = (value: string | undefined, flag: string, fallback: number): number => {
  if (value === undefined) return fallback
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigurationError(`${flag} must be a positive integer, got ${value}`)
  }
  return parsed
}

const selectionOptions = (options: CliOptions): SelectionOptions => ({
  list: options.list,
  all: options.all,
  indices: options.indices,
  count: options.count,
  start: options.start
})

/**
 * `-j` when given; otherwise the parent of the working directory, leaving
 * the working directory itself out of the scan.
 */
const resolveJobsDir = (ctx: CommandContext): { jobsDir: string; exclude: string[] } =>
  ctx.options.jobsDir
    ? { jobsDir: path.resolve(ctx.cwd, ctx.options.jobsDir), exclude: [] }
    : { jobsDir: path.dirname(ctx.cwd), exclude: [ctx.cwd] }

const timestamp = (): string => moment().format('YYYYMMDD_HHmmss')

const listJobs = (
  ctx: CommandContext,
  jobs: JobRecord[],
  predicate: JobPredicate,
  dir: string
): void => {
  ctx.logger.info(`Available ${predicate.label} in ${dir}:\n${formatJobTable(jobs)}`)
  for (const job of jobs) {
    for (const diagnostic of job.diagnostics) {
      ctx.logger.warn?.(`${job.name}: ${diagnostic}`)
    }
  }
}

interface SelectArgs {
  predicate: JobPredicate
  incompleteOnly?: boolean
  /** Policy used when no selection option is given */
  fallback?: SelectionPolicy
  /** Scan this directory instead of the -j one */
  dir?: string
}

/**
 * Resolves the selection options, then scans, lists and applies them.
 * Conflicting options fail before the jobs directory is read. Resolves to
 * null when there is nothing to do (no jobs, or list only).
 */
const scanAndSelect = async (
  ctx: CommandContext,
  { predicate, incompleteOnly = false, fallback, dir }: SelectArgs
): Promise<JobRecord[] | null> => {
  const request = resolveSelectionPolicy(selectionOptions(ctx.options), fallback)
  const target = dir ? { jobsDir: dir, exclude: [] } : resolveJobsDir(ctx)
  const jobs = await scanJobs(target.jobsDir, predicate, {
    exclude: target.exclude,
    incompleteOnly,
    logger: ctx.logger
  })
  if (jobs.length === 0) {
    ctx.logger.info(`No ${predicate.label} found in ${target.jobsDir}`)
    return null
  }
  listJobs(ctx, jobs, predicate, target.jobsDir)
  if (request.kind === 'list') return null

  const selected = selectJobs(jobs, request)
  ctx.logger.info(
    `Selected ${selected.length} of ${jobs.length}:\n${selected.map((job) => `- ${job.name}`).join('\n')}`
  )
  return selected
}

const report = (
  ctx: CommandContext,
  outcomes: SubmissionOutcome[],
  labels: SummaryLabels
): number => {
  const summary = aggregateOutcomes(outcomes)
  const text = formatSummary(summary, labels)
  if (summary.failures.length > 0) {
    ctx.logger.error(text)
    return EXIT_FAILURE
  }
  ctx.logger.info(text)
  return EXIT_OK
}

const status: CommandHandler = async (ctx) => {
  const { jobsDir, exclude } = resolveJobsDir(ctx)
  const jobs = await scanJobs(jobsDir, anyJob, { exclude, logger: ctx.logger })
  if (jobs.length === 0) {
    ctx.logger.info(`No job directories found in ${jobsDir}`)
    return EXIT_OK
  }
  ctx.logger.info(`Jobs in ${jobsDir}:\n${formatJobTable(jobs, true)}`)
  const counts = new Map<string, number>()
  for (const job of jobs) {
    counts.set(job.stage, (counts.get(job.stage) ?? 0) + 1)
  }
  ctx.logger.info(
    [...counts.entries()].map(([stage, count]) => `${stage}: ${count}`).join('\n')
  )
  return EXIT_OK
}

const gaussianPrep: CommandHandler = async (ctx) => {
  const outcomes = await prepareGaussianInputs({
    inputDir: path.resolve(ctx.cwd, required(ctx.options.input, '--input')),
    outputDir: path.resolve(ctx.cwd, required(ctx.options.output, '--output')),
    templatePath: path.resolve(ctx.cwd, required(ctx.options.template, '--template')),
    logger: ctx.logger
  })
  return report(ctx, outcomes, processingLabels)
}

const gaussianSubmit: CommandHandler = async (ctx) => {
  if (ctx.options.status) {
    const { jobsDir, exclude } = resolveJobsDir(ctx)
    const jobs = await scanJobs(jobsDir, optimizationJobs, { exclude, logger: ctx.logger })
    if (jobs.length === 0) {
      ctx.logger.info(`No ${optimizationJobs.label} found in ${jobsDir}`)
    } else {
      listJobs(ctx, jobs, optimizationJobs, jobsDir)
    }
    return EXIT_OK
  }

  const selected = await scanAndSelect(ctx, {
    predicate: optimizationJobs,
    incompleteOnly: true
  })
  if (!selected) return EXIT_OK

  await checkNodeAvailability(ctx.logger)
  const logDir = path.join(ctx.cwd, `gaussian_jobs_${timestamp()}`)
  const outcomes = await submitGaussianJobs('gaussian', selected, {
    logDir,
    profile: ctx.profiles.gaussian,
    logger: ctx.logger
  })
  ctx.logger.info(`Log files will be saved in: ${logDir}`)
  return report(ctx, outcomes, submissionLabels)
}

const respSetup: CommandHandler = async (ctx) => {
  const { jobsDir, exclude } = resolveJobsDir(ctx)
  const jobs = await scanJobs(jobsDir, respSetupCandidates, {
    exclude,
    logger: ctx.logger
  })
  if (jobs.length === 0) {
    ctx.logger.info(`No suitable directories found in ${jobsDir}`)
    return EXIT_OK
  }
  const outcomes = await setupRespFolders(jobs, { logger: ctx.logger })
  return report(ctx, outcomes, processingLabels)
}

const respSubmit: CommandHandler = async (ctx) => {
  const selected = await scanAndSelect(ctx, { predicate: respJobs })
  if (!selected) return EXIT_OK

  const logDir = path.join(ctx.cwd, `resp_jobs_${timestamp()}`)
  const outcomes = await submitGaussianJobs('resp', selected, {
    logDir,
    profile: ctx.profiles.resp,
    logger: ctx.logger
  })
  ctx.logger.info(`Log files will be saved in: ${logDir}`)
  return report(ctx, outcomes, submissionLabels)
}

const amberParams: CommandHandler = async (ctx) => {
  const selected = await scanAndSelect(ctx, {
    predicate: amberCandidates,
    fallback: { kind: 'all' }
  })
  if (!selected) return EXIT_OK
  const outcomes = await generateAmberParams(selected, { logger: ctx.logger })
  return report(ctx, outcomes, processingLabels)
}

const slvConvert: CommandHandler = async (ctx) => {
  const selected = await scanAndSelect(ctx, {
    predicate: slvCandidates,
    fallback: { kind: 'all' }
  })
  if (!selected) return EXIT_OK
  const outcomes = await convertSlvFiles(selected, {
    logger: ctx.logger,
    strictCount: ctx.options.strict
  })
  return report(ctx, outcomes, processingLabels)
}

const sacpSetup: CommandHandler = async (ctx) => {
  const { collections, outcomes } = await createSacpCollections({
    libraryPath: path.resolve(ctx.cwd, required(ctx.options.library, '--library')),
    sacpPath: path.resolve(ctx.cwd, required(ctx.options.sacp, '--sacp')),
    split: positiveInt(ctx.options.split, '--split', 1),
    logger: ctx.logger
  })
  const { verified } = await verifySacpCollections(collections, ctx.logger)
  const code = report(ctx, outcomes, processingLabels)
  if (!verified) {
    ctx.logger.error('SACP creation completed with errors, please check the logs')
    return EXIT_FAILURE
  }
  return code
}

const mmcInput: CommandHandler = async (ctx) => {
  const outcomes = await writeMmcInputs({
    sacpPath: path.resolve(ctx.cwd, required(ctx.options.sacp, '--sacp')),
    templatePath: path.resolve(ctx.cwd, required(ctx.options.template, '--template')),
    proteinPath: ctx.options.protein ? path.resolve(ctx.cwd, ctx.options.protein) : undefined,
    logger: ctx.logger
  })
  return report(ctx, outcomes, processingLabels)
}

const mmcSubmit: CommandHandler = async (ctx) => {
  const sacpPath = path.resolve(ctx.cwd, required(ctx.options.sacp, '--sacp'))
  const mmcPath = path.resolve(ctx.cwd, required(ctx.options.mmc, '--mmc'))
  const batchSize = positiveInt(ctx.options.batchSize, '--batch-size', config.mmcBatchSize)

  const selected = await scanAndSelect(ctx, {
    predicate: mmcJobs,
    fallback: { kind: 'all' },
    dir: await resolveSacpDir(sacpPath)
  })
  if (!selected) return EXIT_OK

  const outcomes = await submitMmcBatches(selected, {
    mmcPath,
    batchSize,
    logDir: path.join(ctx.cwd, 'slurm_logs'),
    profile: ctx.profiles.mmc,
    logger: ctx.logger
  })
  return report(ctx, outcomes, submissionLabels)
}

export const commands: Record<CommandName, CommandHandler> = {
  status,
  'gaussian-prep': gaussianPrep,
  'gaussian-submit': gaussianSubmit,
  'resp-setup': respSetup,
  'resp-submit': respSubmit,
  'amber-params': amberParams,
  'slv-convert': slvConvert,
  'sacp-setup': sacpSetup,
  'mmc-input': mmcInput,
  'mmc-submit': mmcSubmit
}

export { resolveJobsDir, scanAndSelect }
