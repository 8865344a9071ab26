import fs from 'fs-extra'
import path from 'path'
import { registerPartial, renderTemplate } from '../../helpers/templates.js'

export interface SlurmDirectives {
  jobName: string
  output: string
  error: string
  time: string
  nodes: number
  ntasks: number
  cpusPerTask?: number
  partition: string
}

export interface GaussianScriptBody {
  /** Job name shown in the start and finish messages */
  jobLabel: string
  workDir: string
  scratchDir: string
  inputFile: string
  gaussianBin: string
  gaussianModule: string
  gaussianProfile: string
}

export interface MmcBatchScriptBody {
  parallelModule: string
  jobs: number
  commands: string[]
}

export interface SlurmTemplateBodies {
  gaussian: GaussianScriptBody
  resp: GaussianScriptBody
  'mmc-batch': MmcBatchScriptBody
}

export type SlurmTemplate = keyof SlurmTemplateBodies

/**
 * Renders a batch script from `templates/slurm/<template>.handlebars`. Every
 * template opens with the shared `sbatch-header` partial.
 */
const renderSlurmScript = async <T extends SlurmTemplate>(
  template: T,
  directives: SlurmDirectives,
  body: SlurmTemplateBodies[T],
  templateDir?: string
): Promise<string> => {
  await registerPartial('sbatchHeader', 'slurm/sbatch-header', templateDir)
  return renderTemplate(`slurm/${template}`, { ...body, directives }, templateDir)
}

const writeSlurmScript = async (scriptPath: string, content: string): Promise<string> => {
  await fs.ensureDir(path.dirname(scriptPath))
  await fs.writeFile(scriptPath, content, { mode: 0o755 })
  // mode is only applied on create
  await fs.chmod(scriptPath, 0o755)
  return scriptPath
}

export { renderSlurmScript, writeSlurmScript }
