import fs from 'fs-extra'
import path from 'path'
import type { Logger, SubmissionOutcome } from '@fragflow/pipeline-types'
import { noopLogger } from '@fragflow/pipeline-types'
import { buildGaussianInput, extractGeometryBlock } from '@fragflow/mol-utils'
import { processSequentially, requireDirectory, requireFile } from './job-utils.js'

export interface GaussianPrepOptions {
  /** Directory holding the .g geometry files */
  inputDir: string
  /** Where one job directory per geometry is created */
  outputDir: string
  /** Gaussian route/title template the geometry is appended to */
  templatePath: string
  logger?: Logger
}

const GAUSSIAN_INPUT = 'mpp.com'

const prepareGaussianInputs = async ({
  inputDir,
  outputDir,
  templatePath,
  logger = noopLogger
}: GaussianPrepOptions): Promise<SubmissionOutcome[]> => {
  await requireDirectory(inputDir, `${inputDir} is not a valid directory.`)
  await requireFile(templatePath, `Template file ${templatePath} not found.`)

  const template = await fs.readFile(templatePath, 'utf8')
  await fs.ensureDir(outputDir)

  const geometryFiles = (await fs.readdir(inputDir)).filter((f) => f.endsWith('.g')).sort()
  if (geometryFiles.length === 0) {
    logger.warn?.(`No .g files found in ${inputDir}`)
    return []
  }

  return processSequentially(
    geometryFiles,
    (filename) => path.basename(filename, '.g'),
    async (filename) => {
      const jobDir = path.join(outputDir, path.basename(filename, '.g'))
      const srcFile = path.join(inputDir, filename)
      await fs.ensureDir(jobDir)
      await fs.copy(srcFile, path.join(jobDir, filename))
      logger.info(`Copied ${filename} to ${jobDir}`)

      const geometry = extractGeometryBlock(await fs.readFile(srcFile, 'utf8'))
      if (geometry.length === 0) {
        throw new Error(`No charge and multiplicity line found in ${filename}`)
      }
      await fs.writeFile(
        path.join(jobDir, GAUSSIAN_INPUT),
        buildGaussianInput(template, geometry)
      )
      logger.info(`Created ${GAUSSIAN_INPUT} in ${jobDir}`)
    },
    logger
  )
}

export { prepareGaussianInputs }
