import fs from 'fs-extra'
import { parse as parseYaml } from 'yaml'
import * as yup from 'yup'
import { config } from './config.js'
import type { SlurmProfile, SlurmProfiles } from './config.js'
import { ConfigurationError } from '../services/errors.js'

const profileOverrideSchema = yup
  .object({
    time: yup
      .string()
      .matches(/^(\d+-)?\d+(:\d{2}){0,2}$/, 'time must look like D-HH:MM:SS or HH:MM:SS'),
    nodes: yup.number().integer().min(1),
    ntasks: yup.number().integer().min(1),
    cpusPerTask: yup.number().integer().min(1),
    partition: yup.string().min(1)
  })
  .noUnknown(true)
  .optional()

const overridesSchema = yup
  .object({
    slurm: yup
      .object({
        gaussian: profileOverrideSchema,
        resp: profileOverrideSchema,
        mmc: profileOverrideSchema
      })
      .noUnknown(true)
      .optional()
  })
  .noUnknown(true)

type ProfileOverride = Partial<SlurmProfile> | undefined

const mergeProfile = (base: SlurmProfile, override: ProfileOverride): SlurmProfile => {
  if (!override) return { ...base }
  const merged: SlurmProfile = { ...base }
  if (override.time !== undefined) merged.time = override.time
  if (override.nodes !== undefined) merged.nodes = override.nodes
  if (override.ntasks !== undefined) merged.ntasks = override.ntasks
  if (override.cpusPerTask !== undefined) merged.cpusPerTask = override.cpusPerTask
  if (override.partition !== undefined) merged.partition = override.partition
  return merged
}

/**
 * Applies the `slurm:` section of a YAML file on top of the built-in profiles.
 *
 * ```yaml
 * slurm:
 *   mmc:
 *     time: "23:59:00"
 *     partition: long
 * ```
 */
export const parseSlurmOverrides = (
  yamlContent: string,
  base: SlurmProfiles = config.slurm
): SlurmProfiles => {
  const parsed: unknown = parseYaml(yamlContent) ?? {}
  let overrides: yup.InferType<typeof overridesSchema>
  try {
    overrides = overridesSchema.validateSync(parsed, { abortEarly: false })
  } catch (error) {
    if (error instanceof yup.ValidationError) {
      throw new ConfigurationError(`Invalid configuration: ${error.errors.join('; ')}`)
    }
    throw error
  }
  const slurm = overrides.slurm
  return {
    gaussian: mergeProfile(base.gaussian, slurm?.gaussian),
    resp: mergeProfile(base.resp, slurm?.resp),
    mmc: mergeProfile(base.mmc, slurm?.mmc)
  }
}

export const loadSlurmProfiles = async (
  configFile: string | undefined = config.configFile
): Promise<SlurmProfiles> => {
  if (!configFile) return parseSlurmOverrides('')
  const content = await fs.readFile(configFile, 'utf8')
  return parseSlurmOverrides(content)
}
