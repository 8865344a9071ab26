import dotenv from 'dotenv'
import path from 'path'
import { fileURLToPath } from 'url'
dotenv.config()

export interface SlurmProfile {
  time: string
  nodes: number
  ntasks: number
  cpusPerTask?: number
  partition: string
}

export interface SlurmProfiles {
  gaussian: SlurmProfile
  resp: SlurmProfile
  mmc: SlurmProfile
}

const intFromEnv = (name: string, fallback: number): number => {
  const raw = process.env[name]
  if (!raw) return fallback
  const value = parseInt(raw, 10)
  return Number.isNaN(value) ? fallback : value
}

const defaultTemplateDir = fileURLToPath(new URL('../templates', import.meta.url))

export const config = {
  logLevel: process.env.LOG_LEVEL ?? 'info',
  logDir: process.env.FRAGFLOW_LOGS ?? path.resolve('logs'),
  logTimezone: process.env.LOG_TIMEZONE ?? 'UTC',
  templateDir: process.env.FRAGFLOW_TEMPLATES ?? defaultTemplateDir,
  configFile: process.env.FRAGFLOW_CONFIG,

  // Scheduler
  sbatchBin: process.env.SBATCH ?? 'sbatch',
  sinfoBin: process.env.SINFO ?? 'sinfo',

  // Quantum chemistry
  gaussianBin: process.env.GAUSSIAN ?? 'g16',
  gaussianModule: process.env.GAUSSIAN_MODULE ?? 'gaussian/g16',
  gaussianProfile:
    process.env.GAUSSIAN_PROFILE ?? '/shared/centos7/gaussian/g16/bsd/g16.profile',
  gaussianScratchRoot: process.env.GAUSSIAN_SCRATCH ?? '/scratch/$USER',
  completionMarker: 'Normal termination',
  errorMarker: 'Error termination',

  // AMBER tools
  antechamberBin: process.env.ANTECHAMBER ?? 'antechamber',
  parmchk2Bin: process.env.PARMCHK2 ?? 'parmchk2',
  tleapBin: process.env.TLEAP ?? 'tleap',

  // MMC
  mmcBinaryName: 'mmc.bin',
  parallelModule: process.env.PARALLEL_MODULE ?? 'parallel',
  mmcBatchSize: intFromEnv('MMC_BATCH_SIZE', 8),

  slurm: {
    gaussian: {
      time: process.env.GAUSSIAN_TIME ?? '5:59:00',
      nodes: 1,
      ntasks: intFromEnv('GAUSSIAN_NTASKS', 16),
      partition: process.env.SLURM_PARTITION ?? 'short'
    },
    resp: {
      time: process.env.RESP_TIME ?? '5:59:00',
      nodes: 1,
      ntasks: intFromEnv('RESP_NTASKS', 16),
      partition: process.env.SLURM_PARTITION ?? 'short'
    },
    mmc: {
      time: process.env.MMC_TIME ?? '47:59:00',
      nodes: 1,
      // Tasks per molecule; a batch asks for this times its size
      ntasks: 1,
      cpusPerTask: 1,
      partition: process.env.SLURM_PARTITION ?? 'short'
    }
  } satisfies SlurmProfiles
}

export type Config = typeof config
