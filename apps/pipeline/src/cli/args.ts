import { ConfigurationError } from '../services/errors.js'

export const COMMANDS = [
  'status',
  'gaussian-prep',
  'gaussian-submit',
  'resp-setup',
  'resp-submit',
  'amber-params',
  'slv-convert',
  'sacp-setup',
  'mmc-input',
  'mmc-submit'
] as const

export type CommandName = (typeof COMMANDS)[number]

export const HELP = `
fragflow - prepare fragment libraries through Gaussian, RESP, AMBER and MMC

Usage:
  fragflow status [-j dir]                         Show the pipeline stage of every job
  fragflow gaussian-prep --input <dir> --output <dir> --template <file>
                                                   Create job directories with mpp.com
  fragflow gaussian-submit [selection] [--status]  Submit optimization jobs
  fragflow resp-setup [-j dir]                     Create RESP inputs from checkpoints
  fragflow resp-submit [selection]                 Submit RESP jobs
  fragflow amber-params [selection] [-v]           Run antechamber, parmchk2 and tleap
  fragflow slv-convert [selection] [--strict]      Write lig.slv from the AMBER files
  fragflow sacp-setup --library <dir> --sacp <dir> [--split N]
                                                   Collect ligand files into SACP
  fragflow mmc-input --sacp <dir> --template <file> [--protein <dir>]
                                                   Write prot.inp for every molecule
  fragflow mmc-submit --sacp <dir> --mmc <dir> [--batch-size 8] [selection]
                                                   Submit MMC jobs in batches

Selection:
  -l, --list             List jobs only
  -a, --all              Select every listed job
  -n, --number <N>       Select N jobs ...
  -s, --start <S>        ... starting at index S (default: 1)
  -i, --indices <list>   Select jobs by index, e.g. 1,3,5

Options:
  -j, --jobs-dir <dir>   Directory holding the job folders
                         (default: parent of the current directory)
  --config <file>        YAML file with Slurm profile overrides
  -v, --verbose          Log debug output
  -h, --help             Show this help
`

export interface CliOptions {
  jobsDir?: string
  list: boolean
  status: boolean
  all: boolean
  count?: string
  start?: string
  indices?: string
  verbose: boolean
  strict: boolean
  help: boolean
  config?: string
  input?: string
  output?: string
  template?: string
  library?: string
  sacp?: string
  split?: string
  protein?: string
  mmc?: string
  batchSize?: string
}

type ValueOption = {
  [K in keyof CliOptions]-?: CliOptions[K] extends string | undefined ? K : never
}[keyof CliOptions]

type FlagOption = {
  [K in keyof CliOptions]-?: CliOptions[K] extends boolean ? K : never
}[keyof CliOptions]

const valueOptions = new Map<string, ValueOption>([
  ['-j', 'jobsDir'],
  ['--jobs-dir', 'jobsDir'],
  ['--jobs_dir', 'jobsDir'],
  ['-n', 'count'],
  ['--number', 'count'],
  ['-s', 'start'],
  ['--start', 'start'],
  ['-i', 'indices'],
  ['--indices', 'indices'],
  ['--config', 'config'],
  ['--input', 'input'],
  ['--output', 'output'],
  ['--template', 'template'],
  ['--library', 'library'],
  ['--sacp', 'sacp'],
  ['--split', 'split'],
  ['--protein', 'protein'],
  ['--mmc', 'mmc'],
  ['--batch-size', 'batchSize']
])

const flagOptions = new Map<string, FlagOption>([
  ['-l', 'list'],
  ['--list', 'list'],
  ['-a', 'all'],
  ['--all', 'all'],
  ['--status', 'status'],
  ['-v', 'verbose'],
  ['--verbose', 'verbose'],
  ['--strict', 'strict'],
  ['-h', 'help'],
  ['--help', 'help']
])

export const isCommandName = (value: string): value is CommandName =>
  (COMMANDS as readonly string[]).includes(value)

function parseArgs(args: string[]): { command?: CommandName; options: CliOptions } {
  const options: CliOptions = {
    list: false,
    status: false,
    all: false,
    verbose: false,
    strict: false,
    help: false
  }
  let command: CommandName | undefined

  for (let i = 0; i < args.length; i++) {
    const raw = args[i]
    // --name=value
    const eq = raw.startsWith('--') ? raw.indexOf('=') : -1
    const arg = eq > 0 ? raw.slice(0, eq) : raw

    const valueKey = valueOptions.get(arg)
    if (valueKey) {
      const value = eq > 0 ? raw.slice(eq + 1) : args[++i]
      if (value === undefined || (eq < 0 && value.startsWith('-') && !/^-\d/.test(value))) {
        throw new ConfigurationError(`Missing value for ${arg}`)
      }
      options[valueKey] = value
      continue
    }

    const flagKey = flagOptions.get(arg)
    if (flagKey) {
      if (eq > 0) throw new ConfigurationError(`${arg} does not take a value`)
      options[flagKey] = true
      continue
    }

    if (arg.startsWith('-')) {
      throw new ConfigurationError(`Unknown option: ${arg}`)
    }
    if (command) {
      throw new ConfigurationError(`Unexpected argument: ${arg}`)
    }
    if (!isCommandName(arg)) {
      throw new ConfigurationError(`Unknown command: ${arg}`)
    }
    command = arg
  }

  return { command, options }
}

export { parseArgs }
