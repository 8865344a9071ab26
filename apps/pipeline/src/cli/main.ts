import { openRunLog } from '../helpers/loggers.js'
import { loadSlurmProfiles } from '../config/slurm-profiles.js'
import { config } from '../config/config.js'
import { ConfigurationError, getErrorMessage } from '../services/errors.js'
import { HELP, parseArgs } from './args.js'
import type { CliOptions, CommandName } from './args.js'
import { commands } from './commands.js'

const usageError = (message: string): number => {
  console.error(`Error: ${message}`)
  console.error(HELP)
  return 1
}

/**
 * Parses `argv`, runs one command under its own run log and returns the
 * process exit code.
 */
const main = async (argv: string[], cwd: string = process.cwd()): Promise<number> => {
  let command: CommandName | undefined
  let options: CliOptions
  try {
    ;({ command, options } = parseArgs(argv))
  } catch (error) {
    return usageError(getErrorMessage(error))
  }

  if (options.help) {
    console.log(HELP)
    return 0
  }
  if (!command) {
    return usageError('No command given')
  }

  const run = openRunLog(command, options.verbose)
  try {
    const profiles = await loadSlurmProfiles(options.config ?? config.configFile)
    return await commands[command]({ options, cwd, logger: run.logger, profiles })
  } catch (error) {
    if (error instanceof ConfigurationError) {
      run.logger.error(error.message)
    } else {
      run.logger.error(`${command} failed: ${getErrorMessage(error)}`)
    }
    return 1
  } finally {
    await run.close()
  }
}

export { main }
