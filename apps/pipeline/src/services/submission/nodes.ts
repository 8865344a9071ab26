import type { Logger } from '@fragflow/pipeline-types'
import { config } from '../../config/config.js'
import { runCommand } from '../../helpers/runCommand.js'
import { getErrorMessage } from '../errors.js'

/**
 * Prints free and allocated CPUs per node. Informational only; any failure
 * is logged and the submission goes ahead.
 */
const checkNodeAvailability = async (
  logger: Logger,
  sinfoBin: string = config.sinfoBin
): Promise<boolean> => {
  try {
    const { code, stdout, stderr } = await runCommand(sinfoBin, ['-o', '%n %C'])
    if (code === 0) {
      logger.info(`Current node availability:\n${stdout}`)
      return true
    }
    logger.warn?.(`Could not check nodes: ${stderr || `sinfo exited with code ${code}`}`)
    return false
  } catch (error) {
    logger.warn?.(`Error checking nodes: ${getErrorMessage(error)}`)
    return false
  }
}

export { checkNodeAvailability }
