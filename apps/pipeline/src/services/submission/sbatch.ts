import { config } from '../../config/config.js'
import { runCommand } from '../../helpers/runCommand.js'
import { getErrorMessage } from '../errors.js'

export type SubmitResult = { ok: true; jobId?: string } | { ok: false; reason: string }

export type ScriptSubmitter = (scriptPath: string) => Promise<SubmitResult>

// "Submitted batch job 12345" -> "12345"
const parseJobId = (stdout: string): string | undefined => {
  const tokens = stdout.trim().split(/\s+/)
  const last = tokens[tokens.length - 1]
  return last ? last : undefined
}

/**
 * Hands one script to sbatch. Never retried; a non-zero exit reports the
 * scheduler's stderr as the reason.
 */
const submitScript = async (
  scriptPath: string,
  sbatchBin: string = config.sbatchBin
): Promise<SubmitResult> => {
  try {
    const { code, stderr, stdout } = await runCommand(sbatchBin, [scriptPath])
    if (code === 0) {
      return { ok: true, jobId: parseJobId(stdout) }
    }
    return { ok: false, reason: stderr || `sbatch exited with code ${code}` }
  } catch (error) {
    return { ok: false, reason: getErrorMessage(error) }
  }
}

export { parseJobId, submitScript }
