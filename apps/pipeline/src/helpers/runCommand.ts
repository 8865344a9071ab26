import { spawn } from 'node:child_process'
import { once } from 'node:events'
import readline from 'node:readline'

export interface RunCommandOptions {
  cwd?: string
  env?: NodeJS.ProcessEnv
  input?: string
  onStdoutLine?: (line: string) => void
  onStderrLine?: (line: string) => void
}

interface ExitStatus {
  code: number | null
  signal: NodeJS.Signals | null
}

export interface CommandResult extends ExitStatus {
  stdout: string
  stderr: string
}

/**
 * Runs an external program to completion and collects its output.
 * Rejects only when the process cannot be started (e.g. ENOENT).
 */
export async function runCommand(
  command: string,
  args: string[],
  opts: RunCommandOptions = {}
): Promise<CommandResult> {
  const { cwd, env, input, onStdoutLine, onStderrLine } = opts

  const child = spawn(command, args, {
    cwd,
    env: { ...process.env, ...env },
    stdio: [input === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe']
  })

  const errorP = once(child, 'error').then(([err]): never => {
    throw err
  })

  const stdoutLines: string[] = []
  const stderrLines: string[] = []
  let rlOut: readline.Interface | undefined
  let rlErr: readline.Interface | undefined
  if (child.stdout) {
    rlOut = readline.createInterface({ input: child.stdout })
    rlOut.on('line', (raw: string) => {
      const line = raw.replace(/\r$/, '')
      stdoutLines.push(line)
      onStdoutLine?.(line)
    })
  }
  if (child.stderr) {
    rlErr = readline.createInterface({ input: child.stderr })
    rlErr.on('line', (raw: string) => {
      const line = raw.replace(/\r$/, '')
      stderrLines.push(line)
      onStderrLine?.(line)
    })
  }

  if (input !== undefined && child.stdin) {
    child.stdin.end(input)
  }

  // Prefer 'close' so all stdio is drained
  const closeP = once(child, 'close').then(([code, signal]) => {
    const exit: ExitStatus = { code, signal }
    return exit
  })

  let status: ExitStatus
  try {
    status = await Promise.race([closeP, errorP])
  } finally {
    rlOut?.close()
    rlErr?.close()
  }

  return {
    ...status,
    stdout: stdoutLines.join('\n'),
    stderr: stderrLines.join('\n')
  }
}
