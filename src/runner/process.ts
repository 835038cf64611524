import { spawn } from 'node:child_process'

export interface ProcessResult {
  code: number | null
  signal: NodeJS.Signals | null
  /** stdout and stderr interleaved in arrival order. */
  output: string
}

export interface ProcessOptions {
  env?: NodeJS.ProcessEnv
  cwd?: string
  signal?: AbortSignal
}

/**
 * Runs a command to completion, collecting stdout and stderr into a
 * single text. Rejects only when the process cannot be started (or is
 * aborted before it starts); a non-zero exit resolves normally.
 */
export function runProcess(command: string, args: string[], options: ProcessOptions = {}): Promise<ProcessResult> {
  return new Promise<ProcessResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      signal: options.signal,
      stdio: ['ignore', 'pipe', 'pipe']
    })

    const chunks: Buffer[] = []
    const collect = (chunk: Buffer | string): void => {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk)
    }
    child.stdout.on('data', collect)
    child.stderr.on('data', collect)

    let started = false
    child.on('spawn', () => {
      started = true
    })
    child.on('error', (error) => {
      // Once running, an abort surfaces through 'close' with the kill signal.
      if (!started) reject(error)
    })
    child.on('close', (code, signal) => {
      resolve({ code, signal, output: Buffer.concat(chunks).toString('utf-8') })
    })
  })
}
