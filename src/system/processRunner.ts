// Child process plumbing for the external tools colorweave drives

import { spawn } from 'node:child_process'
import { ExternalToolError } from '../utils/errors'
import { createLogger } from '../utils/logger'

const log = createLogger('Process')

export interface CommandResult {
  stdout: string
  stderr: string
}

export interface CommandRunner {
  /** Run to completion; rejects with ExternalToolError on spawn failure or non-zero exit */
  run(command: string, args: string[]): Promise<CommandResult>
  /** Start a long-lived process (e.g. swaybg) and leave it running */
  spawnDetached(command: string, args: string[]): void
}

export const nodeCommandRunner: CommandRunner = {
  run(command, args) {
    return new Promise<CommandResult>((resolve, reject) => {
      log.debug(`${command} ${args.join(' ')}`)
      const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] })

      let stdout = ''
      let stderr = ''

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString()
      })

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString()
      })

      child.on('close', (code) => {
        if (code !== 0) {
          reject(new ExternalToolError(command, `exited with code ${code}: ${stderr.trim()}`, code))
        } else {
          resolve({ stdout, stderr })
        }
      })

      child.on('error', (err) => {
        log.error(`Failed to start ${command}:`, err.message)
        reject(new ExternalToolError(command, `failed to start: ${err.message}`))
      })
    })
  },

  spawnDetached(command, args) {
    log.debug(`${command} ${args.join(' ')} (detached)`)
    const child = spawn(command, args, { detached: true, stdio: 'ignore' })
    child.on('error', (err) => {
      log.error(`Failed to start ${command}:`, err.message)
    })
    child.unref()
  },
}
