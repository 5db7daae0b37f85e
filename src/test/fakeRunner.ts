import { CommandResult, CommandRunner } from '../system/processRunner'

export interface RecordedCall {
  command: string
  args: string[]
  detached: boolean
}

/**
 * In-process CommandRunner: records every call and answers with canned output
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = []
  private readonly outputs = new Map<string, string>()
  private readonly failures = new Map<string, Error>()

  respond(command: string, stdout: string): this {
    this.outputs.set(command, stdout)
    return this
  }

  fail(command: string, error: Error): this {
    this.failures.set(command, error)
    return this
  }

  async run(command: string, args: string[]): Promise<CommandResult> {
    this.calls.push({ command, args, detached: false })
    const failure = this.failures.get(command)
    if (failure) throw failure
    return { stdout: this.outputs.get(command) ?? '', stderr: '' }
  }

  spawnDetached(command: string, args: string[]) {
    this.calls.push({ command, args, detached: true })
  }
}
