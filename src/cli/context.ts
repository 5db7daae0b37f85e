import { ColorweaveConfig, resolveConfig } from '../config'
import { CommandRunner, nodeCommandRunner } from '../system/processRunner'

/**
 * Everything a command touches outside its own arguments
 */
export interface CliContext {
  config: ColorweaveConfig
  runner: CommandRunner
  platform: NodeJS.Platform
  env: NodeJS.ProcessEnv
  print: (text?: string) => void
}

export function createDefaultContext(): CliContext {
  return {
    config: resolveConfig(process.env),
    runner: nodeCommandRunner,
    platform: process.platform,
    env: process.env,
    print: (text = '') => console.log(text),
  }
}
