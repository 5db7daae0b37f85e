// Apply a scheme variant through wallust's pywal format

import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { ColorweaveConfig } from '../config'
import { CommandRunner, nodeCommandRunner } from '../system/processRunner'
import { SchemeVariant } from '../types/scheme'
import { Color } from '../utils/colorDistance/types'
import { backgroundOf, foregroundOf } from './variants'

export interface PywalScheme {
  special: {
    background: Color | null
    foreground: Color | null
    cursor: Color | null
  }
  colors: Record<string, Color | null>
}

export function toPywalScheme(variant: SchemeVariant): PywalScheme {
  const colors: Record<string, Color | null> = {}
  for (let i = 0; i < 16; i++) {
    colors[`color${i}`] = variant.colors[`color${i}`] ?? null
  }

  return {
    special: {
      background: backgroundOf(variant) ?? null,
      foreground: foregroundOf(variant) ?? null,
      cursor: variant.colors.cursor ?? variant.colors.color7 ?? null,
    },
    colors,
  }
}

/**
 * Write the variant to a temporary pywal file and hand it to `wallust cs`.
 * On macOS wallust is run once more with -s to skip sequences the terminal rejects.
 */
export async function applyVariant(
  variant: SchemeVariant,
  config: ColorweaveConfig,
  runner: CommandRunner = nodeCommandRunner,
  platform: NodeJS.Platform = process.platform
) {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'colorweave-'))
  const file = path.join(dir, `${variant.name}.json`)

  try {
    await fs.writeFile(file, JSON.stringify(toPywalScheme(variant)))
    const baseArgs = ['cs', file, '--format', 'pywal', '-d', config.wallustConfigDir]
    if (platform === 'darwin') {
      await runner.run(config.tools.wallust, [...baseArgs, '-s', '-q'])
    }
    await runner.run(config.tools.wallust, [...baseArgs, '-q'])
  } finally {
    await fs.rm(dir, { recursive: true, force: true })
  }
}
