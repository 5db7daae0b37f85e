// Color schemes stored as <name>.json in the schemes directory

import fs from 'node:fs/promises'
import path from 'node:path'
import { ColorweaveConfig } from '../config'
import { Scheme, SchemeVariant } from '../types/scheme'
import { isColor, normalizeHex } from '../utils/colorDistance/colorConversion'
import { InvalidInputError, NotFoundError } from '../utils/errors'
import { createLogger } from '../utils/logger'
import { createColorProfile, isVariantType } from './variants'

const log = createLogger('Scheme')

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseVariant(name: string, data: unknown): SchemeVariant {
  if (!isRecord(data) || !isRecord(data.colors)) {
    throw new InvalidInputError(`Variant '${name}' has no colors`)
  }

  const colors: Record<string, string> = {}
  for (const [slot, value] of Object.entries(data.colors)) {
    if (!isColor(value)) {
      throw new InvalidInputError(`Variant '${name}' has an invalid ${slot}: ${String(value)}`)
    }
    colors[slot] = normalizeHex(value)
  }

  const type = data.type ?? 'dark'
  if (!isVariantType(type)) {
    throw new InvalidInputError(`Variant '${name}' has unknown type ${String(type)}`)
  }
  return { name, type, colors }
}

/**
 * Validate parsed scheme JSON: { name, variants: { [name]: { type?, colors } } }
 */
export function parseScheme(data: unknown): Scheme {
  if (!isRecord(data) || typeof data.name !== 'string' || !isRecord(data.variants)) {
    throw new InvalidInputError('Scheme must have a name and a variants object')
  }

  const variants: Record<string, SchemeVariant> = {}
  for (const [name, variant] of Object.entries(data.variants)) {
    variants[name] = parseVariant(name, variant)
  }
  return { name: data.name, variants }
}

function schemePath(config: ColorweaveConfig, name: string): string {
  return path.join(config.schemesDir, `${name}.json`)
}

async function readJsonFiles(dir: string): Promise<string[]> {
  try {
    const files = await fs.readdir(dir)
    return files.filter(f => f.endsWith('.json')).map(f => f.slice(0, -'.json'.length)).sort()
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return []
    throw err
  }
}

export async function loadScheme(config: ColorweaveConfig, name: string): Promise<Scheme> {
  let raw: string
  try {
    raw = await fs.readFile(schemePath(config, name), 'utf8')
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new NotFoundError('Scheme', name)
    }
    throw err
  }
  return parseScheme(JSON.parse(raw))
}

export function listSchemes(config: ColorweaveConfig): Promise<string[]> {
  return readJsonFiles(config.schemesDir)
}

/**
 * Copy a scheme file into the store under the scheme's own name
 */
export async function importScheme(config: ColorweaveConfig, filePath: string): Promise<Scheme> {
  const scheme = parseScheme(JSON.parse(await fs.readFile(filePath, 'utf8')))
  await fs.mkdir(config.schemesDir, { recursive: true })
  await fs.writeFile(schemePath(config, scheme.name), JSON.stringify(scheme, null, 2))
  log.info(`Imported scheme ${scheme.name} with ${Object.keys(scheme.variants).length} variants`)
  return scheme
}

export async function analyzeScheme(config: ColorweaveConfig, name: string) {
  const profile = createColorProfile(await loadScheme(config, name))
  await fs.mkdir(config.profilesDir, { recursive: true })
  await fs.writeFile(path.join(config.profilesDir, `${name}.json`), JSON.stringify(profile, null, 2))
  return profile
}

export async function getSchemesWithoutProfiles(config: ColorweaveConfig): Promise<string[]> {
  const profiles = new Set(await readJsonFiles(config.profilesDir))
  return (await listSchemes(config)).filter(name => !profiles.has(name))
}
