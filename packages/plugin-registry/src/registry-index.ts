import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'

import { z } from 'zod'

import { InvalidSpecifierError } from './errors.js'

const assetHintsSchema = z.object({
  assetPrefix: z.string().min(1).optional(),
  defaultRegion: z.string().min(1).optional(),
  versionPrefix: z.string().optional(),
})

const registryEntrySchema = z.object({
  name: z.string().regex(/^[A-Za-z0-9._-]+$/),
  description: z.string(),
  repository: z.string().regex(/^[^/\s]+\/[^/\s]+$/, 'expected owner/repo'),
  author: z.string(),
  securityLevel: z.enum(['official', 'community', 'experimental']),
  assetHints: assetHintsSchema.optional(),
})

export const registryIndexSchema = z.object({
  plugins: z.array(registryEntrySchema),
})

export type RegistryEntry = z.infer<typeof registryEntrySchema>
export type RegistryIndex = z.infer<typeof registryIndexSchema>

export const BUNDLED_REGISTRY_INDEX = fileURLToPath(
  new URL('../data/registry.json', import.meta.url)
)

let cachedIndex: RegistryIndex | null = null

export function parseRegistryIndex(raw: unknown): RegistryIndex {
  const result = registryIndexSchema.safeParse(raw)
  if (!result.success) {
    throw new Error(`Invalid plugin registry index: ${result.error.message}`)
  }
  return result.data
}

export function loadRegistryIndex(filePath: string = BUNDLED_REGISTRY_INDEX): RegistryIndex {
  if (filePath === BUNDLED_REGISTRY_INDEX && cachedIndex) {
    return cachedIndex
  }
  const index = parseRegistryIndex(JSON.parse(readFileSync(filePath, 'utf8')))
  if (filePath === BUNDLED_REGISTRY_INDEX) {
    cachedIndex = index
  }
  return index
}

export function getRegistryEntry(
  name: string,
  index: RegistryIndex = loadRegistryIndex()
): RegistryEntry {
  const entry = index.plugins.find((plugin) => plugin.name === name)
  if (!entry) {
    const known = index.plugins.map((plugin) => plugin.name).join(', ')
    throw new InvalidSpecifierError(name, `unknown plugin; known plugins: ${known || 'none'}`)
  }
  return entry
}
