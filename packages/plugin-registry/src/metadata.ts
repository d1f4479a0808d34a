import * as fs from 'node:fs/promises'
import path from 'node:path'

import { z } from 'zod'

import { MetadataNotFoundError, MetadataParseError } from './errors.js'
import { isErrnoException } from './platform.js'
import type { PluginInfo } from './types.js'

export const PLUGIN_METADATA_FILE = 'plugin.metadata.json'
export const INSTALL_RECEIPT_FILE = '.install.json'

const metadataSchema = z.record(z.string())

const REGION_SUFFIX = /(?:us|eu|ap|sa|ca|me|af|il|mx)-[a-z]+-\d$/

export async function writePluginMetadata(
  versionDir: string,
  metadata: Record<string, string>
): Promise<void> {
  const filePath = path.join(versionDir, PLUGIN_METADATA_FILE)
  await fs.writeFile(filePath, `${JSON.stringify(metadata, null, 2)}\n`, { mode: 0o600 })
  // writeFile only applies mode when creating the file
  await fs.chmod(filePath, 0o600)
}

/**
 * Read `plugin.metadata.json` from a version directory.
 *
 * Throws MetadataNotFoundError when the file is absent, so callers can treat a missing file as
 * "no metadata" and still surface a corrupt one as MetadataParseError.
 */
export async function readPluginMetadata(versionDir: string): Promise<Record<string, string>> {
  const filePath = path.join(versionDir, PLUGIN_METADATA_FILE)

  let raw: string
  try {
    raw = await fs.readFile(filePath, 'utf8')
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new MetadataNotFoundError(filePath)
    }
    throw new MetadataParseError(filePath, 'cannot read file', { cause: error })
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    throw new MetadataParseError(
      filePath,
      error instanceof Error ? error.message : 'invalid JSON',
      { cause: error }
    )
  }

  const result = metadataSchema.safeParse(parsed)
  if (!result.success) {
    throw new MetadataParseError(filePath, 'expected an object of string values', {
      cause: result.error,
    })
  }
  return result.data
}

/**
 * Extract a trailing cloud region such as `us-east-1` from a binary file name.
 * Returns an empty string when the name carries no region.
 */
export function parseRegionFromBinaryName(binaryPath: string): string {
  const base = path.basename(binaryPath).replace(/\.exe$/i, '')
  const match = REGION_SUFFIX.exec(base)
  return match ? match[0] : ''
}

/**
 * Enrich the metadata a running plugin reported about itself with what the registry knows.
 * Keys the plugin reported always win.
 */
export function mergeRegistryMetadata(
  reported: Record<string, string>,
  plugin: Pick<PluginInfo, 'metadata'>
): Record<string, string> {
  const merged = { ...reported }
  for (const [key, value] of Object.entries(plugin.metadata ?? {})) {
    if (!(key in merged)) {
      merged[key] = value
    }
  }
  return merged
}

export const installReceiptSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  repository: z.string().min(1),
  assetName: z.string().min(1),
  sha256: z.string().regex(/^[0-9a-f]{64}$/),
  installedAt: z.string().datetime(),
})

export type InstallReceipt = z.infer<typeof installReceiptSchema>

export async function writeInstallReceipt(
  versionDir: string,
  receipt: InstallReceipt
): Promise<void> {
  const filePath = path.join(versionDir, INSTALL_RECEIPT_FILE)
  await fs.writeFile(filePath, `${JSON.stringify(receipt, null, 2)}\n`, { mode: 0o600 })
}

// Returns null when no receipt exists; installs made by hand have none.
export async function readInstallReceipt(versionDir: string): Promise<InstallReceipt | null> {
  const filePath = path.join(versionDir, INSTALL_RECEIPT_FILE)

  let raw: string
  try {
    raw = await fs.readFile(filePath, 'utf8')
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') return null
    throw error
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    throw new MetadataParseError(
      filePath,
      error instanceof Error ? error.message : 'invalid JSON',
      { cause: error }
    )
  }

  const result = installReceiptSchema.safeParse(parsed)
  if (!result.success) {
    throw new MetadataParseError(filePath, 'malformed install receipt', { cause: result.error })
  }
  return result.data
}
