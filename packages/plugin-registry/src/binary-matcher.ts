import type { Stats } from 'node:fs'
import * as fs from 'node:fs/promises'
import path from 'node:path'

import { createExecutabilityChecker, type ExecutabilityChecker } from './platform.js'

export const PLUGIN_BINARY_PREFIX = 'meterline-plugin-'
export const LEGACY_PLUGIN_BINARY_PREFIX = 'costwatch-plugin-'

export type BinaryMatchContext = {
  dir: string
  pluginName: string
  metadata: Record<string, string>
  checker: ExecutabilityChecker
  legacyPluginNames: boolean
}

/**
 * One naming convention for plugin binaries. Returns the matched path or null.
 */
export type BinaryMatcher = {
  name: string
  match(context: BinaryMatchContext): Promise<string | null>
}

async function statOrNull(filePath: string): Promise<Stats | null> {
  try {
    return await fs.stat(filePath)
  } catch {
    return null
  }
}

async function executableOrNull(
  filePath: string,
  checker: ExecutabilityChecker
): Promise<string | null> {
  const stats = await statOrNull(filePath)
  if (!stats || !stats.isFile()) return null
  return checker.isExecutable(filePath, stats) ? filePath : null
}

function byFileName(name: string, context: BinaryMatchContext): Promise<string | null> {
  return executableOrNull(
    path.join(context.dir, `${name}${context.checker.binarySuffix}`),
    context.checker
  )
}

export const exactNameMatcher: BinaryMatcher = {
  name: 'exact',
  match: (context) => byFileName(context.pluginName, context),
}

// `meterline-plugin-<name>-<region>` is tried first when metadata pins a region, so a
// multi-region archive runs the binary the user asked for.
export const prefixedNameMatcher: BinaryMatcher = {
  name: 'prefixed',
  async match(context) {
    const base = `${PLUGIN_BINARY_PREFIX}${context.pluginName}`
    const region = context.metadata.region
    if (region) {
      const regional = await byFileName(`${base}-${region}`, context)
      if (regional) return regional
    }
    return byFileName(base, context)
  },
}

export const legacyNameMatcher: BinaryMatcher = {
  name: 'legacy',
  match: (context) =>
    context.legacyPluginNames
      ? byFileName(`${LEGACY_PLUGIN_BINARY_PREFIX}${context.pluginName}`, context)
      : Promise.resolve(null),
}

export const anyExecutableMatcher: BinaryMatcher = {
  name: 'any-executable',
  async match(context) {
    let entries: string[]
    try {
      entries = await fs.readdir(context.dir)
    } catch {
      return null
    }
    for (const entry of entries.sort()) {
      const found = await executableOrNull(path.join(context.dir, entry), context.checker)
      if (found) return found
    }
    return null
  },
}

export const DEFAULT_BINARY_MATCHERS: readonly BinaryMatcher[] = [
  exactNameMatcher,
  prefixedNameMatcher,
  legacyNameMatcher,
  anyExecutableMatcher,
]

export type FindBinaryOptions = {
  metadata?: Record<string, string>
  checker?: ExecutabilityChecker
  legacyPluginNames?: boolean
  matchers?: readonly BinaryMatcher[]
}

/**
 * Pick the executable for a plugin version directory, trying each matcher in order.
 * Returns null when nothing in the directory qualifies.
 */
export async function findPluginBinary(
  dir: string,
  pluginName: string,
  options: FindBinaryOptions = {}
): Promise<string | null> {
  const context: BinaryMatchContext = {
    dir,
    pluginName,
    metadata: options.metadata ?? {},
    checker: options.checker ?? createExecutabilityChecker(),
    legacyPluginNames: options.legacyPluginNames ?? false,
  }

  for (const matcher of options.matchers ?? DEFAULT_BINARY_MATCHERS) {
    const found = await matcher.match(context)
    if (found) return found
  }
  return null
}
