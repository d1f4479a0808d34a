import type { Dirent } from 'node:fs'
import * as fs from 'node:fs/promises'
import path from 'node:path'

import type { SemVer } from 'semver'

import { findPluginBinary } from './binary-matcher.js'
import { isPluginRegistryError } from './errors.js'
import { pluginWarn } from './logger.js'
import { parseRegionFromBinaryName, readPluginMetadata } from './metadata.js'
import {
  createExecutabilityChecker,
  isErrnoException,
  type ExecutabilityChecker,
} from './platform.js'
import type { LatestPlugin, LatestPlugins, PluginInfo } from './types.js'
import { parseVersion } from './version.js'

export type PluginRegistryOptions = {
  root: string
  checker?: ExecutabilityChecker
  legacyPluginNames?: boolean
}

async function readVisibleDirectories(dir: string): Promise<Dirent[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true })
  return entries
    .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
    .sort((a, b) => a.name.localeCompare(b.name))
}

/**
 * Read-only view of the installed plugin tree `<root>/<name>/<version>/`.
 * Safe to use while an install is running; half-populated directories are skipped.
 */
export class PluginRegistry {
  readonly root: string
  private readonly checker: ExecutabilityChecker
  private readonly legacyPluginNames: boolean

  constructor(options: PluginRegistryOptions) {
    this.root = options.root
    this.checker = options.checker ?? createExecutabilityChecker()
    this.legacyPluginNames = options.legacyPluginNames ?? false
  }

  /**
   * Every installed (name, version) that resolves to a binary. A missing root yields an empty list.
   */
  async listPlugins(): Promise<PluginInfo[]> {
    let names: Dirent[]
    try {
      names = await readVisibleDirectories(this.root)
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return []
      throw error
    }

    const plugins: PluginInfo[] = []
    for (const nameEntry of names) {
      const pluginDir = path.join(this.root, nameEntry.name)
      let versions: Dirent[]
      try {
        versions = await readVisibleDirectories(pluginDir)
      } catch (error) {
        pluginWarn('Skipping unreadable plugin directory', {
          path: pluginDir,
          error: String(error),
        })
        continue
      }

      for (const versionEntry of versions) {
        const plugin = await this.inspectVersion(nameEntry.name, versionEntry.name)
        if (plugin) plugins.push(plugin)
      }
    }
    return plugins
  }

  /**
   * The highest valid version of each plugin, sorted by name. Versions that are not valid
   * semver are left out and reported in `warnings`.
   */
  async listLatestPlugins(): Promise<LatestPlugins> {
    const latest = new Map<string, { plugin: PluginInfo; version: SemVer }>()
    const warnings: string[] = []

    for (const plugin of await this.listPlugins()) {
      const parsed = parseVersion(plugin.version)
      if (!parsed) {
        const warning = `Plugin ${plugin.name} version ${plugin.version} has invalid semver format`
        warnings.push(warning)
        pluginWarn(warning, { path: plugin.path })
        continue
      }

      const existing = latest.get(plugin.name)
      if (!existing || parsed.compare(existing.version) > 0) {
        latest.set(plugin.name, { plugin, version: parsed })
      }
    }

    const plugins = [...latest.values()]
      .map((entry) => entry.plugin)
      .sort((a, b) => a.name.localeCompare(b.name))
    return { plugins, warnings }
  }

  async getLatestPlugin(name: string): Promise<LatestPlugin> {
    const { plugins, warnings } = await this.listLatestPlugins()
    return { plugin: plugins.find((plugin) => plugin.name === name) ?? null, warnings }
  }

  private async inspectVersion(name: string, version: string): Promise<PluginInfo | null> {
    const versionDir = path.join(this.root, name, version)

    let metadata: Record<string, string> | undefined
    try {
      metadata = await readPluginMetadata(versionDir)
    } catch (error) {
      if (!isPluginRegistryError(error, 'METADATA_NOT_FOUND')) {
        pluginWarn('Ignoring unreadable plugin metadata', {
          plugin: name,
          version,
          error: error instanceof Error ? error.message : String(error),
        })
      }
    }

    const binaryPath = await findPluginBinary(versionDir, name, {
      metadata,
      checker: this.checker,
      legacyPluginNames: this.legacyPluginNames,
    })
    if (!binaryPath) return null

    if (!metadata) {
      const region = parseRegionFromBinaryName(binaryPath)
      if (region) metadata = { region }
    }

    return metadata
      ? { name, version, path: binaryPath, metadata }
      : { name, version, path: binaryPath }
  }
}
