import path from 'node:path'
import process from 'node:process'

import {
  Installer,
  parseConfig,
  PluginRegistry,
  ReleaseClient,
  type PluginInfo,
  type RegistryConfig,
} from '@meterline/plugin-registry'

import { formatBytes, parseMetadataFlags, renderPlugins } from './lib/format.js'

type PluginDirOption = { pluginDir?: string }

function resolvePluginDir(config: RegistryConfig, options: PluginDirOption): string {
  return options.pluginDir ? path.resolve(options.pluginDir) : config.pluginDir
}

function createInstaller(config: RegistryConfig, pluginDir: string): Installer {
  return new Installer({
    pluginDir,
    releaseClient: new ReleaseClient({
      baseUrl: config.releaseApiUrl,
      token: config.githubToken,
    }),
    legacyPluginNames: config.legacyPluginNames,
  })
}

const progress = (message: string) => console.log(message)

export async function commandInstall(
  specifier: string,
  options: PluginDirOption & {
    force?: boolean
    clean?: boolean
    fallback?: boolean
    metadata?: string[]
  }
): Promise<void> {
  const config = parseConfig(process.env)
  const pluginDir = resolvePluginDir(config, options)
  const { metadata, warnings } = parseMetadataFlags(options.metadata ?? [])
  for (const warning of warnings) {
    console.warn(`warning: ${warning}`)
  }

  const installer = createInstaller(config, pluginDir)
  const result = await installer.install(
    specifier,
    {
      force: options.force,
      noFallback: options.fallback === false,
      metadata: Object.keys(metadata).length > 0 ? metadata : undefined,
    },
    progress
  )
  console.log(`Binary: ${result.path}`)

  if (options.clean) {
    const cleanup = await installer.removeOtherVersions(
      result.name,
      result.version,
      pluginDir,
      progress
    )
    if (cleanup.removedVersions.length > 0) {
      console.log(
        `Removed ${cleanup.removedVersions.length} old version(s), freed ${formatBytes(cleanup.bytesFreed)}`
      )
    }
  }
}

export async function commandList(
  options: PluginDirOption & { all?: boolean; json?: boolean }
): Promise<void> {
  const config = parseConfig(process.env)
  const registry = new PluginRegistry({
    root: resolvePluginDir(config, options),
    legacyPluginNames: config.legacyPluginNames,
  })

  let plugins: PluginInfo[]
  if (options.all) {
    plugins = await registry.listPlugins()
  } else {
    const latest = await registry.listLatestPlugins()
    for (const warning of latest.warnings) {
      console.warn(`warning: ${warning}`)
    }
    plugins = latest.plugins
  }

  if (options.json) {
    console.log(JSON.stringify(plugins, null, 2))
    return
  }
  renderPlugins(plugins)
}

export async function commandUpdate(
  name: string,
  options: PluginDirOption & { version?: string; dryRun?: boolean }
): Promise<void> {
  const config = parseConfig(process.env)
  const installer = createInstaller(config, resolvePluginDir(config, options))
  const result = await installer.update(name, {
    version: options.version,
    dryRun: options.dryRun,
  })

  if (result.wasUpToDate) {
    console.log(`${name} is up to date (${result.oldVersion})`)
    return
  }
  if (options.dryRun) {
    console.log(`Would update ${name} ${result.oldVersion} -> ${result.newVersion}`)
    return
  }
  console.log(`Updated ${name} ${result.oldVersion} -> ${result.newVersion}`)
  console.log(`Binary: ${result.path}`)
}

export async function commandRemove(
  name: string,
  options: PluginDirOption & { keepConfig?: boolean }
): Promise<void> {
  const config = parseConfig(process.env)
  const installer = createInstaller(config, resolvePluginDir(config, options))
  const result = await installer.remove(name, { keepConfig: options.keepConfig })

  const versions = result.removedVersions.length > 0 ? result.removedVersions.join(', ') : 'none'
  console.log(`Removed ${name} (versions: ${versions})`)
  if (options.keepConfig) {
    console.log('Kept plugin configuration')
  }
}
