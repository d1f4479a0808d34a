import { createHash } from 'node:crypto'
import { createReadStream } from 'node:fs'
import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import process from 'node:process'
import { pipeline } from 'node:stream/promises'

import { extractArchive, validateBinary } from './archive.js'
import { findPluginBinary, PLUGIN_BINARY_PREFIX } from './binary-matcher.js'
import {
  AlreadyInstalledError,
  BinaryNotFoundError,
  PluginNotInstalledError,
} from './errors.js'
import { LockManager } from './lock.js'
import { pluginLog, pluginWarn } from './logger.js'
import {
  PLUGIN_METADATA_FILE,
  readInstallReceipt,
  writeInstallReceipt,
  writePluginMetadata,
} from './metadata.js'
import {
  createExecutabilityChecker,
  createProcessChecker,
  isErrnoException,
  resolvePlatform,
  type ExecutabilityChecker,
  type ProcessChecker,
} from './platform.js'
import { getRegistryEntry, loadRegistryIndex, type RegistryIndex } from './registry-index.js'
import { assertSafeReleaseTag, ReleaseClient, releaseTagFor } from './release-client.js'
import { PluginRegistry } from './scanner.js'
import { parseOwnerRepo, parsePluginSpecifier } from './specifier.js'
import type {
  AssetHints,
  InstallOptions,
  InstallResult,
  PlatformInfo,
  PluginSpecifier,
  ProgressCallback,
  ReleaseResolution,
  RemoveOptions,
  RemoveOtherVersionsResult,
  RemoveResult,
  UpdateOptions,
  UpdateResult,
} from './types.js'
import { compareVersions } from './version.js'

export type InstallerOptions = {
  pluginDir: string
  releaseClient?: ReleaseClient
  index?: RegistryIndex
  platform?: PlatformInfo
  checker?: ExecutabilityChecker
  processChecker?: ProcessChecker
  legacyPluginNames?: boolean
}

type PluginSource = {
  name: string
  owner: string
  repo: string
  namePrefix: string
  hints: AssetHints
  fromUrl: boolean
}

const noProgress: ProgressCallback = () => {}

export async function sha256File(filePath: string): Promise<string> {
  const hash = createHash('sha256')
  await pipeline(createReadStream(filePath), hash)
  return hash.digest('hex')
}

/**
 * Total size in bytes of the regular files under dir. Symlinks are counted, not followed.
 */
export async function getDirSize(dir: string): Promise<number> {
  const stats = await fs.lstat(dir)
  if (!stats.isDirectory()) return stats.size

  let total = 0
  for (const entry of await fs.readdir(dir, { withFileTypes: true })) {
    const entryPath = path.join(dir, entry.name)
    if (entry.isDirectory()) {
      total += await getDirSize(entryPath)
    } else {
      total += (await fs.lstat(entryPath)).size
    }
  }
  return total
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target)
    return true
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') return false
    throw error
  }
}

async function removeQuietly(target: string): Promise<void> {
  try {
    await fs.rm(target, { recursive: true, force: true })
  } catch (error) {
    pluginWarn('Failed to clean up', { path: target, error: String(error) })
  }
}

/**
 * Installs, updates and removes plugin versions under `<pluginDir>/<name>/<version>/`.
 *
 * Every mutating operation holds the per-name lock for its whole duration. Installs are staged
 * in a hidden directory beside the final one and renamed into place once the binary validates,
 * so a failed install leaves nothing the scanner would list.
 */
export class Installer {
  readonly pluginDir: string
  private readonly releaseClient: ReleaseClient
  private readonly index: RegistryIndex | undefined
  private readonly checker: ExecutabilityChecker
  private readonly processChecker: ProcessChecker
  private readonly legacyPluginNames: boolean
  private readonly locks: LockManager

  constructor(options: InstallerOptions) {
    this.pluginDir = options.pluginDir
    this.releaseClient =
      options.releaseClient ??
      new ReleaseClient({ platform: options.platform ?? resolvePlatform() })
    this.index = options.index
    this.checker = options.checker ?? createExecutabilityChecker()
    this.processChecker = options.processChecker ?? createProcessChecker()
    this.legacyPluginNames = options.legacyPluginNames ?? false
    this.locks = new LockManager(this.pluginDir, this.processChecker)
  }

  async install(
    specifier: string,
    options: InstallOptions = {},
    onProgress: ProgressCallback = noProgress
  ): Promise<InstallResult> {
    const parsed = parsePluginSpecifier(specifier)
    const source = this.resolveSource(parsed)

    const unlock = this.locks.acquireLock(source.name)
    try {
      if (parsed.version && !options.force) {
        const tag = releaseTagFor(parsed.version, source.hints.versionPrefix)
        assertSafeReleaseTag(tag, { owner: source.owner, repo: source.repo })
        await this.assertNotInstalled(source.name, tag)
      }

      const target = `${source.owner}/${source.repo}`
      onProgress(`Resolving ${parsed.version ? `${target}@${parsed.version}` : target}`)
      const resolution = await this.releaseClient.findReleaseWithAsset(
        source.owner,
        source.repo,
        parsed.version,
        source.namePrefix,
        {
          hints: { ...source.hints, region: options.metadata?.region ?? source.hints.region },
          allowFallback: !options.noFallback,
        }
      )
      if (resolution.wasFallback) {
        const reason = resolution.fallbackReason ?? 'no compatible asset'
        onProgress(
          `Requested ${resolution.requestedVersion} unavailable (${reason}); using ${resolution.release.tagName}`
        )
      }

      if (!options.force) {
        await this.assertNotInstalled(source.name, resolution.release.tagName)
      }

      return await this.installResolved(source, resolution, options, onProgress)
    } finally {
      unlock()
    }
  }

  async update(name: string, options: UpdateOptions = {}): Promise<UpdateResult> {
    const unlock = this.locks.acquireLock(name)
    try {
      const registry = this.scanner()
      const { plugin: current } = await registry.getLatestPlugin(name)
      if (!current) {
        throw new PluginNotInstalledError(name)
      }

      const currentDir = path.join(this.pluginDir, name, current.version)
      const source = await this.sourceForInstalled(name, currentDir)
      const resolution = await this.releaseClient.findReleaseWithAsset(
        source.owner,
        source.repo,
        options.version ?? '',
        source.namePrefix,
        { hints: { ...source.hints, region: current.metadata?.region ?? source.hints.region } }
      )

      const newVersion = resolution.release.tagName
      const order = compareVersions(newVersion, current.version)
      const wasUpToDate = options.version ? order === 0 : order <= 0
      if (wasUpToDate || options.dryRun) {
        return {
          name,
          oldVersion: current.version,
          newVersion: wasUpToDate ? current.version : newVersion,
          path: wasUpToDate ? current.path : path.join(this.pluginDir, name, newVersion),
          wasUpToDate,
        }
      }

      const installed = await this.installResolved(
        source,
        resolution,
        { metadata: current.metadata, force: true, signal: options.signal },
        noProgress
      )
      pluginLog('Updated plugin', { plugin: name, from: current.version, to: installed.version })
      return {
        name,
        oldVersion: current.version,
        newVersion: installed.version,
        path: installed.path,
        wasUpToDate: false,
      }
    } finally {
      unlock()
    }
  }

  async remove(name: string, options: RemoveOptions = {}): Promise<RemoveResult> {
    const unlock = this.locks.acquireLock(name)
    try {
      const nameDir = path.join(this.pluginDir, name)
      if (!(await pathExists(nameDir))) {
        throw new PluginNotInstalledError(name)
      }

      const removedVersions = await this.listVersionDirs(nameDir)
      if (!options.keepConfig) {
        await fs.rm(nameDir, { recursive: true, force: true })
        return { name, removedVersions }
      }

      for (const version of removedVersions) {
        const versionDir = path.join(nameDir, version)
        for (const entry of await fs.readdir(versionDir)) {
          if (entry === PLUGIN_METADATA_FILE) continue
          await fs.rm(path.join(versionDir, entry), { recursive: true, force: true })
        }
      }
      return { name, removedVersions }
    } finally {
      unlock()
    }
  }

  /**
   * Delete every installed version of name except keepVersion. A plugin that is not installed
   * yields an empty result.
   */
  async removeOtherVersions(
    name: string,
    keepVersion: string,
    rootDir: string = this.pluginDir,
    onProgress: ProgressCallback = noProgress
  ): Promise<RemoveOtherVersionsResult> {
    const locks =
      rootDir === this.pluginDir ? this.locks : new LockManager(rootDir, this.processChecker)
    const unlock = locks.acquireLock(name)
    try {
      const result: RemoveOtherVersionsResult = {
        pluginName: name,
        keptVersion: keepVersion,
        removedVersions: [],
        bytesFreed: 0,
      }

      const nameDir = path.join(rootDir, name)
      if (!(await pathExists(nameDir))) {
        return result
      }

      for (const version of await this.listVersionDirs(nameDir)) {
        if (version === keepVersion) continue
        const versionDir = path.join(nameDir, version)
        const size = await getDirSize(versionDir)
        await fs.rm(versionDir, { recursive: true, force: true })
        result.removedVersions.push(version)
        result.bytesFreed += size
        onProgress(`Removed ${name} ${version}`)
      }
      return result
    } finally {
      unlock()
    }
  }

  private scanner(): PluginRegistry {
    return new PluginRegistry({
      root: this.pluginDir,
      checker: this.checker,
      legacyPluginNames: this.legacyPluginNames,
    })
  }

  private registryIndex(): RegistryIndex {
    return this.index ?? loadRegistryIndex()
  }

  private resolveSource(spec: PluginSpecifier): PluginSource {
    if (spec.isUrl && spec.owner && spec.repo) {
      return {
        name: spec.name,
        owner: spec.owner,
        repo: spec.repo,
        namePrefix: spec.repo,
        hints: {},
        fromUrl: true,
      }
    }

    const entry = getRegistryEntry(spec.name, this.registryIndex())
    const { owner, repo } = parseOwnerRepo(entry.repository)
    return {
      name: entry.name,
      owner,
      repo,
      namePrefix: entry.assetHints?.assetPrefix ?? `${PLUGIN_BINARY_PREFIX}${entry.name}`,
      hints: {
        region: entry.assetHints?.defaultRegion,
        versionPrefix: entry.assetHints?.versionPrefix,
      },
      fromUrl: false,
    }
  }

  // Registry installs re-resolve through the index; direct installs through their receipt.
  private async sourceForInstalled(name: string, versionDir: string): Promise<PluginSource> {
    const receipt = await readInstallReceipt(versionDir)
    const indexed = this.registryIndex().plugins.find((plugin) => plugin.name === name)
    if (!receipt || indexed?.repository === receipt.repository) {
      return this.resolveSource({ name, version: '', isUrl: false })
    }
    const { owner, repo } = parseOwnerRepo(receipt.repository)
    return this.resolveSource({ name, version: '', isUrl: true, owner, repo })
  }

  private async assertNotInstalled(name: string, version: string): Promise<void> {
    const versionDir = path.join(this.pluginDir, name, version)
    const binary = await findPluginBinary(versionDir, name, {
      checker: this.checker,
      legacyPluginNames: this.legacyPluginNames,
    })
    if (binary) {
      throw new AlreadyInstalledError(name, version, versionDir)
    }
  }

  private async listVersionDirs(nameDir: string): Promise<string[]> {
    const entries = await fs.readdir(nameDir, { withFileTypes: true })
    return entries
      .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
      .map((entry) => entry.name)
      .sort()
  }

  private async installResolved(
    source: PluginSource,
    resolution: ReleaseResolution,
    options: InstallOptions,
    onProgress: ProgressCallback
  ): Promise<InstallResult> {
    const { release, asset } = resolution
    const version = release.tagName
    const nameDir = path.join(this.pluginDir, source.name)
    const finalDir = path.join(nameDir, version)
    const stagingDir = path.join(nameDir, `.staging-${version}-${process.pid}-${Date.now()}`)
    const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'meterline-plugin-'))

    try {
      const archivePath = path.join(tmpDir, path.basename(asset.name))
      onProgress(`Downloading ${asset.name}`)
      await this.releaseClient.downloadAsset(asset.downloadUrl, archivePath, undefined, {
        signal: options.signal,
        release: { owner: source.owner, repo: source.repo, version },
      })
      const checksum = await sha256File(archivePath)

      onProgress(`Extracting ${asset.name}`)
      await fs.mkdir(nameDir, { recursive: true })
      await extractArchive(archivePath, stagingDir, { signal: options.signal })

      const metadata = options.metadata ?? {}
      const binary = await findPluginBinary(stagingDir, source.name, {
        metadata,
        checker: this.checker,
        legacyPluginNames: this.legacyPluginNames,
      })
      if (!binary) {
        throw new BinaryNotFoundError(source.name, stagingDir)
      }
      await validateBinary(binary, this.checker)

      if (Object.keys(metadata).length > 0) {
        await writePluginMetadata(stagingDir, metadata)
      }
      await writeInstallReceipt(stagingDir, {
        name: source.name,
        version,
        repository: `${source.owner}/${source.repo}`,
        assetName: asset.name,
        sha256: checksum,
        installedAt: new Date().toISOString(),
      })

      options.signal?.throwIfAborted()
      await this.promote(stagingDir, finalDir)
      onProgress(`Installed ${source.name} ${version}`)
      pluginLog('Installed plugin', { plugin: source.name, version, asset: asset.name })

      return {
        name: source.name,
        version,
        path: path.join(finalDir, path.relative(stagingDir, binary)),
        repository: `${source.owner}/${source.repo}`,
        fromUrl: source.fromUrl,
        wasFallback: resolution.wasFallback,
        requestedVersion: resolution.requestedVersion,
      }
    } catch (error) {
      await removeQuietly(stagingDir)
      throw error
    } finally {
      await removeQuietly(tmpDir)
    }
  }

  // An existing version directory is moved aside first so the final rename never merges trees.
  private async promote(stagingDir: string, finalDir: string): Promise<void> {
    if (!(await pathExists(finalDir))) {
      await fs.rename(stagingDir, finalDir)
      return
    }
    const replaced = path.join(
      path.dirname(finalDir),
      `.replaced-${path.basename(finalDir)}-${Date.now()}`
    )
    await fs.rename(finalDir, replaced)
    try {
      await fs.rename(stagingDir, finalDir)
    } catch (error) {
      await fs.rename(replaced, finalDir)
      throw error
    }
    await removeQuietly(replaced)
  }
}
