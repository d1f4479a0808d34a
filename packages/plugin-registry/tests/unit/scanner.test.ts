import { chmodSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import { PLUGIN_METADATA_FILE } from '../../src/metadata.js'
import { posixExecutability } from '../../src/platform.js'
import { PluginRegistry } from '../../src/scanner.js'

const tempDirs: string[] = []

function makeRoot(): string {
  const dir = mkdtempSync(path.join(tmpdir(), 'meterline-scan-'))
  tempDirs.push(dir)
  return dir
}

function installFake(
  root: string,
  name: string,
  version: string,
  binaryName = `meterline-plugin-${name}`
): string {
  const versionDir = path.join(root, name, version)
  mkdirSync(versionDir, { recursive: true })
  const binary = path.join(versionDir, binaryName)
  writeFileSync(binary, '#!/bin/sh\n')
  chmodSync(binary, 0o755)
  return binary
}

function registry(root: string): PluginRegistry {
  return new PluginRegistry({ root, checker: posixExecutability })
}

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {})
})

afterEach(() => {
  vi.restoreAllMocks()
  for (const dir of tempDirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true })
  }
})

describe('PluginRegistry.listPlugins', () => {
  it('returns an empty list when the root does not exist', async () => {
    const root = path.join(makeRoot(), 'missing')
    await expect(registry(root).listPlugins()).resolves.toEqual([])
  })

  it('lists every version that has a binary', async () => {
    const root = makeRoot()
    const awsOld = installFake(root, 'aws-public', 'v1.0.0')
    const awsNew = installFake(root, 'aws-public', 'v1.1.0')
    const gcp = installFake(root, 'gcp-public', 'v0.3.0')
    mkdirSync(path.join(root, 'gcp-public', 'v0.4.0'))

    await expect(registry(root).listPlugins()).resolves.toEqual([
      { name: 'aws-public', version: 'v1.0.0', path: awsOld },
      { name: 'aws-public', version: 'v1.1.0', path: awsNew },
      { name: 'gcp-public', version: 'v0.3.0', path: gcp },
    ])
  })

  it('skips hidden directories and stray files', async () => {
    const root = makeRoot()
    const binary = installFake(root, 'aws-public', 'v1.0.0')
    installFake(root, 'aws-public', '.staging-v2.0.0-1-1')
    installFake(root, '.cache', 'v1.0.0')
    writeFileSync(path.join(root, 'aws-public.lock'), '123')

    await expect(registry(root).listPlugins()).resolves.toEqual([
      { name: 'aws-public', version: 'v1.0.0', path: binary },
    ])
  })

  it('attaches metadata and derives the region from the binary name without it', async () => {
    const root = makeRoot()
    installFake(root, 'aws-public', 'v1.0.0')
    writeFileSync(
      path.join(root, 'aws-public', 'v1.0.0', PLUGIN_METADATA_FILE),
      '{"region":"eu-west-1"}'
    )
    installFake(root, 'aws-public', 'v1.1.0', 'meterline-plugin-aws-public-ap-south-1')

    const plugins = await registry(root).listPlugins()
    expect(plugins.map((plugin) => plugin.metadata)).toEqual([
      { region: 'eu-west-1' },
      { region: 'ap-south-1' },
    ])
  })

  it('ignores corrupt metadata with a warning', async () => {
    const root = makeRoot()
    const binary = installFake(root, 'aws-public', 'v1.0.0')
    writeFileSync(path.join(root, 'aws-public', 'v1.0.0', PLUGIN_METADATA_FILE), '{broken')

    await expect(registry(root).listPlugins()).resolves.toEqual([
      { name: 'aws-public', version: 'v1.0.0', path: binary },
    ])
    expect(console.warn).toHaveBeenCalledWith(
      expect.stringContaining('Ignoring unreadable plugin metadata'),
      expect.objectContaining({ plugin: 'aws-public', version: 'v1.0.0' })
    )
  })
})

describe('PluginRegistry.listLatestPlugins', () => {
  it('keeps the highest version of each plugin, sorted by name', async () => {
    const root = makeRoot()
    installFake(root, 'gcp-public', 'v0.3.0')
    installFake(root, 'aws-public', 'v1.9.0')
    const latest = installFake(root, 'aws-public', 'v1.10.0')
    installFake(root, 'aws-public', 'v1.10.0-rc.1')

    const { plugins, warnings } = await registry(root).listLatestPlugins()
    expect(plugins.map((plugin) => `${plugin.name}@${plugin.version}`)).toEqual([
      'aws-public@v1.10.0',
      'gcp-public@v0.3.0',
    ])
    expect(plugins[0]?.path).toBe(latest)
    expect(warnings).toEqual([])
  })

  it('reports versions that are not valid semver instead of picking them', async () => {
    const root = makeRoot()
    installFake(root, 'aws-public', 'v1.0.0')
    installFake(root, 'aws-public', 'v1.2.0-!!invalid')

    const { plugins, warnings } = await registry(root).listLatestPlugins()
    expect(plugins.map((plugin) => plugin.version)).toEqual(['v1.0.0'])
    expect(warnings).toEqual([
      'Plugin aws-public version v1.2.0-!!invalid has invalid semver format',
    ])
  })
})

describe('PluginRegistry.getLatestPlugin', () => {
  it('returns the latest version of one plugin', async () => {
    const root = makeRoot()
    installFake(root, 'aws-public', 'v1.0.0')
    installFake(root, 'aws-public', 'v2.0.0')

    const { plugin } = await registry(root).getLatestPlugin('aws-public')
    expect(plugin?.version).toBe('v2.0.0')
  })

  it('returns null for a plugin that is not installed', async () => {
    const root = makeRoot()
    installFake(root, 'aws-public', 'v1.0.0')

    await expect(registry(root).getLatestPlugin('gcp-public')).resolves.toEqual({
      plugin: null,
      warnings: [],
    })
  })
})
