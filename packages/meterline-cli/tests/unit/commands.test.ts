import { existsSync, mkdtempSync, readdirSync, readFileSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'

import { resolvePlatform } from '@meterline/plugin-registry'
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest'

import { createProgram } from '../../src/index.js'
import type { ReleaseServer } from '../../../plugin-registry/tests/helpers/release-server.js'
import {
  assetFor,
  BINARY_NAME,
  PLUGIN_NAME,
  startPluginReleaseServer,
} from '../helpers/plugin-releases.js'

const servers: ReleaseServer[] = []
const tempDirs: string[] = []

let log: MockInstance<typeof console.log>
let warn: MockInstance<typeof console.warn>

function makePluginDir(): string {
  const dir = mkdtempSync(path.join(tmpdir(), 'meterline-cli-'))
  tempDirs.push(dir)
  return path.join(dir, 'plugins')
}

async function serve(...args: Parameters<typeof startPluginReleaseServer>): Promise<ReleaseServer> {
  const server = await startPluginReleaseServer(...args)
  servers.push(server)
  vi.stubEnv('METERLINE_GITHUB_API_URL', server.baseUrl)
  return server
}

async function run(...args: string[]): Promise<void> {
  await createProgram().parseAsync(['node', 'meterline', 'plugin', ...args])
}

function logged(): string[] {
  return log.mock.calls.map((call) => String(call[0]))
}

beforeEach(() => {
  vi.stubEnv('GITHUB_TOKEN', '')
  vi.stubEnv('METERLINE_LEGACY_PLUGIN_NAMES', '')
  log = vi.spyOn(console, 'log').mockImplementation(() => {})
  warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
})

afterEach(async () => {
  vi.restoreAllMocks()
  vi.unstubAllEnvs()
  for (const server of servers.splice(0)) {
    await server.close()
  }
  for (const dir of tempDirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true })
  }
})

describe('plugin install', () => {
  it('installs a registry plugin with metadata and reports malformed pairs', async () => {
    await serve()
    const pluginDir = makePluginDir()

    await run(
      'install',
      PLUGIN_NAME,
      '--plugin-dir',
      pluginDir,
      '--metadata',
      'region=eu-west-1',
      'broken'
    )

    const versionDir = path.join(pluginDir, PLUGIN_NAME, 'v2.0.0')
    expect(warn).toHaveBeenCalledWith(
      'warning: ignoring malformed metadata "broken" (expected key=value)'
    )
    expect(logged()).toContain(`Binary: ${path.join(versionDir, BINARY_NAME)}`)
    const metadata = readFileSync(path.join(versionDir, 'plugin.metadata.json'), 'utf8')
    expect(JSON.parse(metadata)).toEqual({ region: 'eu-west-1' })
  })

  it('removes older versions with --clean', async () => {
    await serve()
    const pluginDir = makePluginDir()
    await run('install', `${PLUGIN_NAME}@v1.0.0`, '--plugin-dir', pluginDir)

    await run('install', PLUGIN_NAME, '--clean', '--plugin-dir', pluginDir)

    expect(readdirSync(path.join(pluginDir, PLUGIN_NAME))).toEqual(['v2.0.0'])
    expect(logged()).toContain(`Removed ${PLUGIN_NAME} v1.0.0`)
    expect(logged().some((line) => line.startsWith('Removed 1 old version(s), freed '))).toBe(true)
  })

  it('fails instead of falling back with --no-fallback', async () => {
    const otherOs = resolvePlatform().os === 'linux' ? 'darwin' : 'linux'
    await serve([
      { tag: 'v2.0.0', assets: [assetFor('v2.0.0', otherOs)] },
      { tag: 'v1.0.0', assets: [assetFor('v1.0.0')] },
    ])
    const pluginDir = makePluginDir()

    await expect(
      run('install', `${PLUGIN_NAME}@v2.0.0`, '--no-fallback', '--plugin-dir', pluginDir)
    ).rejects.toThrowError('no compatible asset found')
    expect(existsSync(path.join(pluginDir, PLUGIN_NAME))).toBe(false)
  })
})

describe('plugin list', () => {
  it('prints the latest version by default and every version with --all', async () => {
    await serve()
    const pluginDir = makePluginDir()
    await run('install', `${PLUGIN_NAME}@v1.0.0`, '--plugin-dir', pluginDir)
    await run('install', `${PLUGIN_NAME}@v2.0.0`, '--plugin-dir', pluginDir)
    const binary = (version: string) => path.join(pluginDir, PLUGIN_NAME, version, BINARY_NAME)

    log.mockClear()
    await run('list', '--plugin-dir', pluginDir)
    expect(logged()).toEqual([`${PLUGIN_NAME} v2.0.0: ${binary('v2.0.0')}`])

    log.mockClear()
    await run('list', '--all', '--plugin-dir', pluginDir)
    expect(logged()).toEqual([
      `${PLUGIN_NAME} v1.0.0: ${binary('v1.0.0')}`,
      `${PLUGIN_NAME} v2.0.0: ${binary('v2.0.0')}`,
    ])
  })

  it('emits JSON with --json', async () => {
    await serve()
    const pluginDir = makePluginDir()
    await run('install', PLUGIN_NAME, '--plugin-dir', pluginDir)

    log.mockClear()
    await run('list', '--json', '--plugin-dir', pluginDir)
    expect(JSON.parse(logged().join('\n'))).toEqual([
      {
        name: PLUGIN_NAME,
        version: 'v2.0.0',
        path: path.join(pluginDir, PLUGIN_NAME, 'v2.0.0', BINARY_NAME),
      },
    ])
  })

  it('handles an empty plugin directory', async () => {
    await run('list', '--plugin-dir', makePluginDir())
    expect(logged()).toEqual(['No plugins installed.'])
  })
})

describe('plugin update', () => {
  it('previews, applies and then reports an up-to-date plugin', async () => {
    await serve()
    const pluginDir = makePluginDir()
    await run('install', `${PLUGIN_NAME}@v1.0.0`, '--plugin-dir', pluginDir)

    await run('update', PLUGIN_NAME, '--dry-run', '--plugin-dir', pluginDir)
    expect(logged()).toContain(`Would update ${PLUGIN_NAME} v1.0.0 -> v2.0.0`)
    expect(existsSync(path.join(pluginDir, PLUGIN_NAME, 'v2.0.0'))).toBe(false)

    await run('update', PLUGIN_NAME, '--plugin-dir', pluginDir)
    expect(logged()).toContain(`Updated ${PLUGIN_NAME} v1.0.0 -> v2.0.0`)

    await run('update', PLUGIN_NAME, '--plugin-dir', pluginDir)
    expect(logged()).toContain(`${PLUGIN_NAME} is up to date (v2.0.0)`)
  })
})

describe('plugin remove', () => {
  it('keeps configuration when asked', async () => {
    await serve()
    const pluginDir = makePluginDir()
    await run('install', PLUGIN_NAME, '--plugin-dir', pluginDir, '--metadata', 'region=us-east-1')

    await run('remove', PLUGIN_NAME, '--keep-config', '--plugin-dir', pluginDir)
    expect(logged()).toContain(`Removed ${PLUGIN_NAME} (versions: v2.0.0)`)
    expect(logged()).toContain('Kept plugin configuration')
    expect(readdirSync(path.join(pluginDir, PLUGIN_NAME, 'v2.0.0'))).toEqual([
      'plugin.metadata.json',
    ])
  })

  it('fails for a plugin that is not installed', async () => {
    await expect(run('remove', PLUGIN_NAME, '--plugin-dir', makePluginDir())).rejects.toThrowError(
      `plugin "${PLUGIN_NAME}" is not installed`
    )
  })
})
