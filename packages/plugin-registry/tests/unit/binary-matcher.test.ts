import { chmodSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'

import { afterEach, describe, expect, it } from 'vitest'

import {
  exactNameMatcher,
  findPluginBinary,
  legacyNameMatcher,
  type BinaryMatcher,
} from '../../src/binary-matcher.js'
import { posixExecutability, windowsExecutability } from '../../src/platform.js'

const tempDirs: string[] = []

function makeVersionDir(): string {
  const dir = mkdtempSync(path.join(tmpdir(), 'meterline-binary-'))
  tempDirs.push(dir)
  return dir
}

function touch(dir: string, name: string, mode = 0o755): string {
  const filePath = path.join(dir, name)
  writeFileSync(filePath, '#!/bin/sh\n')
  chmodSync(filePath, mode)
  return filePath
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true })
  }
})

describe('findPluginBinary', () => {
  it('prefers a binary named exactly after the plugin', async () => {
    const dir = makeVersionDir()
    touch(dir, 'meterline-plugin-aws-public')
    const exact = touch(dir, 'aws-public')

    await expect(
      findPluginBinary(dir, 'aws-public', { checker: posixExecutability })
    ).resolves.toBe(exact)
  })

  it('finds the conventionally prefixed binary', async () => {
    const dir = makeVersionDir()
    const prefixed = touch(dir, 'meterline-plugin-aws-public')
    touch(dir, 'another-tool')

    await expect(
      findPluginBinary(dir, 'aws-public', { checker: posixExecutability })
    ).resolves.toBe(prefixed)
  })

  it('selects the regional binary named in metadata', async () => {
    const dir = makeVersionDir()
    touch(dir, 'meterline-plugin-aws-public-us-east-1')
    const west = touch(dir, 'meterline-plugin-aws-public-us-west-2')

    await expect(
      findPluginBinary(dir, 'aws-public', {
        checker: posixExecutability,
        metadata: { region: 'us-west-2' },
      })
    ).resolves.toBe(west)
  })

  it('falls back to the unsuffixed binary when the region has none', async () => {
    const dir = makeVersionDir()
    const plain = touch(dir, 'meterline-plugin-aws-public')

    await expect(
      findPluginBinary(dir, 'aws-public', {
        checker: posixExecutability,
        metadata: { region: 'ap-south-1' },
      })
    ).resolves.toBe(plain)
  })

  it('matches the legacy prefix only when enabled', async () => {
    const dir = makeVersionDir()
    const legacy = touch(dir, 'costwatch-plugin-aws-public')
    const options = { checker: posixExecutability, matchers: [legacyNameMatcher] }

    await expect(findPluginBinary(dir, 'aws-public', options)).resolves.toBeNull()
    await expect(
      findPluginBinary(dir, 'aws-public', { ...options, legacyPluginNames: true })
    ).resolves.toBe(legacy)
  })

  it('prefers the legacy name over other executables when enabled', async () => {
    const dir = makeVersionDir()
    touch(dir, 'aaa-helper')
    const legacy = touch(dir, 'costwatch-plugin-aws-public')

    await expect(
      findPluginBinary(dir, 'aws-public', { checker: posixExecutability, legacyPluginNames: true })
    ).resolves.toBe(legacy)
  })

  it('falls back to the first executable in name order', async () => {
    const dir = makeVersionDir()
    touch(dir, 'zeta')
    const alpha = touch(dir, 'alpha')
    touch(dir, 'README.md', 0o644)
    mkdirSync(path.join(dir, 'aaa-subdir'))

    await expect(
      findPluginBinary(dir, 'aws-public', { checker: posixExecutability })
    ).resolves.toBe(alpha)
  })

  it('returns null when nothing is executable', async () => {
    const dir = makeVersionDir()
    touch(dir, 'aws-public', 0o644)
    touch(dir, 'plugin.metadata.json', 0o600)

    await expect(
      findPluginBinary(dir, 'aws-public', { checker: posixExecutability })
    ).resolves.toBeNull()
  })

  it('returns null for a directory that does not exist', async () => {
    await expect(
      findPluginBinary(path.join(tmpdir(), 'meterline-missing-dir'), 'aws-public', {
        checker: posixExecutability,
      })
    ).resolves.toBeNull()
  })

  it('appends .exe when looking for Windows binaries', async () => {
    const dir = makeVersionDir()
    touch(dir, 'meterline-plugin-aws-public', 0o755)
    const exe = touch(dir, 'meterline-plugin-aws-public.exe', 0o644)

    await expect(
      findPluginBinary(dir, 'aws-public', { checker: windowsExecutability })
    ).resolves.toBe(exe)
  })

  it('runs a custom matcher list in order', async () => {
    const dir = makeVersionDir()
    const exact = touch(dir, 'aws-public')
    const seen: string[] = []
    const recording: BinaryMatcher = {
      name: 'recording',
      async match(context) {
        seen.push(context.pluginName)
        return null
      },
    }

    await expect(
      findPluginBinary(dir, 'aws-public', {
        checker: posixExecutability,
        matchers: [recording, exactNameMatcher],
      })
    ).resolves.toBe(exact)
    expect(seen).toEqual(['aws-public'])
  })
})
