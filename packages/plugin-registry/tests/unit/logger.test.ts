import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import { formatLogLine, pluginError, pluginLog, pluginWarn } from '../../src/logger.js'

beforeEach(() => {
  vi.useFakeTimers()
  vi.setSystemTime(new Date('2026-03-04T05:06:07.000Z'))
})

afterEach(() => {
  vi.useRealTimers()
  vi.restoreAllMocks()
})

describe('plugin logger', () => {
  it('prefixes messages with a timestamp and the component', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    pluginLog('Installed plugin')
    expect(log).toHaveBeenCalledWith('[2026-03-04T05:06:07.000Z] [Plugins] Installed plugin')
  })

  it('passes structured metadata as a second argument', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    pluginWarn('Reclaiming stale plugin lock', { plugin: 'aws-public' })
    expect(warn).toHaveBeenCalledWith(
      '[2026-03-04T05:06:07.000Z] [Plugins] Reclaiming stale plugin lock',
      { plugin: 'aws-public' }
    )
  })

  it('logs errors with and without metadata', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    const failure = new Error('boom')

    pluginError('Install failed', failure)
    pluginError('Install failed', failure, { plugin: 'aws-public' })
    pluginError('Install failed')

    expect(error).toHaveBeenNthCalledWith(
      1,
      '[2026-03-04T05:06:07.000Z] [Plugins] Install failed',
      failure
    )
    expect(error).toHaveBeenNthCalledWith(
      2,
      '[2026-03-04T05:06:07.000Z] [Plugins] Install failed',
      { plugin: 'aws-public' },
      failure
    )
    expect(error).toHaveBeenNthCalledWith(3, '[2026-03-04T05:06:07.000Z] [Plugins] Install failed')
  })

  it('omits a missing error when metadata is given', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    pluginError('Install failed', undefined, { plugin: 'aws-public' })
    expect(error).toHaveBeenCalledWith('[2026-03-04T05:06:07.000Z] [Plugins] Install failed', {
      plugin: 'aws-public',
    })
  })

  it('formats lines for other scopes', () => {
    expect(formatLogLine('Listing plugins', 'CLI')).toBe(
      '[2026-03-04T05:06:07.000Z] [CLI] Listing plugins'
    )
    expect(formatLogLine('Listing plugins')).toBe(
      '[2026-03-04T05:06:07.000Z] [Plugins] Listing plugins'
    )
  })
})
