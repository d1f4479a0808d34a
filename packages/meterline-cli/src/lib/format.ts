import type { PluginInfo } from '@meterline/plugin-registry'

const UNITS = ['KB', 'MB', 'GB'] as const

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`
  let value = bytes
  let unit: (typeof UNITS)[number] = 'KB'
  for (const candidate of UNITS) {
    value /= 1024
    unit = candidate
    if (value < 1024) break
  }
  return `${value.toFixed(1)} ${unit}`
}

export type ParsedMetadataFlags = {
  metadata: Record<string, string>
  warnings: string[]
}

/**
 * Parse repeated `--metadata key=value` flags. Pairs without a key or `=` are skipped with a
 * warning; later keys win.
 */
export function parseMetadataFlags(pairs: string[]): ParsedMetadataFlags {
  const metadata: Record<string, string> = {}
  const warnings: string[] = []

  for (const pair of pairs) {
    const separator = pair.indexOf('=')
    const key = separator === -1 ? '' : pair.slice(0, separator).trim()
    if (!key) {
      warnings.push(`ignoring malformed metadata "${pair}" (expected key=value)`)
      continue
    }
    metadata[key] = pair.slice(separator + 1).trim()
  }
  return { metadata, warnings }
}

export function renderPlugins(plugins: PluginInfo[]): void {
  if (plugins.length === 0) {
    console.log('No plugins installed.')
    return
  }
  for (const plugin of plugins) {
    const region = plugin.metadata?.region ? ` (${plugin.metadata.region})` : ''
    console.log(`${plugin.name} ${plugin.version}${region}: ${plugin.path}`)
  }
}
