import os from 'node:os'
import path from 'node:path'
import process from 'node:process'

import { z } from 'zod'

import { pluginError } from './logger.js'

export const DEFAULT_RELEASE_API_URL = 'https://api.github.com'

const flagSchema = z
  .enum(['0', '1', 'true', 'false', ''])
  .optional()
  .transform((value) => value === '1' || value === 'true')

export const configSchema = z.object({
  // Root of the <name>/<version>/ plugin tree
  METERLINE_PLUGIN_DIR: z.string().optional(),
  // Enables matching binaries that use the pre-rename prefix
  METERLINE_LEGACY_PLUGIN_NAMES: flagSchema,
  METERLINE_GITHUB_API_URL: z.string().url().default(DEFAULT_RELEASE_API_URL),
  GITHUB_TOKEN: z.string().optional(),
})

export type RegistryConfig = {
  pluginDir: string
  legacyPluginNames: boolean
  releaseApiUrl: string
  githubToken?: string
}

export function defaultPluginDir(): string {
  return path.join(os.homedir(), '.meterline', 'plugins')
}

export function parseConfig(env: NodeJS.ProcessEnv): RegistryConfig {
  const result = configSchema.safeParse(env)

  if (!result.success) {
    pluginError('Invalid plugin registry configuration', result.error.format())
    throw new Error('Invalid plugin registry configuration')
  }

  const values = result.data
  return {
    pluginDir: values.METERLINE_PLUGIN_DIR
      ? path.resolve(values.METERLINE_PLUGIN_DIR)
      : defaultPluginDir(),
    legacyPluginNames: values.METERLINE_LEGACY_PLUGIN_NAMES,
    releaseApiUrl: values.METERLINE_GITHUB_API_URL,
    githubToken: values.GITHUB_TOKEN || undefined,
  }
}

let cachedConfig: RegistryConfig | null = null

export function loadConfig(): RegistryConfig {
  if (cachedConfig) {
    return cachedConfig
  }
  cachedConfig = parseConfig(process.env)
  return cachedConfig
}
