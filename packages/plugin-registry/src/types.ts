export type PlatformOs = 'linux' | 'darwin' | 'windows'

export type PlatformArch = 'amd64' | 'arm64'

export type PlatformInfo = {
  os: PlatformOs
  arch: PlatformArch
}

/**
 * A plugin version discovered on disk.
 */
export type PluginInfo = {
  name: string
  version: string
  path: string
  metadata?: Record<string, string>
}

export type ReleaseAsset = {
  name: string
  downloadUrl: string
  size: number
}

export type Release = {
  tagName: string
  name: string
  draft: boolean
  prerelease: boolean
  assets: ReleaseAsset[]
}

export type AssetHints = {
  region?: string
  versionPrefix?: string
}

export type ReleaseResolution = {
  release: Release
  asset: ReleaseAsset
  wasFallback: boolean
  requestedVersion: string
  fallbackReason?: string
}

export type PluginSpecifier = {
  name: string
  version: string
  isUrl: boolean
  owner?: string
  repo?: string
}

export type ProgressCallback = (message: string) => void

export type DownloadProgressCallback = (downloaded: number, total: number | null) => void

export type InstallOptions = {
  force?: boolean
  noFallback?: boolean
  metadata?: Record<string, string>
  signal?: AbortSignal
}

export type InstallResult = {
  name: string
  version: string
  path: string
  repository: string
  fromUrl: boolean
  wasFallback: boolean
  requestedVersion: string
}

export type UpdateOptions = {
  version?: string
  dryRun?: boolean
  signal?: AbortSignal
}

export type UpdateResult = {
  name: string
  oldVersion: string
  newVersion: string
  path: string
  wasUpToDate: boolean
}

export type RemoveOptions = {
  keepConfig?: boolean
}

export type RemoveResult = {
  name: string
  removedVersions: string[]
}

export type RemoveOtherVersionsResult = {
  pluginName: string
  keptVersion: string
  removedVersions: string[]
  bytesFreed: number
}

export type LatestPlugins = {
  plugins: PluginInfo[]
  warnings: string[]
}

export type LatestPlugin = {
  plugin: PluginInfo | null
  warnings: string[]
}
