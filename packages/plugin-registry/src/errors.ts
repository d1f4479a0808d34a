export type PluginRegistryErrorCode =
  | 'INVALID_SPECIFIER'
  | 'LOCK_HELD'
  | 'BINARY_NOT_FOUND'
  | 'RELEASE_NOT_FOUND'
  | 'RATE_LIMITED'
  | 'RELEASE_FETCH_FAILED'
  | 'INVALID_RELEASE_TAG'
  | 'NO_COMPATIBLE_ASSET'
  | 'UNSUPPORTED_ARCHIVE'
  | 'PATH_TRAVERSAL'
  | 'ENTRY_TOO_LARGE'
  | 'INVALID_BINARY'
  | 'METADATA_NOT_FOUND'
  | 'METADATA_PARSE'
  | 'ALREADY_INSTALLED'
  | 'NOT_INSTALLED'
  | 'INVALID_VERSION'

export class PluginRegistryError extends Error {
  readonly code: PluginRegistryErrorCode

  constructor(code: PluginRegistryErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'PluginRegistryError'
    this.code = code
  }
}

export function isPluginRegistryError(
  value: unknown,
  code?: PluginRegistryErrorCode
): value is PluginRegistryError {
  if (!(value instanceof PluginRegistryError)) return false
  return code === undefined || value.code === code
}

export class InvalidSpecifierError extends PluginRegistryError {
  readonly specifier: string

  constructor(specifier: string, reason: string) {
    super('INVALID_SPECIFIER', `invalid plugin specifier "${specifier}": ${reason}`)
    this.name = 'InvalidSpecifierError'
    this.specifier = specifier
  }
}

export class LockHeldError extends PluginRegistryError {
  readonly pluginName: string
  readonly lockPath: string

  constructor(pluginName: string, lockPath: string, options?: { cause?: unknown }) {
    super(
      'LOCK_HELD',
      `failed to acquire lock for plugin "${pluginName}": another operation is in progress (${lockPath}). Try again later.`,
      options
    )
    this.name = 'LockHeldError'
    this.pluginName = pluginName
    this.lockPath = lockPath
  }
}

export class BinaryNotFoundError extends PluginRegistryError {
  readonly directory: string

  constructor(pluginName: string, directory: string) {
    super('BINARY_NOT_FOUND', `no executable found for plugin "${pluginName}" in ${directory}`)
    this.name = 'BinaryNotFoundError'
    this.directory = directory
  }
}

export type ReleaseContext = {
  owner: string
  repo: string
  version?: string
}

function describeRelease(context: ReleaseContext): string {
  const target = `${context.owner}/${context.repo}`
  return context.version ? `${target}@${context.version}` : target
}

export class ReleaseNotFoundError extends PluginRegistryError {
  readonly owner: string
  readonly repo: string
  readonly version?: string

  constructor(context: ReleaseContext, options?: { cause?: unknown }) {
    super('RELEASE_NOT_FOUND', `release not found: ${describeRelease(context)}`, options)
    this.name = 'ReleaseNotFoundError'
    this.owner = context.owner
    this.repo = context.repo
    this.version = context.version
  }
}

export class RateLimitedError extends PluginRegistryError {
  readonly owner: string
  readonly repo: string
  readonly status: number

  constructor(context: ReleaseContext, status: number, options?: { cause?: unknown }) {
    super(
      'RATE_LIMITED',
      `release API refused the request for ${describeRelease(context)} (status ${status}): rate limited or forbidden. Set GITHUB_TOKEN or retry later.`,
      options
    )
    this.name = 'RateLimitedError'
    this.owner = context.owner
    this.repo = context.repo
    this.status = status
  }
}

export class ReleaseFetchError extends PluginRegistryError {
  readonly owner: string
  readonly repo: string
  readonly version?: string
  readonly status?: number

  constructor(
    context: ReleaseContext,
    detail: string,
    options?: { status?: number; cause?: unknown }
  ) {
    const status = options?.status
    super(
      'RELEASE_FETCH_FAILED',
      status === undefined
        ? `fetching release ${describeRelease(context)}: ${detail}`
        : `fetching release ${describeRelease(context)}: ${detail} (status ${status})`,
      { cause: options?.cause }
    )
    this.name = 'ReleaseFetchError'
    this.owner = context.owner
    this.repo = context.repo
    this.version = context.version
    this.status = status
  }
}

export class InvalidReleaseTagError extends PluginRegistryError {
  readonly tagName: string

  constructor(context: ReleaseContext, tagName: string) {
    super(
      'INVALID_RELEASE_TAG',
      `release tag ${JSON.stringify(tagName)} from ${describeRelease(context)} cannot be used as a version directory name`
    )
    this.name = 'InvalidReleaseTagError'
    this.tagName = tagName
  }
}

export class NoCompatibleAssetError extends PluginRegistryError {
  readonly platform: string

  constructor(context: ReleaseContext, platform: string) {
    super(
      'NO_COMPATIBLE_ASSET',
      `no compatible asset found for ${platform} in ${describeRelease(context)}`
    )
    this.name = 'NoCompatibleAssetError'
    this.platform = platform
  }
}

export class UnsupportedArchiveError extends PluginRegistryError {
  constructor(archivePath: string) {
    super('UNSUPPORTED_ARCHIVE', `unsupported archive format: ${archivePath}`)
    this.name = 'UnsupportedArchiveError'
  }
}

export class PathTraversalError extends PluginRegistryError {
  readonly entryName: string

  constructor(entryName: string, destDir: string) {
    super('PATH_TRAVERSAL', `archive entry "${entryName}" escapes destination ${destDir}`)
    this.name = 'PathTraversalError'
    this.entryName = entryName
  }
}

export class ArchiveEntryTooLargeError extends PluginRegistryError {
  readonly entryName: string
  readonly size: number

  constructor(entryName: string, size: number, limit: number) {
    super(
      'ENTRY_TOO_LARGE',
      `archive entry "${entryName}" is ${size} bytes, exceeding the ${limit} byte limit`
    )
    this.name = 'ArchiveEntryTooLargeError'
    this.entryName = entryName
    this.size = size
  }
}

export class BinaryValidationError extends PluginRegistryError {
  readonly binaryPath: string

  constructor(binaryPath: string, reason: string, options?: { cause?: unknown }) {
    super('INVALID_BINARY', `invalid plugin binary ${binaryPath}: ${reason}`, options)
    this.name = 'BinaryValidationError'
    this.binaryPath = binaryPath
  }
}

export class MetadataNotFoundError extends PluginRegistryError {
  constructor(filePath: string) {
    super('METADATA_NOT_FOUND', `metadata file not found: ${filePath}`)
    this.name = 'MetadataNotFoundError'
  }
}

export class MetadataParseError extends PluginRegistryError {
  constructor(filePath: string, detail: string, options?: { cause?: unknown }) {
    super('METADATA_PARSE', `parsing metadata file ${filePath}: ${detail}`, options)
    this.name = 'MetadataParseError'
  }
}

export class AlreadyInstalledError extends PluginRegistryError {
  readonly pluginName: string
  readonly version: string

  constructor(pluginName: string, version: string, directory: string) {
    super(
      'ALREADY_INSTALLED',
      `plugin "${pluginName}" ${version} is already installed at ${directory} (use force to reinstall)`
    )
    this.name = 'AlreadyInstalledError'
    this.pluginName = pluginName
    this.version = version
  }
}

export class PluginNotInstalledError extends PluginRegistryError {
  readonly pluginName: string

  constructor(pluginName: string) {
    super('NOT_INSTALLED', `plugin "${pluginName}" is not installed`)
    this.name = 'PluginNotInstalledError'
    this.pluginName = pluginName
  }
}

export class InvalidVersionError extends PluginRegistryError {
  readonly version: string

  constructor(version: string, detail = 'not a valid semantic version') {
    super('INVALID_VERSION', `invalid version "${version}": ${detail}`)
    this.name = 'InvalidVersionError'
    this.version = version
  }
}
