export * from './types.js'
export * from './errors.js'
export { formatLogLine, pluginLog, pluginWarn, pluginError } from './logger.js'
export {
  configSchema,
  defaultPluginDir,
  loadConfig,
  parseConfig,
  DEFAULT_RELEASE_API_URL,
  type RegistryConfig,
} from './config.js'
export {
  createExecutabilityChecker,
  createProcessChecker,
  formatPlatform,
  PosixProcessChecker,
  posixExecutability,
  resolvePlatform,
  WindowsProcessChecker,
  windowsExecutability,
  type ExecutabilityChecker,
  type ProcessChecker,
} from './platform.js'
export {
  compareVersions,
  isValidVersion,
  parseVersion,
  parseVersionConstraint,
  satisfiesConstraint,
} from './version.js'
export { isLockStale, LockManager, lockPathFor, reclaimGuardPathFor, type Unlock } from './lock.js'
export {
  detectArchiveFormat,
  extractArchive,
  MAX_ENTRY_SIZE,
  sanitizePath,
  validateBinary,
  type ExtractOptions,
} from './archive.js'
export {
  INSTALL_RECEIPT_FILE,
  mergeRegistryMetadata,
  parseRegionFromBinaryName,
  PLUGIN_METADATA_FILE,
  readInstallReceipt,
  readPluginMetadata,
  writeInstallReceipt,
  writePluginMetadata,
  type InstallReceipt,
} from './metadata.js'
export {
  DEFAULT_BINARY_MATCHERS,
  findPluginBinary,
  type BinaryMatcher,
  type FindBinaryOptions,
} from './binary-matcher.js'
export {
  assetMatchesPlatform,
  assertSafeReleaseTag,
  findAsset,
  isSafeReleaseTag,
  ReleaseClient,
  releaseTagFor,
  type DownloadOptions,
  type FindReleaseOptions,
  type ReleaseClientOptions,
} from './release-client.js'
export { parseOwnerRepo, parsePluginSpecifier } from './specifier.js'
export {
  getRegistryEntry,
  loadRegistryIndex,
  parseRegistryIndex,
  type RegistryEntry,
  type RegistryIndex,
} from './registry-index.js'
export { PluginRegistry, type PluginRegistryOptions } from './scanner.js'
export { getDirSize, Installer, sha256File, type InstallerOptions } from './installer.js'
