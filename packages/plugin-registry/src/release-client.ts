import { createWriteStream, mkdirSync } from 'node:fs'
import * as fs from 'node:fs/promises'
import path from 'node:path'
import { Readable, Transform } from 'node:stream'
import { pipeline } from 'node:stream/promises'

import { Octokit } from '@octokit/rest'

import { DEFAULT_RELEASE_API_URL } from './config.js'
import {
  InvalidReleaseTagError,
  NoCompatibleAssetError,
  RateLimitedError,
  ReleaseFetchError,
  ReleaseNotFoundError,
  type ReleaseContext,
} from './errors.js'
import { pluginLog } from './logger.js'
import { formatPlatform, resolvePlatform } from './platform.js'
import type {
  AssetHints,
  DownloadProgressCallback,
  PlatformInfo,
  Release,
  ReleaseAsset,
  ReleaseResolution,
} from './types.js'

export const FALLBACK_SEARCH_LIMIT = 30
export const DEFAULT_VERSION_PREFIX = 'v'

const OS_TOKENS: Record<PlatformInfo['os'], readonly string[]> = {
  linux: ['linux'],
  darwin: ['darwin', 'macos'],
  windows: ['windows'],
}

const ARCH_TOKENS: Record<PlatformInfo['arch'], readonly string[]> = {
  amd64: ['amd64', 'x64'],
  arm64: ['arm64', 'aarch64'],
}

type ApiRelease = {
  tag_name: string
  name: string | null
  draft: boolean
  prerelease: boolean
  assets: Array<{ name: string; browser_download_url: string; size: number }>
}

function toRelease(data: ApiRelease): Release {
  return {
    tagName: data.tag_name,
    name: data.name ?? data.tag_name,
    draft: data.draft,
    prerelease: data.prerelease,
    assets: data.assets.map((asset) => ({
      name: asset.name,
      downloadUrl: asset.browser_download_url,
      size: asset.size,
    })),
  }
}

function errorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) return undefined
  return typeof error.status === 'number' ? error.status : undefined
}

function errorForStatus(
  status: number | undefined,
  context: ReleaseContext,
  detail: string,
  cause?: unknown
): Error {
  if (status === 404) return new ReleaseNotFoundError(context, { cause })
  if (status === 403 || status === 429) {
    return new RateLimitedError(context, status, { cause })
  }
  return new ReleaseFetchError(context, detail, { status, cause })
}

// Download URLs carry no owner/repo of their own; host and path stand in for them.
function contextFromUrl(url: string): ReleaseContext {
  const parsed = new URL(url)
  return { owner: parsed.host, repo: parsed.pathname.replace(/^\/+/, '') }
}

function isArchiveAsset(name: string): boolean {
  return name.endsWith('.tar.gz') || name.endsWith('.tgz') || name.endsWith('.zip')
}

/**
 * Whether an asset name follows `<prefix>_<version>_<os>_<arch>.<ext>` for the given platform.
 */
export function assetMatchesPlatform(
  assetName: string,
  namePrefix: string,
  platform: PlatformInfo
): boolean {
  const lower = assetName.toLowerCase()
  if (!isArchiveAsset(lower)) return false
  if (namePrefix && !lower.startsWith(namePrefix.toLowerCase())) return false

  const tokens = new Set(lower.replace(/x86_64/g, 'x64').split(/[_.-]/))
  const osMatch = OS_TOKENS[platform.os].some((token) => tokens.has(token))
  const archMatch = ARCH_TOKENS[platform.arch].some((token) => tokens.has(token))
  return osMatch && archMatch
}

export function findAsset(
  release: Release,
  namePrefix: string,
  platform: PlatformInfo,
  region?: string
): ReleaseAsset | null {
  const candidates = release.assets.filter((asset) =>
    assetMatchesPlatform(asset.name, namePrefix, platform)
  )
  if (region) {
    const regional = candidates.find((asset) => asset.name.toLowerCase().includes(region))
    if (regional) return regional
  }
  return candidates[0] ?? null
}

/**
 * Whether a release tag can name a version directory: one path segment that is not `.` or `..`.
 */
export function isSafeReleaseTag(tag: string): boolean {
  if (!tag || tag === '.' || tag === '..') return false
  return !/[/\\\0]/.test(tag)
}

export function assertSafeReleaseTag(tag: string, context: ReleaseContext): void {
  if (!isSafeReleaseTag(tag)) {
    throw new InvalidReleaseTagError(context, tag)
  }
}

export function releaseTagFor(version: string, versionPrefix = DEFAULT_VERSION_PREFIX): string {
  if (!versionPrefix || version.startsWith(versionPrefix)) return version
  return `${versionPrefix}${version}`
}

export type ReleaseClientOptions = {
  fetchImpl?: typeof fetch
  baseUrl?: string
  token?: string
  platform?: PlatformInfo
}

export type FindReleaseOptions = {
  platform?: PlatformInfo
  hints?: AssetHints
  allowFallback?: boolean
}

export type DownloadOptions = {
  signal?: AbortSignal
  release?: ReleaseContext
}

/**
 * Reads releases from a GitHub-compatible release API and downloads their assets.
 */
export class ReleaseClient {
  private readonly octokit: Octokit
  private readonly fetchImpl: typeof fetch
  private readonly platform: PlatformInfo

  constructor(options: ReleaseClientOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? fetch
    this.platform = options.platform ?? resolvePlatform()
    this.octokit = new Octokit({
      baseUrl: options.baseUrl ?? DEFAULT_RELEASE_API_URL,
      auth: options.token,
      request: { fetch: this.fetchImpl },
    })
  }

  async getLatestRelease(owner: string, repo: string): Promise<Release> {
    try {
      const { data } = await this.octokit.repos.getLatestRelease({ owner, repo })
      return toRelease(data)
    } catch (error) {
      throw this.wrapError(error, { owner, repo })
    }
  }

  async getReleaseByTag(owner: string, repo: string, tag: string): Promise<Release> {
    try {
      const { data } = await this.octokit.repos.getReleaseByTag({ owner, repo, tag })
      return toRelease(data)
    } catch (error) {
      throw this.wrapError(error, { owner, repo, version: tag })
    }
  }

  /**
   * Releases that are neither drafts nor prereleases, in API order (newest first).
   */
  async listStableReleases(owner: string, repo: string, limit: number): Promise<Release[]> {
    const stable: Release[] = []
    if (limit <= 0) return stable

    const pages = this.octokit.paginate.iterator(this.octokit.repos.listReleases, {
      owner,
      repo,
      per_page: 100,
    })
    try {
      for await (const page of pages) {
        for (const data of page.data) {
          const release = toRelease(data)
          if (release.draft || release.prerelease) continue
          stable.push(release)
          if (stable.length >= limit) return stable
        }
      }
    } catch (error) {
      throw this.wrapError(error, { owner, repo })
    }
    return stable
  }

  /**
   * Resolve the release and asset to install.
   *
   * An empty version searches stable releases newest first. A pinned version tries that tag
   * and, when it exists but ships nothing for this platform, falls back to the newest stable
   * release that does (unless `allowFallback` is false).
   */
  async findReleaseWithAsset(
    owner: string,
    repo: string,
    version: string,
    namePrefix: string,
    options: FindReleaseOptions = {}
  ): Promise<ReleaseResolution> {
    const platform = options.platform ?? this.platform
    const region = options.hints?.region
    const allowFallback = options.allowFallback ?? true

    if (!version) {
      const found = await this.searchStable(owner, repo, namePrefix, platform, region)
      if (!found) {
        throw new NoCompatibleAssetError({ owner, repo }, formatPlatform(platform))
      }
      assertSafeReleaseTag(found.release.tagName, { owner, repo })
      return { ...found, wasFallback: false, requestedVersion: '' }
    }

    const tag = releaseTagFor(version, options.hints?.versionPrefix)
    assertSafeReleaseTag(tag, { owner, repo })
    const release = await this.getReleaseByTag(owner, repo, tag)
    const asset = findAsset(release, namePrefix, platform, region)
    if (asset) {
      assertSafeReleaseTag(release.tagName, { owner, repo, version: tag })
      return { release, asset, wasFallback: false, requestedVersion: version }
    }

    if (!allowFallback) {
      throw new NoCompatibleAssetError({ owner, repo, version: tag }, formatPlatform(platform))
    }

    const fallback = await this.searchStable(owner, repo, namePrefix, platform, region)
    if (!fallback) {
      throw new NoCompatibleAssetError({ owner, repo, version: tag }, formatPlatform(platform))
    }

    assertSafeReleaseTag(fallback.release.tagName, { owner, repo })
    const fallbackReason = `release ${tag} has no asset for ${formatPlatform(platform)}`
    pluginLog('Falling back to an older release', {
      repository: `${owner}/${repo}`,
      requested: tag,
      selected: fallback.release.tagName,
    })
    return { ...fallback, wasFallback: true, requestedVersion: version, fallbackReason }
  }

  /**
   * Stream an asset to destPath without holding it in memory. A partial file is removed on
   * failure or cancellation.
   */
  async downloadAsset(
    url: string,
    destPath: string,
    onProgress?: DownloadProgressCallback,
    options: DownloadOptions = {}
  ): Promise<void> {
    const response = await this.fetchImpl(url, {
      signal: options.signal,
      headers: { Accept: 'application/octet-stream' },
    })
    if (!response.ok || !response.body) {
      await response.body?.cancel()
      const context = options.release ?? contextFromUrl(url)
      const detail = response.ok
        ? `empty response body from ${url}`
        : `download of ${url} failed: ${response.statusText || 'error status'}`
      throw errorForStatus(response.ok ? undefined : response.status, context, detail)
    }

    const header = response.headers.get('content-length')
    const parsedTotal = header ? Number.parseInt(header, 10) : Number.NaN
    const total = Number.isFinite(parsedTotal) ? parsedTotal : null

    let downloaded = 0
    const counter = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        downloaded += chunk.length
        onProgress?.(downloaded, total)
        callback(null, chunk)
      },
    })

    mkdirSync(path.dirname(destPath), { recursive: true })
    try {
      await pipeline(
        Readable.fromWeb(response.body as never),
        counter,
        createWriteStream(destPath),
        { signal: options.signal }
      )
    } catch (error) {
      await fs.rm(destPath, { force: true })
      throw error
    }
  }

  private async searchStable(
    owner: string,
    repo: string,
    namePrefix: string,
    platform: PlatformInfo,
    region?: string
  ): Promise<{ release: Release; asset: ReleaseAsset } | null> {
    const releases = await this.listStableReleases(owner, repo, FALLBACK_SEARCH_LIMIT)
    for (const release of releases) {
      const asset = findAsset(release, namePrefix, platform, region)
      if (asset) return { release, asset }
    }
    return null
  }

  private wrapError(error: unknown, context: ReleaseContext): Error {
    const detail = error instanceof Error ? error.message : String(error)
    return errorForStatus(errorStatus(error), context, detail, error)
  }
}
