import { InvalidSpecifierError } from './errors.js'
import type { PluginSpecifier } from './types.js'

export const DIRECT_REPO_PREFIX = 'meterline-plugin-'

const NAME_PATTERN = /^[A-Za-z0-9._-]+$/
const HOST_PREFIXES = ['https://github.com/', 'http://github.com/', 'github.com/']

function splitVersion(input: string, specifier: string): { target: string; version: string } {
  const at = input.lastIndexOf('@')
  if (at === -1) return { target: input, version: '' }

  const target = input.slice(0, at)
  const version = input.slice(at + 1)
  if (!version) {
    throw new InvalidSpecifierError(specifier, 'version after "@" is empty')
  }
  return { target, version }
}

function requireName(value: string, specifier: string, label: string): string {
  if (!value) {
    throw new InvalidSpecifierError(specifier, `${label} is empty`)
  }
  if (!NAME_PATTERN.test(value)) {
    throw new InvalidSpecifierError(specifier, `${label} "${value}" contains invalid characters`)
  }
  return value
}

/**
 * Split `owner/repo`. Everything after the first slash is the repo, so nested paths stay
 * intact (`owner/repo/extra` gives repo `repo/extra`).
 */
export function parseOwnerRepo(input: string): { owner: string; repo: string } {
  const slash = input.indexOf('/')
  if (slash === -1) {
    throw new InvalidSpecifierError(input, 'expected owner/repo')
  }
  const owner = input.slice(0, slash)
  const repo = input.slice(slash + 1)
  if (!owner || !repo) {
    throw new InvalidSpecifierError(input, 'owner and repo must both be non-empty')
  }
  return { owner, repo }
}

/**
 * Parse what the user asked to install:
 *
 * - `name` / `name@version`: a plugin from the registry index
 * - `owner/repo` / `owner/repo@version`: a release source, optionally prefixed with
 *   `github.com/` or `https://github.com/`
 */
export function parsePluginSpecifier(input: string): PluginSpecifier {
  const specifier = input.trim()
  if (!specifier) {
    throw new InvalidSpecifierError(input, 'specifier is empty')
  }

  const host = HOST_PREFIXES.find((prefix) => specifier.toLowerCase().startsWith(prefix))
  const body = host ? specifier.slice(host.length).replace(/\/+$/, '') : specifier
  if (!body) {
    throw new InvalidSpecifierError(specifier, 'owner and repo must both be non-empty')
  }

  const split = splitVersion(body, specifier)
  const target = host ? split.target.replace(/\.git$/, '') : split.target
  const version = split.version

  if (!target.includes('/')) {
    if (host) {
      throw new InvalidSpecifierError(specifier, 'expected owner/repo after the host')
    }
    return { name: requireName(target, specifier, 'plugin name'), version, isUrl: false }
  }

  const { owner, repo } = parseOwnerRepo(target)
  requireName(owner, specifier, 'owner')
  requireName(repo, specifier, 'repo')

  const name = repo.startsWith(DIRECT_REPO_PREFIX) ? repo.slice(DIRECT_REPO_PREFIX.length) : repo
  return {
    name: requireName(name, specifier, 'plugin name'),
    version,
    isUrl: true,
    owner,
    repo,
  }
}
