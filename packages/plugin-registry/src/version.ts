import semver from 'semver'
import type { Range, SemVer } from 'semver'

import { InvalidVersionError } from './errors.js'

const LOOSE_VERSION =
  /^(0|[1-9]\d*)(?:\.(0|[1-9]\d*))?(?:\.(0|[1-9]\d*))?(-[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?(\+[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?$/

/**
 * Parse a version string with the tolerances plugin tags need:
 *
 * - a leading `v` is stripped (`v1.2.3`)
 * - partial versions are padded to a full triple (`1` -> `1.0.0`, `1.2` -> `1.2.0`)
 * - pre-release and build suffixes are kept, so `1.0.0-alpha` sorts below `1.0.0`
 *
 * Returns null when the input is not a version.
 */
export function parseVersion(input: string): SemVer | null {
  const trimmed = input.trim().replace(/^[vV]/, '')
  const match = LOOSE_VERSION.exec(trimmed)
  if (!match) return null
  const [, major, minor, patch, prerelease, build] = match
  const normalized = `${major}.${minor ?? '0'}.${patch ?? '0'}${prerelease ?? ''}${build ?? ''}`
  return semver.parse(normalized)
}

function requireVersion(input: string): SemVer {
  const parsed = parseVersion(input)
  if (!parsed) {
    throw new InvalidVersionError(input)
  }
  return parsed
}

export function isValidVersion(input: string): boolean {
  return parseVersion(input) !== null
}

/**
 * Returns -1, 0 or 1. Build metadata does not take part in ordering.
 */
export function compareVersions(a: string, b: string): -1 | 0 | 1 {
  return semver.compare(requireVersion(a), requireVersion(b))
}

/**
 * Parse a constraint expression: comparison operators (`>=1.0.0`), comma-joined
 * ranges (`>=1.0.0,<2.0.0`), and tilde/caret shorthand (`~1.2.3`, `^1.2.3`).
 */
export function parseVersionConstraint(expression: string): Range {
  const normalized = expression
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .join(' ')

  if (normalized.length === 0) {
    throw new InvalidVersionError(expression, 'empty version constraint')
  }

  try {
    return new semver.Range(normalized)
  } catch (error) {
    throw new InvalidVersionError(
      expression,
      error instanceof Error ? error.message : 'unparsable version constraint'
    )
  }
}

export function satisfiesConstraint(version: string, constraint: Range): boolean {
  return constraint.test(requireVersion(version))
}
