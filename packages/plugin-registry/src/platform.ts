import { spawnSync } from 'node:child_process'
import type { Stats } from 'node:fs'
import path from 'node:path'
import process from 'node:process'

import type { PlatformArch, PlatformInfo, PlatformOs } from './types.js'

export function resolvePlatform(
  platform: NodeJS.Platform = process.platform,
  arch: string = process.arch
): PlatformInfo {
  let os: PlatformOs
  if (platform === 'linux') os = 'linux'
  else if (platform === 'darwin') os = 'darwin'
  else if (platform === 'win32') os = 'windows'
  else throw new Error(`Unsupported platform: ${platform}. Supported: linux, darwin, win32.`)

  let normalizedArch: PlatformArch
  if (arch === 'x64') normalizedArch = 'amd64'
  else if (arch === 'arm64') normalizedArch = 'arm64'
  else throw new Error(`Unsupported architecture: ${arch}. Supported: x64, arm64.`)

  return { os, arch: normalizedArch }
}

export function formatPlatform(platform: PlatformInfo): string {
  return `${platform.os}/${platform.arch}`
}

/**
 * Decides whether a regular file counts as a runnable plugin binary.
 */
export interface ExecutabilityChecker {
  readonly binarySuffix: string
  isExecutable(filePath: string, stats: Stats): boolean
}

export const posixExecutability: ExecutabilityChecker = {
  binarySuffix: '',
  isExecutable: (_filePath, stats) => (stats.mode & 0o111) !== 0,
}

export const windowsExecutability: ExecutabilityChecker = {
  binarySuffix: '.exe',
  isExecutable: (filePath) => path.extname(filePath).toLowerCase() === '.exe',
}

export function createExecutabilityChecker(
  platform: NodeJS.Platform = process.platform
): ExecutabilityChecker {
  return platform === 'win32' ? windowsExecutability : posixExecutability
}

/**
 * Answers whether a process id belongs to a live process.
 */
export interface ProcessChecker {
  isRunning(pid: number): boolean
}

type KillImpl = (pid: number, signal: number) => boolean

export class PosixProcessChecker implements ProcessChecker {
  private readonly kill: KillImpl

  constructor(kill: KillImpl = (pid, signal) => process.kill(pid, signal)) {
    this.kill = kill
  }

  isRunning(pid: number): boolean {
    if (!Number.isSafeInteger(pid) || pid <= 0) return false
    try {
      this.kill(pid, 0)
      return true
    } catch (error) {
      // EPERM: the process exists but belongs to another user
      return isErrnoException(error) && error.code === 'EPERM'
    }
  }
}

type TasklistRunner = (
  command: string,
  args: string[],
  options: { encoding: 'utf8'; windowsHide: boolean }
) => { status: number | null; stdout: string }

export class WindowsProcessChecker implements ProcessChecker {
  private readonly spawnSyncImpl: TasklistRunner

  constructor(spawnSyncImpl: TasklistRunner = spawnSync) {
    this.spawnSyncImpl = spawnSyncImpl
  }

  isRunning(pid: number): boolean {
    if (!Number.isSafeInteger(pid) || pid <= 0) return false
    const run = this.spawnSyncImpl('tasklist', ['/FI', `PID eq ${pid}`, '/FO', 'CSV', '/NH'], {
      encoding: 'utf8',
      windowsHide: true,
    })
    if (run.status !== 0) return false
    return run.stdout.includes(`"${pid}"`)
  }
}

export function createProcessChecker(
  platform: NodeJS.Platform = process.platform
): ProcessChecker {
  return platform === 'win32' ? new WindowsProcessChecker() : new PosixProcessChecker()
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}
