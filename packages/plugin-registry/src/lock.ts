import { linkSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import path from 'node:path'
import process from 'node:process'

import { LockHeldError } from './errors.js'
import { pluginWarn } from './logger.js'
import { createProcessChecker, isErrnoException, type ProcessChecker } from './platform.js'

// Above the largest pid any supported kernel hands out (Linux pid_max is 2^22)
export const MAX_PLAUSIBLE_PID = 4_194_304

export type Unlock = () => void

export function lockPathFor(pluginRoot: string, name: string): string {
  return path.join(pluginRoot, `${name}.lock`)
}

export function reclaimGuardPathFor(lockPath: string): string {
  return `${lockPath}.reclaim`
}

/**
 * A lock is stale when its body is empty, not a pid, an implausible pid, or the
 * pid of a process that is no longer running. A missing lock file is not stale.
 */
export function isLockStale(
  lockPath: string,
  processChecker: ProcessChecker = createProcessChecker()
): boolean {
  let content: string
  try {
    content = readFileSync(lockPath, 'utf8').trim()
  } catch {
    return false
  }

  if (content.length === 0) return true
  if (!/^\d+$/.test(content)) return true

  const pid = Number.parseInt(content, 10)
  if (!Number.isSafeInteger(pid) || pid <= 0 || pid > MAX_PLAUSIBLE_PID) return true

  return !processChecker.isRunning(pid)
}

/**
 * Per-plugin try-lock backed by `<pluginRoot>/<name>.lock` files holding the owner pid.
 * Acquisition never waits: a live lock fails immediately with LockHeldError.
 */
export class LockManager {
  readonly pluginRoot: string
  private readonly processChecker: ProcessChecker

  constructor(pluginRoot: string, processChecker: ProcessChecker = createProcessChecker()) {
    this.pluginRoot = pluginRoot
    this.processChecker = processChecker
  }

  acquireLock(name: string): Unlock {
    mkdirSync(this.pluginRoot, { recursive: true })
    const lockPath = lockPathFor(this.pluginRoot, name)

    if (this.tryCreate(lockPath)) {
      return this.unlocker(lockPath)
    }

    if (!isLockStale(lockPath, this.processChecker)) {
      throw new LockHeldError(name, lockPath)
    }

    pluginWarn('Reclaiming stale plugin lock', { plugin: name, lockPath })
    if (this.reclaim(lockPath) && this.tryCreate(lockPath)) {
      return this.unlocker(lockPath)
    }
    throw new LockHeldError(name, lockPath)
  }

  isLockStale(lockPath: string): boolean {
    return isLockStale(lockPath, this.processChecker)
  }

  // The pid is written before the file is linked into place, so a lock is never seen empty.
  private tryCreate(lockPath: string): boolean {
    const pending = `${lockPath}.${process.pid}.${Date.now()}.tmp`
    writeFileSync(pending, String(process.pid), { mode: 0o600 })
    try {
      linkSync(pending, lockPath)
      return true
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') return false
      throw error
    } finally {
      rmSync(pending, { force: true })
    }
  }

  // Reclaimers take a guard file first. While it is held the stale lock still exists, so no
  // acquirer can create a new one, and no other reclaimer can remove it.
  private reclaim(lockPath: string): boolean {
    const guardPath = reclaimGuardPathFor(lockPath)
    if (!this.tryCreate(guardPath)) {
      if (!isLockStale(guardPath, this.processChecker)) return false
      // Left behind by a reclaimer that died holding it.
      rmSync(guardPath, { force: true })
      if (!this.tryCreate(guardPath)) return false
    }

    try {
      if (!isLockStale(lockPath, this.processChecker)) return false
      rmSync(lockPath, { force: true })
      return true
    } finally {
      rmSync(guardPath, { force: true })
    }
  }

  private unlocker(lockPath: string): Unlock {
    let released = false
    return () => {
      if (released) return
      released = true
      rmSync(lockPath, { force: true })
    }
  }
}
