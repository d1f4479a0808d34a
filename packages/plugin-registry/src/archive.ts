import { createReadStream, createWriteStream } from 'node:fs'
import * as fs from 'node:fs/promises'
import path from 'node:path'
import { Transform, type Readable } from 'node:stream'
import { pipeline } from 'node:stream/promises'

import * as tar from 'tar'
import yauzl, { type Entry, type ZipFile } from 'yauzl'

import {
  ArchiveEntryTooLargeError,
  BinaryValidationError,
  PathTraversalError,
  UnsupportedArchiveError,
} from './errors.js'
import {
  createExecutabilityChecker,
  isErrnoException,
  type ExecutabilityChecker,
} from './platform.js'

export const MAX_ENTRY_SIZE = 500 * 1024 * 1024

export type ArchiveFormat = 'tar.gz' | 'zip'

export type ExtractOptions = {
  maxEntrySize?: number
  signal?: AbortSignal
}

export function detectArchiveFormat(archivePath: string): ArchiveFormat | null {
  const lower = archivePath.toLowerCase()
  if (lower.endsWith('.tar.gz') || lower.endsWith('.tgz')) return 'tar.gz'
  if (lower.endsWith('.zip')) return 'zip'
  return null
}

/**
 * Join an archive entry name onto destDir and make sure the result stays inside it.
 * Absolute entry names are treated as relative to destDir.
 */
export function sanitizePath(destDir: string, entryName: string): string {
  const root = path.resolve(destDir)
  const relative = entryName.replace(/\\/g, '/').replace(/^([a-zA-Z]:)?\/+/, '')
  const target = path.resolve(root, relative)

  if (target !== root && !target.startsWith(root + path.sep)) {
    throw new PathTraversalError(entryName, destDir)
  }
  return target
}

/**
 * Unpack a `.tar.gz` or `.zip` archive into destDir.
 *
 * On any error destDir may hold a partial tree; the caller owns it and should remove it.
 */
export async function extractArchive(
  archivePath: string,
  destDir: string,
  options: ExtractOptions = {}
): Promise<void> {
  const format = detectArchiveFormat(archivePath)
  if (!format) {
    throw new UnsupportedArchiveError(archivePath)
  }

  await fs.access(archivePath)
  await fs.mkdir(destDir, { recursive: true, mode: 0o755 })

  if (format === 'tar.gz') {
    await extractTarGz(archivePath, destDir, options)
    return
  }
  await extractZip(archivePath, destDir, options)
}

async function extractTarGz(
  archivePath: string,
  destDir: string,
  options: ExtractOptions
): Promise<void> {
  const maxEntrySize = options.maxEntrySize ?? MAX_ENTRY_SIZE
  const violations: Error[] = []

  // First pass only reads headers so a hostile entry aborts before anything is written.
  await tar.t({
    file: archivePath,
    strict: true,
    onReadEntry: (entry) => {
      try {
        sanitizePath(destDir, entry.path)
        if (entry.type === 'SymbolicLink' || entry.type === 'Link') {
          const base = entry.type === 'SymbolicLink' ? path.posix.dirname(entry.path) : ''
          sanitizePath(destDir, path.posix.join(base, entry.linkpath ?? ''))
        }
        const size = entry.size ?? 0
        if (size > maxEntrySize) {
          throw new ArchiveEntryTooLargeError(entry.path, size, maxEntrySize)
        }
      } catch (error) {
        violations.push(error instanceof Error ? error : new Error(String(error)))
      }
    },
  })

  const [violation] = violations
  if (violation) throw violation
  options.signal?.throwIfAborted()

  // Streamed rather than given `file`, so an abort stops reading between entries.
  await pipeline(createReadStream(archivePath), tar.x({ cwd: destDir, dmode: 0o755 }), {
    signal: options.signal,
  })
}

function openZip(archivePath: string): Promise<ZipFile> {
  return new Promise((resolve, reject) => {
    // Names are decoded and checked here rather than by yauzl, so absolute names can be re-rooted.
    yauzl.open(
      archivePath,
      { lazyEntries: true, autoClose: true, decodeStrings: false, validateEntrySizes: true },
      (error, zipFile) => {
        if (error || !zipFile) {
          reject(error ?? new Error(`Failed to open zip archive ${archivePath}`))
          return
        }
        resolve(zipFile)
      }
    )
  })
}

function openZipEntry(zipFile: ZipFile, entry: Entry): Promise<Readable> {
  return new Promise((resolve, reject) => {
    zipFile.openReadStream(entry, (error, stream) => {
      if (error || !stream) {
        reject(error ?? new Error('Failed to open zip entry stream'))
        return
      }
      resolve(stream)
    })
  })
}

function zipEntryName(entry: Entry): string {
  const raw: unknown = entry.fileName
  return Buffer.isBuffer(raw) ? raw.toString('utf8') : String(raw)
}

function sizeGuard(entryName: string, limit: number): Transform {
  let seen = 0
  return new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      seen += chunk.length
      if (seen > limit) {
        callback(new ArchiveEntryTooLargeError(entryName, seen, limit))
        return
      }
      callback(null, chunk)
    },
  })
}

async function extractZip(
  archivePath: string,
  destDir: string,
  options: ExtractOptions
): Promise<void> {
  const maxEntrySize = options.maxEntrySize ?? MAX_ENTRY_SIZE
  const zipFile = await openZip(archivePath)

  const nextEntry = (): Promise<Entry | null> =>
    new Promise((resolve, reject) => {
      const onEntry = (entry: Entry) => {
        cleanup()
        resolve(entry)
      }
      const onEnd = () => {
        cleanup()
        resolve(null)
      }
      const onError = (error: Error) => {
        cleanup()
        reject(error)
      }
      const cleanup = () => {
        zipFile.off('entry', onEntry)
        zipFile.off('end', onEnd)
        zipFile.off('error', onError)
      }
      zipFile.on('entry', onEntry)
      zipFile.on('end', onEnd)
      zipFile.on('error', onError)
      zipFile.readEntry()
    })

  try {
    for (let entry = await nextEntry(); entry; entry = await nextEntry()) {
      options.signal?.throwIfAborted()
      const name = zipEntryName(entry)
      const target = sanitizePath(destDir, name)

      if (name.endsWith('/')) {
        await fs.mkdir(target, { recursive: true, mode: 0o755 })
        continue
      }

      if (entry.uncompressedSize > maxEntrySize) {
        throw new ArchiveEntryTooLargeError(name, entry.uncompressedSize, maxEntrySize)
      }

      await fs.mkdir(path.dirname(target), { recursive: true, mode: 0o755 })
      const stream = await openZipEntry(zipFile, entry)
      await pipeline(stream, sizeGuard(name, maxEntrySize), createWriteStream(target), {
        signal: options.signal,
      })

      const mode = (entry.externalFileAttributes >>> 16) & 0o777
      if (mode !== 0) {
        await fs.chmod(target, mode)
      }
    }
  } finally {
    zipFile.close()
  }
}

/**
 * Fails unless binaryPath is an existing, non-directory, executable file.
 */
export async function validateBinary(
  binaryPath: string,
  checker: ExecutabilityChecker = createExecutabilityChecker()
): Promise<void> {
  let stats
  try {
    stats = await fs.stat(binaryPath)
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new BinaryValidationError(binaryPath, 'file does not exist', { cause: error })
    }
    throw new BinaryValidationError(binaryPath, 'cannot stat file', { cause: error })
  }

  if (stats.isDirectory()) {
    throw new BinaryValidationError(binaryPath, 'path is a directory')
  }
  if (!checker.isExecutable(binaryPath, stats)) {
    throw new BinaryValidationError(binaryPath, 'file is not executable')
  }
}
