import fs from 'node:fs'
import path from 'node:path'
import type { FileHandle } from 'node:fs/promises'
import { createHash, type Hash } from 'node:crypto'
import { CancelledError, SizeMismatchError, TransferIOError } from '../errors.js'
import { validateFileName } from '../protocol/schema.js'
import type { FileMetadata } from '../protocol/types.js'
import { generateId } from '../utils.js'

export interface ReceiveStorageOptions {
  destination: string
  overwrite?: boolean
}

export function uniqueFileName(dir: string, name: string): string {
  if (!fs.existsSync(path.join(dir, name))) return name

  const dotIdx = name.lastIndexOf('.')
  const base = dotIdx > 0 ? name.slice(0, dotIdx) : name
  const ext = dotIdx > 0 ? name.slice(dotIdx) : ''

  let counter = 1
  let candidate = `${base}-${counter}${ext}`
  while (fs.existsSync(path.join(dir, candidate))) {
    counter++
    candidate = `${base}-${counter}${ext}`
  }
  return candidate
}

export class ReceiveStorage {
  readonly destination: string
  readonly overwrite: boolean

  constructor(options: ReceiveStorageOptions) {
    this.destination = path.resolve(options.destination)
    this.overwrite = options.overwrite ?? false
  }

  /** Absolute target path for a sender-supplied name, or null if it would escape the destination. */
  resolveTarget(fileName: string): string | null {
    if (validateFileName(fileName)) return null
    const target = path.resolve(this.destination, fileName)
    const relative = path.relative(this.destination, target)
    if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) return null
    return target
  }

  /** A file already on disk under the same name with the same size. */
  async isDuplicate(file: FileMetadata): Promise<boolean> {
    const target = this.resolveTarget(file.fileName)
    if (!target) return false
    try {
      const stat = await fs.promises.stat(target)
      return stat.isFile() && stat.size === file.size
    } catch {
      return false
    }
  }

  async begin(file: FileMetadata): Promise<PartialFile> {
    const target = this.resolveTarget(file.fileName)
    if (!target) throw new TransferIOError(`Unsafe file name: ${file.fileName}`)

    const dir = path.dirname(target)
    await fs.promises.mkdir(dir, { recursive: true })

    const tempPath = path.join(dir, `.${path.basename(target)}.${generateId().slice(0, 8)}.part`)
    const handle = await fs.promises.open(tempPath, 'wx')
    return new PartialFile(file, target, tempPath, handle, this.overwrite)
  }
}

/**
 * An in-progress write. Owned by exactly one upload; either commit() renames
 * it into place or abort() deletes it.
 */
export class PartialFile {
  readonly file: FileMetadata
  readonly tempPath: string
  private target: string
  private handle: FileHandle | null
  private overwrite: boolean
  private hash: Hash | null
  private written = 0

  constructor(file: FileMetadata, target: string, tempPath: string, handle: FileHandle, overwrite: boolean) {
    this.file = file
    this.target = target
    this.tempPath = tempPath
    this.handle = handle
    this.overwrite = overwrite
    this.hash = file.sha256 ? createHash('sha256') : null
  }

  get bytesWritten(): number {
    return this.written
  }

  async write(chunk: Buffer): Promise<void> {
    if (!this.handle) throw new TransferIOError('Write after close')
    if (this.written + chunk.length > this.file.size) {
      throw new SizeMismatchError(`Received more than the declared ${this.file.size} bytes`, true)
    }
    this.written += chunk.length
    this.hash?.update(chunk)
    await this.handle.write(chunk)
  }

  /**
   * Verifies size and checksum, then moves the file into place. Returns the final path.
   * Once `signal` has fired the temp file is removed instead.
   */
  async commit(signal?: AbortSignal): Promise<string> {
    await this.close()

    if (this.written !== this.file.size) {
      await this.abort()
      throw new SizeMismatchError(`Received ${this.written} of ${this.file.size} bytes`, false)
    }
    if (this.hash && this.hash.digest('hex') !== this.file.sha256) {
      await this.abort()
      throw new TransferIOError(`Checksum mismatch for ${this.file.fileName}`)
    }
    if (signal?.aborted) {
      await this.abort()
      throw new CancelledError()
    }

    const dir = path.dirname(this.target)
    const finalPath = this.overwrite
      ? this.target
      : path.join(dir, uniqueFileName(dir, path.basename(this.target)))
    await fs.promises.rename(this.tempPath, finalPath)
    return finalPath
  }

  async abort(): Promise<void> {
    await this.close()
    await fs.promises.rm(this.tempPath, { force: true })
  }

  private async close(): Promise<void> {
    const handle = this.handle
    this.handle = null
    if (handle) await handle.close()
  }
}
