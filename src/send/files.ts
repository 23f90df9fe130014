import fs from 'node:fs'
import path from 'node:path'
import { createHash } from 'node:crypto'
import type { FileMetadata, TransferManifest, DeviceInfo } from '../protocol/types.js'
import { generateId, hashHex } from '../utils.js'

/** Supplies the bytes of an outbound file, chunk by chunk. */
export interface SourceProvider {
  open(fileId: string, chunkSize: number): AsyncIterable<Buffer>
}

type Source =
  | { kind: 'file'; path: string }
  | { kind: 'text'; data: Buffer }

interface SendingFile {
  metadata: FileMetadata
  source: Source
}

export const PREVIEW_LIMIT = 1024

export function guessContentType(fileName: string): string {
  const ext = fileName.includes('.') ? fileName.split('.').pop()?.toLowerCase() : undefined
  switch (ext) {
    case 'txt': case 'md': case 'log': return 'text/plain'
    case 'csv': return 'text/csv'
    case 'html': case 'htm': return 'text/html'
    case 'json': return 'application/json'
    case 'jpg': case 'jpeg': return 'image/jpeg'
    case 'png': return 'image/png'
    case 'gif': return 'image/gif'
    case 'webp': return 'image/webp'
    case 'svg': return 'image/svg+xml'
    case 'heic': return 'image/heic'
    case 'pdf': return 'application/pdf'
    case 'zip': return 'application/zip'
    case 'apk': return 'application/vnd.android.package-archive'
    case 'mp3': return 'audio/mpeg'
    case 'wav': return 'audio/wav'
    case 'mp4': return 'video/mp4'
    case 'mov': return 'video/quicktime'
    case 'mkv': return 'video/x-matroska'
    default: return 'application/octet-stream'
  }
}

export class SendingFiles implements SourceProvider {
  private files: Map<string, SendingFile> = new Map()
  private idFactory: () => string

  constructor(idFactory: () => string = generateId) {
    this.idFactory = idFactory
  }

  get size(): number {
    return this.files.size
  }

  list(): FileMetadata[] {
    return Array.from(this.files.values(), f => f.metadata)
  }

  get(fileId: string): FileMetadata | undefined {
    return this.files.get(fileId)?.metadata
  }

  /**
   * Adds a regular file. Empty files cannot be announced and are skipped;
   * returns null in that case.
   */
  async addFile(filePath: string, fileName = path.basename(filePath)): Promise<FileMetadata | null> {
    const stat = await fs.promises.stat(filePath)
    if (!stat.isFile()) throw new Error(`Not a regular file: ${filePath}`)
    if (stat.size === 0) {
      console.log(`Skipping empty file ${fileName}`)
      return null
    }

    const metadata: FileMetadata = {
      id: this.idFactory(),
      fileName,
      size: stat.size,
      fileType: guessContentType(fileName)
    }
    this.files.set(metadata.id, { metadata, source: { kind: 'file', path: filePath } })
    return metadata
  }

  /** Adds every file below a directory, named relative to the directory's parent. */
  async addDirectory(dirPath: string): Promise<FileMetadata[]> {
    const base = path.dirname(path.resolve(dirPath))
    const added: FileMetadata[] = []

    const walk = async (dir: string): Promise<void> => {
      const entries = await fs.promises.readdir(dir, { withFileTypes: true })
      entries.sort((a, b) => a.name.localeCompare(b.name))
      for (const entry of entries) {
        const full = path.join(dir, entry.name)
        if (entry.isDirectory()) {
          await walk(full)
        } else if (entry.isFile()) {
          const name = path.relative(base, full).split(path.sep).join('/')
          const metadata = await this.addFile(full, name)
          if (metadata) added.push(metadata)
        }
      }
    }

    await walk(path.resolve(dirPath))
    return added
  }

  /** Adds a text message as a synthetic plain-text file. */
  addText(text: string): FileMetadata {
    const data = Buffer.from(text, 'utf8')
    if (data.length === 0) throw new Error('Text message cannot be empty')

    const metadata: FileMetadata = {
      id: this.idFactory(),
      fileName: `${hashHex(data).slice(0, 32)}.txt`,
      size: data.length,
      fileType: 'text/plain',
      sha256: createHash('sha256').update(data).digest('hex')
    }
    if (text.length < PREVIEW_LIMIT) metadata.preview = text

    this.files.set(metadata.id, { metadata, source: { kind: 'text', data } })
    return metadata
  }

  manifest(info: DeviceInfo): TransferManifest {
    const files: Record<string, FileMetadata> = {}
    for (const [id, file] of this.files) {
      files[id] = file.metadata
    }
    return { info, files }
  }

  async *open(fileId: string, chunkSize: number): AsyncIterable<Buffer> {
    const file = this.files.get(fileId)
    if (!file) throw new Error(`Unknown file: ${fileId}`)

    if (file.source.kind === 'text') {
      for (let offset = 0; offset < file.source.data.length; offset += chunkSize) {
        yield file.source.data.subarray(offset, offset + chunkSize)
      }
      return
    }

    const stream = fs.createReadStream(file.source.path, { highWaterMark: chunkSize })
    for await (const chunk of stream) {
      if (Buffer.isBuffer(chunk)) yield chunk
    }
  }
}
