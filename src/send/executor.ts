import { CancelledError, SizeMismatchError, TransferIOError } from '../errors.js'
import { verifyFingerprint } from '../identity.js'
import { routeUrl } from '../protocol/routes.js'
import type { FileMetadata, Peer } from '../protocol/types.js'
import { errorMessage, shortId } from '../utils.js'
import { EventChannel } from './channel.js'
import { sendRequest } from './client.js'
import type { SourceProvider } from './files.js'
import type { SessionHandle } from './negotiator.js'

export type TransferEvent =
  | { type: 'progress'; fileId: string; bytesTransferred: number; bytesTotal: number; delta: number }
  | { type: 'completed'; fileId: string }
  | { type: 'failed'; fileId: string; error: Error }
  | { type: 'cancelled'; fileId: string }
  | { type: 'rejected'; fileId: string }

export type FileOutcome = 'completed' | 'failed' | 'cancelled' | 'rejected'
export type SessionStatus = 'completed' | 'partial' | 'failed' | 'cancelled'

export interface SessionOutcome {
  sessionId: string
  status: SessionStatus
  files: Record<string, FileOutcome>
}

export interface TransferRun {
  sessionId: string
  events: AsyncIterable<TransferEvent>
  done: Promise<SessionOutcome>
  cancel(): void
}

export interface TransferExecutorOptions {
  concurrency?: number
  chunkSize?: number
  eventBuffer?: number
  timeoutMs?: number     // idle timeout per upload request
}

export const DEFAULT_EXECUTOR_OPTIONS: Required<TransferExecutorOptions> = {
  concurrency: 4,
  chunkSize: 64 * 1024,
  eventBuffer: 256,
  timeoutMs: 30_000
}

const CANCEL_NOTIFY_TIMEOUT_MS = 5_000

interface ActiveRun {
  handle: SessionHandle
  controller: AbortController
  cancelled: boolean
}

export function summarizeOutcome(outcomes: Record<string, FileOutcome>, cancelled: boolean): SessionStatus {
  if (cancelled) return 'cancelled'
  const attempted = Object.values(outcomes).filter(o => o !== 'rejected')
  const completed = attempted.filter(o => o === 'completed').length
  if (attempted.length > 0 && completed === attempted.length) return 'completed'
  if (attempted.every(o => o === 'failed')) return 'failed'
  if (attempted.every(o => o === 'cancelled')) return 'cancelled'
  return 'partial'
}

async function* uploadBody(
  source: AsyncIterable<Buffer>,
  file: FileMetadata,
  signal: AbortSignal,
  onProgress: (sent: number, delta: number) => void
): AsyncGenerator<Buffer> {
  let sent = 0
  for await (const chunk of source) {
    if (signal.aborted) throw new CancelledError()
    if (sent + chunk.length > file.size) {
      throw new SizeMismatchError(`${file.fileName} is larger than its declared ${file.size} bytes`, true)
    }
    sent += chunk.length
    yield chunk
    onProgress(sent, chunk.length)
  }
  if (sent < file.size) {
    throw new SizeMismatchError(`${file.fileName} ended after ${sent} of ${file.size} bytes`, false)
  }
}

export class TransferExecutor {
  private options: Required<TransferExecutorOptions>
  private runs: Map<string, ActiveRun> = new Map()  // receiver's sessionId -> run

  constructor(options: TransferExecutorOptions = {}) {
    this.options = { ...DEFAULT_EXECUTOR_OPTIONS, ...options }
  }

  get activeSessions(): string[] {
    return Array.from(this.runs.keys())
  }

  run(handle: SessionHandle, sources: SourceProvider): TransferRun {
    const channel = new EventChannel<TransferEvent>(this.options.eventBuffer, e => e.type === 'progress')
    const active: ActiveRun = { handle, controller: new AbortController(), cancelled: false }
    this.runs.set(handle.sessionId, active)

    const outcomes: Record<string, FileOutcome> = {}
    for (const fileId of handle.rejected) {
      outcomes[fileId] = 'rejected'
      channel.push({ type: 'rejected', fileId })
    }

    const queue = Object.keys(handle.tokens)
    const worker = async (): Promise<void> => {
      for (let fileId = queue.shift(); fileId !== undefined; fileId = queue.shift()) {
        outcomes[fileId] = await this.uploadFile(active, fileId, sources, channel)
      }
    }
    const workers = Array.from({ length: Math.min(this.options.concurrency, queue.length) }, () => worker())

    const done = Promise.all(workers)
      .then((): SessionOutcome => ({
        sessionId: handle.sessionId,
        status: summarizeOutcome(outcomes, active.cancelled),
        files: outcomes
      }))
      .finally(() => {
        this.runs.delete(handle.sessionId)
        channel.close()
      })

    return {
      sessionId: handle.sessionId,
      events: channel,
      done,
      cancel: () => { this.cancel(handle.sessionId) }
    }
  }

  /**
   * Cancels a running session. Unless the receiver itself asked for the
   * cancel, it is told once, best effort.
   */
  cancel(sessionId: string, notifyPeer = true): boolean {
    const active = this.runs.get(sessionId)
    if (!active || active.cancelled) return false

    active.cancelled = true
    active.controller.abort()
    console.log(`Cancelled session ${shortId(sessionId)}`)

    if (notifyPeer) {
      const peer = active.handle.peer
      sendRequest(routeUrl('cancel', peer, { sessionId }), {
        method: 'POST',
        timeoutMs: CANCEL_NOTIFY_TIMEOUT_MS,
        verifyPeer: this.verifierFor(peer)
      }).catch((err: unknown) => {
        console.error(`Cancel notification to ${peer.alias} failed: ${errorMessage(err)}`)
      })
    }
    return true
  }

  cancelAll(): void {
    for (const sessionId of Array.from(this.runs.keys())) {
      this.cancel(sessionId)
    }
  }

  private verifierFor(peer: Peer): ((der: Buffer) => boolean) | undefined {
    return peer.https ? (der) => verifyFingerprint(peer.fingerprint, der) : undefined
  }

  private async uploadFile(
    active: ActiveRun,
    fileId: string,
    sources: SourceProvider,
    channel: EventChannel<TransferEvent>
  ): Promise<FileOutcome> {
    const { handle, controller } = active
    const { signal } = controller
    const file = handle.manifest.files[fileId]
    const token = handle.tokens[fileId]

    if (signal.aborted) {
      channel.push({ type: 'cancelled', fileId })
      return 'cancelled'
    }
    if (!file || token === undefined) {
      channel.push({ type: 'failed', fileId, error: new TransferIOError(`Unknown file ${fileId}`) })
      return 'failed'
    }

    const body = uploadBody(sources.open(fileId, this.options.chunkSize), file, signal, (sent, delta) => {
      channel.push({ type: 'progress', fileId, bytesTransferred: sent, bytesTotal: file.size, delta })
    })

    try {
      const res = await sendRequest(routeUrl('upload', handle.peer, { sessionId: handle.sessionId, fileId, token }), {
        method: 'POST',
        headers: {
          'content-type': 'application/octet-stream',
          'content-length': String(file.size)
        },
        body,
        signal,
        timeoutMs: this.options.timeoutMs,
        verifyPeer: this.verifierFor(handle.peer)
      })

      if (res.status === 200) {
        channel.push({ type: 'completed', fileId })
        return 'completed'
      }
      if (res.status === 410) {
        channel.push({ type: 'cancelled', fileId })
        return 'cancelled'
      }
      const error = new TransferIOError(`Upload of ${file.fileName} refused with status ${res.status}`)
      channel.push({ type: 'failed', fileId, error })
      return 'failed'
    } catch (err) {
      if (signal.aborted) {
        channel.push({ type: 'cancelled', fileId })
        return 'cancelled'
      }
      const error = err instanceof Error ? err : new TransferIOError(errorMessage(err))
      channel.push({ type: 'failed', fileId, error })
      return 'failed'
    }
  }
}
