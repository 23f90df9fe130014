import type { Readable } from 'node:stream'
import {
  AlreadyCompletedError,
  CancelledError,
  SizeMismatchError,
  TokenInvalidError,
  TransferIOError,
  LanSendError
} from '../errors.js'
import { parsePrepareUploadRequest } from '../protocol/schema.js'
import type { DeviceInfo, Peer } from '../protocol/types.js'
import { decideWithTimeout, type DecisionProvider } from '../receive/decision.js'
import type { SessionRegistry } from '../receive/sessions.js'
import type { PartialFile, ReceiveStorage } from '../receive/storage.js'
import { errorMessage, formatSize, shortId } from '../utils.js'
import type { HttpRequest, HttpResponse } from './parser.js'
import { emptyResponse, errorResponse, jsonResponse, readBody } from './parser.js'
import type { RouteParams } from './router.js'

/** Sender-side hook: the receiver of one of our uploads may cancel it through our server. */
export interface OutboundSessions {
  cancel(sessionId: string, notifyPeer: boolean): boolean
}

export interface ReceiverContext {
  device: DeviceInfo
  sessions: SessionRegistry
  storage: ReceiveStorage
  decision: DecisionProvider
  decisionTimeoutMs: number
  outbound?: OutboundSessions
}

const MAX_MANIFEST_BYTES = 4 * 1024 * 1024

export function statusFor(err: unknown): number {
  if (err instanceof TokenInvalidError) return 403
  if (err instanceof AlreadyCompletedError) return 409
  if (err instanceof CancelledError) return 410
  if (err instanceof SizeMismatchError) return err.exceeded ? 413 : 500
  return 500
}

function failure(err: unknown): HttpResponse {
  const status = statusFor(err)
  const message = err instanceof LanSendError ? err.message : 'Internal server error'
  return errorResponse(status, message)
}

// --- prepare-upload ---

export async function handlePrepareUpload(req: HttpRequest, _params: RouteParams, ctx: ReceiverContext): Promise<HttpResponse> {
  const raw = await readBody(req, MAX_MANIFEST_BYTES)
  if (!raw) return errorResponse(413, 'Request too large')

  let payload: unknown
  try {
    payload = JSON.parse(raw.toString('utf8'))
  } catch {
    return errorResponse(400, 'Invalid JSON')
  }

  const parsed = parsePrepareUploadRequest(payload, { port: ctx.device.port, https: ctx.device.https })
  if (!parsed.ok) return errorResponse(400, parsed.error)

  const manifest = parsed.value
  const files = Object.values(manifest.files)
  if (files.length === 0) return errorResponse(400, 'Request must contain at least one file')

  const sender: Peer = { ...manifest.info, address: req.remoteAddress }
  const session = ctx.sessions.create(manifest, sender)
  const total = files.reduce((sum, f) => sum + f.size, 0)
  console.log(`Transfer request ${shortId(session.sessionId)} from ${sender.alias} (${sender.address}): ${files.length} file(s), ${formatSize(total)}`)

  const decided = await decideWithTimeout(
    ctx.decision,
    { sessionId: session.sessionId, sender, files },
    ctx.decisionTimeoutMs,
    req.signal
  )

  const accepted = decided?.filter(id => Object.hasOwn(manifest.files, id)) ?? []
  if (!decided || accepted.length === 0) {
    ctx.sessions.reject(session.sessionId)
    if (decided) {
      console.log(`Transfer ${shortId(session.sessionId)}: nothing to receive`)
      return emptyResponse(204)
    }
    console.log(`Transfer ${shortId(session.sessionId)} declined`)
    return errorResponse(403, 'File request declined by recipient')
  }

  // Null when the sender cancelled while we were deciding
  const tokens = ctx.sessions.accept(session.sessionId, accepted)
  if (!tokens) return errorResponse(403, 'Session no longer exists')

  console.log(`Transfer ${shortId(session.sessionId)} accepted: ${accepted.length}/${files.length} file(s)`)
  return jsonResponse({ sessionId: session.sessionId, files: tokens })
}

// --- upload ---

/**
 * Body chunks until the stream ends or `signal` fires. The request stream is
 * left intact on cancel: destroying it resets the socket before a 410 goes out.
 */
async function* chunksUntil(body: Readable, signal: AbortSignal): AsyncGenerator<Buffer> {
  const chunks = body.iterator({ destroyOnReturn: false })
  const aborted = new Promise<null>(resolve => {
    if (signal.aborted) resolve(null)
    else signal.addEventListener('abort', () => resolve(null), { once: true })
  })

  for (;;) {
    if (signal.aborted) throw new CancelledError()
    const next = await Promise.race([aborted, chunks.next()])
    if (next === null) throw new CancelledError()
    if (next.done) return
    const chunk: unknown = next.value
    yield Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk))
  }
}

export async function handleUpload(req: HttpRequest, _params: RouteParams, ctx: ReceiverContext): Promise<HttpResponse> {
  const { sessionId, fileId, token } = req.query
  if (!sessionId || !fileId || !token) return errorResponse(400, 'Missing parameters')

  const claim = ctx.sessions.claim(sessionId, fileId, token, req.remoteAddress)
  if (!claim.ok) return failure(claim.error)

  const { file, signal } = claim.value
  const metadata = file.metadata

  const declared = req.headers['content-length']
  if (declared !== undefined && Number(declared) > metadata.size) {
    ctx.sessions.fail(sessionId, fileId)
    return errorResponse(413, `Body larger than the declared ${metadata.size} bytes`)
  }
  if (!ctx.storage.resolveTarget(metadata.fileName)) {
    ctx.sessions.fail(sessionId, fileId)
    return errorResponse(400, 'Unsafe file name')
  }

  let partial: PartialFile
  try {
    partial = await ctx.storage.begin(metadata)
  } catch (err) {
    console.error(`Cannot store ${metadata.fileName}: ${errorMessage(err)}`)
    ctx.sessions.fail(sessionId, fileId)
    return errorResponse(500, 'Could not save file')
  }

  try {
    for await (const chunk of chunksUntil(req.body, signal)) {
      await partial.write(chunk)
      ctx.sessions.progress(sessionId, fileId, partial.bytesWritten)
    }
    if (signal.aborted) throw new CancelledError()
    if (req.signal.aborted) throw new TransferIOError('Connection closed by sender')

    const finalPath = await partial.commit(signal)
    if (signal.aborted) return errorResponse(410, 'Session was cancelled')
    ctx.sessions.complete(sessionId, fileId)
    console.log(`Received ${metadata.fileName} (${formatSize(metadata.size)}) -> ${finalPath}`)
    return emptyResponse(200)
  } catch (err) {
    await partial.abort().catch((abortErr: unknown) => {
      console.error(`Failed to remove ${partial.tempPath}: ${errorMessage(abortErr)}`)
    })
    if (signal.aborted) {
      return errorResponse(410, 'Session was cancelled')
    }
    ctx.sessions.fail(sessionId, fileId)
    console.error(`Upload of ${metadata.fileName} failed: ${errorMessage(err)}`)
    if (err instanceof LanSendError) return failure(err)
    return errorResponse(500, 'Could not save file')
  }
}

// --- cancel ---

export function handleCancel(req: HttpRequest, _params: RouteParams, ctx: ReceiverContext): HttpResponse {
  const { sessionId } = req.query
  if (!sessionId) return errorResponse(400, 'Missing parameters')

  if (ctx.sessions.cancel(sessionId)) {
    console.log(`Transfer ${shortId(sessionId)} cancelled by sender`)
  } else if (ctx.outbound?.cancel(sessionId, false)) {
    console.log(`Outgoing session ${shortId(sessionId)} cancelled by receiver`)
  }
  return emptyResponse(200)
}
