import { type Result, ok, fail, NegotiationError, IdentityMismatchError } from '../errors.js'
import { verifyFingerprint } from '../identity.js'
import { routeUrl } from '../protocol/routes.js'
import { encodePrepareUploadRequest, parseSessionResponse } from '../protocol/schema.js'
import type { Peer, TransferManifest } from '../protocol/types.js'
import { errorMessage, shortId } from '../utils.js'
import { sendRequest, type ClientResponse } from './client.js'

export interface SessionHandle {
  peer: Peer
  sessionId: string                 // issued by the receiver
  manifest: TransferManifest
  tokens: Record<string, string>    // accepted fileId -> token
  rejected: string[]                // file ids the receiver declined
  state: 'accepted'
}

export interface NegotiateOptions {
  signal?: AbortSignal
  timeoutMs?: number
}

// Covers the receiver's decision wait plus connection setup
export const DEFAULT_NEGOTIATION_TIMEOUT_MS = 90_000

export async function negotiate(
  peer: Peer,
  manifest: TransferManifest,
  options: NegotiateOptions = {}
): Promise<Result<SessionHandle, NegotiationError>> {
  const { signal } = options
  if (signal?.aborted) return fail(new NegotiationError('cancelled', 'Negotiation cancelled'))

  const fileIds = Object.keys(manifest.files)
  if (fileIds.length === 0) return fail(new NegotiationError('rejected', 'Nothing selected'))

  let res: ClientResponse
  try {
    res = await sendRequest(routeUrl('prepare-upload', peer), {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(encodePrepareUploadRequest(manifest)),
      signal,
      timeoutMs: options.timeoutMs ?? DEFAULT_NEGOTIATION_TIMEOUT_MS,
      verifyPeer: peer.https ? (der) => verifyFingerprint(peer.fingerprint, der) : undefined
    })
  } catch (err) {
    if (err instanceof IdentityMismatchError) {
      return fail(new NegotiationError('identity-mismatch', err.message))
    }
    if (signal?.aborted) return fail(new NegotiationError('cancelled', 'Negotiation cancelled'))
    return fail(new NegotiationError('unreachable', `${peer.alias} unreachable: ${errorMessage(err)}`))
  }

  switch (res.status) {
    case 200:
      break
    case 204:
      return fail(new NegotiationError('rejected', 'Recipient accepted none of the files', 204))
    case 403:
      return fail(new NegotiationError('rejected', 'Recipient declined the transfer', 403))
    case 409:
      return fail(new NegotiationError('rejected', 'Recipient is busy with another transfer', 409))
    default:
      return fail(new NegotiationError('rejected', `Unexpected response status ${res.status}`, res.status))
  }

  let payload: unknown
  try {
    payload = JSON.parse(res.body.toString('utf8'))
  } catch {
    return fail(new NegotiationError('protocol', 'Response is not valid JSON', 200))
  }

  const parsed = parseSessionResponse(payload)
  if (!parsed.ok) return fail(new NegotiationError('protocol', parsed.error, 200))

  // Tokens for ids we never offered are ignored
  const tokens: Record<string, string> = {}
  for (const id of fileIds) {
    const token = parsed.value.files[id]
    if (token !== undefined) tokens[id] = token
  }

  if (Object.keys(tokens).length === 0) {
    return fail(new NegotiationError('rejected', 'Recipient accepted none of the files', 200))
  }

  const rejected = fileIds.filter(id => tokens[id] === undefined)
  console.log(`Session ${shortId(parsed.value.sessionId)} accepted by ${peer.alias}: ${Object.keys(tokens).length}/${fileIds.length} files`)

  return ok({
    peer,
    sessionId: parsed.value.sessionId,
    manifest,
    tokens,
    rejected,
    state: 'accepted'
  })
}
