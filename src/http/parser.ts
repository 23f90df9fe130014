import type { IncomingMessage } from 'node:http'
import type { Readable } from 'node:stream'

export interface HttpRequest {
  method: string
  path: string
  query: Record<string, string>
  headers: Record<string, string>
  remoteAddress: string
  body: Readable
  signal: AbortSignal     // aborted when the client goes away before the response
}

export interface HttpResponse {
  status: number
  statusText: string
  headers: Record<string, string>
  body: string
}

export function parseQueryString(qs: string): Record<string, string> {
  const result: Record<string, string> = {}
  if (!qs) return result

  const decode = (s: string): string | null => {
    try {
      return decodeURIComponent(s.replace(/\+/g, ' '))
    } catch {
      return null
    }
  }

  for (const pair of qs.split('&')) {
    if (!pair) continue
    const eqIdx = pair.indexOf('=')
    const key = decode(eqIdx < 0 ? pair : pair.slice(0, eqIdx))
    const value = eqIdx < 0 ? '' : decode(pair.slice(eqIdx + 1))
    if (key === null || value === null) continue
    result[key] = value
  }

  return result
}

export function splitTarget(rawUrl: string): { path: string; query: Record<string, string> } {
  const qIdx = rawUrl.indexOf('?')
  return {
    path: qIdx >= 0 ? rawUrl.slice(0, qIdx) : rawUrl,
    query: qIdx >= 0 ? parseQueryString(rawUrl.slice(qIdx + 1)) : {}
  }
}

export function toHttpRequest(req: IncomingMessage, signal: AbortSignal): HttpRequest {
  const { path, query } = splitTarget(req.url ?? '/')

  const headers: Record<string, string> = {}
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined) continue
    headers[name] = Array.isArray(value) ? value.join(', ') : value
  }

  // IPv4 peers on a dual-stack socket show up as ::ffff:a.b.c.d
  const address = req.socket.remoteAddress ?? ''
  return {
    method: (req.method ?? 'GET').toUpperCase(),
    path,
    query,
    headers,
    remoteAddress: address.startsWith('::ffff:') ? address.slice(7) : address,
    body: req,
    signal
  }
}

/**
 * Reads the whole body, or returns null once it exceeds `limit` bytes. The
 * stream stays open on overflow so the error response can still be written.
 */
export async function readBody(req: HttpRequest, limit: number): Promise<Buffer | null> {
  const chunks: Buffer[] = []
  let size = 0
  for await (const chunk of req.body.iterator({ destroyOnReturn: false })) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk))
    size += buf.length
    if (size > limit) return null
    chunks.push(buf)
  }
  return Buffer.concat(chunks)
}

export function jsonResponse(data: unknown, status = 200): HttpResponse {
  const body = JSON.stringify(data)
  return {
    status,
    statusText: statusText(status),
    headers: { 'content-type': 'application/json' },
    body
  }
}

export function errorResponse(status: number, message: string): HttpResponse {
  return jsonResponse({ error: message }, status)
}

export function emptyResponse(status = 200): HttpResponse {
  return { status, statusText: statusText(status), headers: {}, body: '' }
}

export function statusText(code: number): string {
  switch (code) {
    case 200: return 'OK'
    case 204: return 'No Content'
    case 400: return 'Bad Request'
    case 403: return 'Forbidden'
    case 404: return 'Not Found'
    case 405: return 'Method Not Allowed'
    case 409: return 'Conflict'
    case 410: return 'Gone'
    case 413: return 'Payload Too Large'
    case 500: return 'Internal Server Error'
    default: return 'Unknown'
  }
}
