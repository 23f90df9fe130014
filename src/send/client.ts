import http from 'node:http'
import https from 'node:https'
import { TLSSocket } from 'node:tls'
import { Readable } from 'node:stream'
import { pipeline } from 'node:stream/promises'
import { IdentityMismatchError } from '../errors.js'

export interface RequestOptions {
  method?: string
  headers?: Record<string, string>
  body?: string | Buffer | AsyncIterable<Buffer>
  signal?: AbortSignal
  timeoutMs?: number
  /** HTTPS only: accepts or refuses the certificate the peer presented. */
  verifyPeer?: (certificateDer: Buffer) => boolean
}

export interface ClientResponse {
  status: number
  body: Buffer
}

const MAX_RESPONSE_BYTES = 1024 * 1024

export function sendRequest(url: string, options: RequestOptions = {}): Promise<ClientResponse> {
  return new Promise((resolve, reject) => {
    const target = new URL(url)
    const { body, verifyPeer } = options

    const headers: Record<string, string> = { ...options.headers }
    if (typeof body === 'string' || Buffer.isBuffer(body)) {
      headers['content-length'] = String(Buffer.byteLength(body))
    }

    const base = {
      method: options.method ?? 'GET',
      headers,
      signal: options.signal,
      agent: false as const
    }

    // Self-signed certificates are the norm on a LAN; trust comes from the fingerprint check
    const req = target.protocol === 'https:'
      ? https.request(target, { ...base, rejectUnauthorized: false })
      : http.request(target, base)

    if (verifyPeer) {
      req.on('socket', (socket) => {
        if (!(socket instanceof TLSSocket)) return
        socket.once('secureConnect', () => {
          const cert = socket.getPeerCertificate(true)
          if (!cert.raw || !verifyPeer(cert.raw)) {
            req.destroy(new IdentityMismatchError(`Certificate presented by ${target.host} does not match its fingerprint`))
          }
        })
      })
    }

    if (options.timeoutMs !== undefined) {
      req.setTimeout(options.timeoutMs, () => {
        req.destroy(new Error(`Request to ${target.host} timed out`))
      })
    }

    req.on('error', reject)

    req.on('response', (res) => {
      const chunks: Buffer[] = []
      let received = 0
      const finish = (): void => {
        resolve({ status: res.statusCode ?? 0, body: Buffer.concat(chunks) })
      }
      res.on('data', (chunk: Buffer) => {
        received += chunk.length
        if (received <= MAX_RESPONSE_BYTES) chunks.push(chunk)
      })
      res.on('end', finish)
      // A peer may answer and hang up before our body is fully sent
      res.on('close', finish)
      res.on('error', reject)
    })

    if (body === undefined || typeof body === 'string' || Buffer.isBuffer(body)) {
      req.end(body)
    } else {
      pipeline(Readable.from(body), req).catch((err: unknown) => {
        req.destroy(err instanceof Error ? err : new Error(String(err)))
      })
    }
  })
}
