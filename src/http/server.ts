import http from 'node:http'
import https from 'node:https'
import type { AddressInfo } from 'node:net'
import { routePath } from '../protocol/routes.js'
import { errorMessage } from '../utils.js'
import { type HttpRequest, type HttpResponse, errorResponse, toHttpRequest } from './parser.js'
import { Router, type RouteParams } from './router.js'
import { type ReceiverContext, handleCancel, handlePrepareUpload, handleUpload } from './handlers.js'

export interface TlsMaterial {
  key: string
  cert: string
}

export interface ReceiverServerConfig {
  port: number
  host?: string
  tls?: TlsMaterial | null    // HTTPS when set
  context: ReceiverContext
}

type ContextHandler = (req: HttpRequest, params: RouteParams, ctx: ReceiverContext) => HttpResponse | Promise<HttpResponse>

export class ReceiverServer {
  private server: http.Server | https.Server | null = null
  private config: ReceiverServerConfig
  private router: Router

  constructor(config: ReceiverServerConfig) {
    this.config = config
    this.router = new Router()
    this.setupRoutes()
  }

  private setupRoutes(): void {
    const ctx = this.config.context

    // Wrap handlers to inject context
    const wrap = (handler: ContextHandler) => {
      return (req: HttpRequest, params: RouteParams) => handler(req, params, ctx)
    }

    this.router.add('POST', routePath('prepare-upload'), wrap(handlePrepareUpload))
    this.router.add('POST', routePath('upload'), wrap(handleUpload))
    this.router.add('POST', routePath('cancel'), wrap(handleCancel))
  }

  get protocol(): 'http' | 'https' {
    return this.config.tls ? 'https' : 'http'
  }

  start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const listener = (req: http.IncomingMessage, res: http.ServerResponse): void => {
        this.handleRequest(req, res).catch((err: unknown) => {
          console.error(`HTTP request error: ${errorMessage(err)}`)
          res.destroy()
        })
      }

      const tls = this.config.tls
      const server = tls
        ? https.createServer({ key: tls.key, cert: tls.cert }, listener)
        : http.createServer(listener)
      this.server = server

      server.once('error', reject)

      server.listen(this.config.port, this.config.host ?? '0.0.0.0', () => {
        server.off('error', reject)
        server.on('error', (err) => {
          console.error('HTTP server error:', err.message)
        })
        const addr = server.address()
        const port = isAddressInfo(addr) ? addr.port : this.config.port
        console.log(`Receiver listening on ${this.protocol}://${this.config.host ?? '0.0.0.0'}:${port}`)
        resolve(port)
      })
    })
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      const server = this.server
      if (!server) {
        resolve()
        return
      }
      this.server = null
      server.close(() => resolve())
      server.closeAllConnections()
    })
  }

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const controller = new AbortController()
    res.on('close', () => {
      if (!res.writableFinished) controller.abort()
    })

    const request = toHttpRequest(req, controller.signal)
    const match = this.router.match(request.method, request.path)

    let response: HttpResponse
    if (!match) {
      response = errorResponse(404, 'Not found')
    } else if ('methodNotAllowed' in match) {
      response = errorResponse(405, 'Method not allowed')
      response.headers['allow'] = match.allow.join(', ')
    } else {
      try {
        response = await match.handler(request, match.params)
      } catch (err) {
        console.error(`HTTP handler error: ${errorMessage(err)}`)
        response = errorResponse(500, 'Internal server error')
      }
    }

    if (res.destroyed) return
    res.writeHead(response.status, response.statusText, {
      ...response.headers,
      'content-length': String(Buffer.byteLength(response.body, 'utf8')),
      connection: 'close'
    })
    res.end(response.body)
  }
}

function isAddressInfo(addr: string | AddressInfo | null): addr is AddressInfo {
  return addr !== null && typeof addr === 'object'
}
