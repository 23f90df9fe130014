import { EventEmitter } from 'node:events'
import {
  type Result,
  ok,
  fail,
  AlreadyCompletedError,
  CancelledError,
  LanSendError,
  TokenInvalidError
} from '../errors.js'
import type { FileMetadata, Peer, TransferManifest } from '../protocol/types.js'
import { generateId, generateToken, shortId } from '../utils.js'

export type SessionState =
  | 'negotiating'
  | 'accepted'
  | 'rejected'
  | 'transferring'
  | 'completed'
  | 'cancelled'
  | 'failed'

export type FileStatus = 'pending' | 'receiving' | 'completed' | 'failed' | 'cancelled'

export interface SessionFile {
  metadata: FileMetadata
  token: string
  status: FileStatus
  bytesReceived: number
}

export interface TransferSession {
  sessionId: string
  state: SessionState
  manifest: TransferManifest
  sender: Peer
  files: Map<string, SessionFile>   // accepted files only
  controller: AbortController       // aborted on cancel, failure or timeout
  createdAt: number
  updatedAt: number
}

export interface UploadClaim {
  session: TransferSession
  file: SessionFile
  signal: AbortSignal
}

export interface SessionRegistryOptions {
  sessionTimeoutMs?: number
  retentionMs?: number
  sweepIntervalMs?: number
  generateId?: () => string
  generateToken?: () => string
  now?: () => number
}

export interface SessionRegistryEvents {
  'session-finished': (session: TransferSession) => void
}

const TRANSITIONS: Record<SessionState, SessionState[]> = {
  negotiating: ['accepted', 'rejected', 'cancelled', 'failed'],
  accepted: ['transferring', 'cancelled', 'failed'],
  transferring: ['completed', 'cancelled', 'failed'],
  rejected: [],
  completed: [],
  cancelled: [],
  failed: []
}

export function canTransition(from: SessionState, to: SessionState): boolean {
  return TRANSITIONS[from].includes(to)
}

export function isTerminal(state: SessionState): boolean {
  return TRANSITIONS[state].length === 0
}

const FILE_TERMINAL: FileStatus[] = ['completed', 'failed', 'cancelled']

export class SessionRegistry extends EventEmitter {
  private sessions: Map<string, TransferSession> = new Map()
  private retained: Map<string, TransferSession> = new Map()  // terminal sessions, kept briefly
  private timer: ReturnType<typeof setInterval> | null = null
  private sessionTimeoutMs: number
  private retentionMs: number
  private sweepIntervalMs: number
  private newId: () => string
  private newToken: () => string
  private now: () => number

  constructor(options: SessionRegistryOptions = {}) {
    super()
    this.sessionTimeoutMs = options.sessionTimeoutMs ?? 5 * 60 * 1000
    this.retentionMs = options.retentionMs ?? 60 * 1000
    this.sweepIntervalMs = options.sweepIntervalMs ?? 30 * 1000
    this.newId = options.generateId ?? generateId
    this.newToken = options.generateToken ?? generateToken
    this.now = options.now ?? Date.now
  }

  start(): void {
    if (this.timer) return
    this.timer = setInterval(() => this.sweep(), this.sweepIntervalMs)
    this.timer.unref()
  }

  destroy(): void {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
    for (const session of this.sessions.values()) {
      session.controller.abort()
    }
    this.sessions.clear()
    this.retained.clear()
  }

  get(sessionId: string): TransferSession | undefined {
    return this.sessions.get(sessionId) ?? this.retained.get(sessionId)
  }

  active(): TransferSession[] {
    return Array.from(this.sessions.values())
  }

  /** Registers an incoming manifest while the receiver decides on it. */
  create(manifest: TransferManifest, sender: Peer): TransferSession {
    let sessionId = this.newId()
    while (this.sessions.has(sessionId) || this.retained.has(sessionId)) {
      sessionId = this.newId()
    }

    const now = this.now()
    const session: TransferSession = {
      sessionId,
      state: 'negotiating',
      manifest,
      sender,
      files: new Map(),
      controller: new AbortController(),
      createdAt: now,
      updatedAt: now
    }
    this.sessions.set(sessionId, session)
    return session
  }

  /** Issues one single-use token per accepted file. Ids not in the manifest are ignored. */
  accept(sessionId: string, acceptedIds: string[]): Record<string, string> | null {
    const session = this.sessions.get(sessionId)
    if (!session || !this.transition(session, 'accepted')) return null

    const tokens: Record<string, string> = {}
    for (const id of acceptedIds) {
      const metadata = session.manifest.files[id]
      if (!metadata || session.files.has(id)) continue
      const token = this.newToken()
      session.files.set(id, { metadata, token, status: 'pending', bytesReceived: 0 })
      tokens[id] = token
    }
    return tokens
  }

  reject(sessionId: string): void {
    const session = this.sessions.get(sessionId)
    if (session && this.transition(session, 'rejected')) this.finish(session)
  }

  /**
   * Redeems a token: the file moves pending -> receiving in one synchronous
   * step, so of two concurrent uploads only one succeeds.
   */
  claim(sessionId: string, fileId: string, token: string, address?: string): Result<UploadClaim, LanSendError> {
    const session = this.sessions.get(sessionId)
    if (!session) {
      const old = this.retained.get(sessionId)
      if (old?.state === 'cancelled') return fail(new CancelledError('Session was cancelled'))
      const oldFile = old?.files.get(fileId)
      if (oldFile && oldFile.token === token && oldFile.status === 'completed') {
        return fail(new AlreadyCompletedError())
      }
      return fail(new TokenInvalidError('Unknown session'))
    }

    if (address !== undefined && address !== session.sender.address) {
      return fail(new TokenInvalidError('Upload from an address other than the sender'))
    }

    const file = session.files.get(fileId)
    if (!file || file.token !== token) return fail(new TokenInvalidError())

    switch (file.status) {
      case 'completed': return fail(new AlreadyCompletedError())
      case 'receiving': return fail(new AlreadyCompletedError('File upload already in progress'))
      case 'failed':
      case 'cancelled': return fail(new TokenInvalidError('Token already used'))
      case 'pending': break
    }

    if (session.state === 'accepted' && !this.transition(session, 'transferring')) {
      return fail(new TokenInvalidError('Session is not accepting uploads'))
    }
    if (session.state !== 'transferring') return fail(new TokenInvalidError('Session is not accepting uploads'))

    file.status = 'receiving'
    session.updatedAt = this.now()
    return ok({ session, file, signal: session.controller.signal })
  }

  progress(sessionId: string, fileId: string, bytesReceived: number): void {
    const session = this.sessions.get(sessionId)
    const file = session?.files.get(fileId)
    if (!session || !file) return
    file.bytesReceived = bytesReceived
    session.updatedAt = this.now()
  }

  complete(sessionId: string, fileId: string): void {
    this.settleFile(sessionId, fileId, 'completed')
  }

  fail(sessionId: string, fileId: string): void {
    this.settleFile(sessionId, fileId, 'failed')
  }

  /** Cancels a session. Returns false for unknown or already-terminal sessions. */
  cancel(sessionId: string): boolean {
    const session = this.sessions.get(sessionId)
    if (!session || !this.transition(session, 'cancelled')) return false

    for (const file of session.files.values()) {
      if (!FILE_TERMINAL.includes(file.status)) file.status = 'cancelled'
    }
    session.controller.abort()
    this.finish(session)
    return true
  }

  /** Fails inactive sessions and forgets retained ones past their retention. */
  sweep(): void {
    const now = this.now()
    for (const session of Array.from(this.sessions.values())) {
      if (now - session.updatedAt > this.sessionTimeoutMs && this.transition(session, 'failed')) {
        console.log(`Session ${shortId(session.sessionId)} timed out`)
        for (const file of session.files.values()) {
          if (!FILE_TERMINAL.includes(file.status)) file.status = 'failed'
        }
        session.controller.abort()
        this.finish(session)
      }
    }
    for (const [sessionId, session] of this.retained) {
      if (now - session.updatedAt > this.retentionMs) this.retained.delete(sessionId)
    }
  }

  private transition(session: TransferSession, to: SessionState): boolean {
    if (!canTransition(session.state, to)) return false
    session.state = to
    session.updatedAt = this.now()
    return true
  }

  private settleFile(sessionId: string, fileId: string, status: 'completed' | 'failed'): void {
    const session = this.sessions.get(sessionId)
    const file = session?.files.get(fileId)
    if (!session || !file || file.status !== 'receiving') return

    file.status = status
    session.updatedAt = this.now()

    const files = Array.from(session.files.values())
    if (files.every(f => FILE_TERMINAL.includes(f.status))) {
      const anyCompleted = files.some(f => f.status === 'completed')
      if (this.transition(session, anyCompleted ? 'completed' : 'failed')) this.finish(session)
    }
  }

  private finish(session: TransferSession): void {
    this.sessions.delete(session.sessionId)
    this.retained.set(session.sessionId, session)
    this.emit('session-finished', session)
  }
}
