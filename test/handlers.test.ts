import { describe, test, beforeEach, afterEach } from 'node:test'
import assert from 'node:assert/strict'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import { PassThrough, Readable } from 'node:stream'
import {
  handleCancel,
  handlePrepareUpload,
  handleUpload,
  statusFor,
  type ReceiverContext
} from '../src/http/handlers.js'
import type { HttpRequest } from '../src/http/parser.js'
import { AlreadyCompletedError, CancelledError, SizeMismatchError, TokenInvalidError } from '../src/errors.js'
import { encodePrepareUploadRequest } from '../src/protocol/schema.js'
import type { DeviceInfo, FileMetadata } from '../src/protocol/types.js'
import type { DecisionProvider, DecisionRequest } from '../src/receive/decision.js'
import { SessionRegistry } from '../src/receive/sessions.js'
import { ReceiveStorage } from '../src/receive/storage.js'

const SENDER_ADDRESS = '192.168.1.20'

const receiver: DeviceInfo = {
  alias: 'Desk',
  fingerprint: 'd'.repeat(64),
  deviceModel: 'Linux',
  deviceType: 'headless',
  version: '2.0',
  port: 53318,
  https: false,
  download: false
}

const senderInfo: DeviceInfo = { ...receiver, alias: 'Phone', fingerprint: 'f'.repeat(64), deviceType: 'mobile' }

const FILES: Record<string, FileMetadata> = {
  f1: { id: 'f1', fileName: 'a.txt', size: 3, fileType: 'text/plain' },
  f2: { id: 'f2', fileName: 'b.txt', size: 2, fileType: 'text/plain' }
}

interface FakeRequest {
  query?: Record<string, string>
  headers?: Record<string, string>
  body?: string | Buffer | Readable
  remoteAddress?: string
  signal?: AbortSignal
}

function request(options: FakeRequest = {}): HttpRequest {
  const { body } = options
  return {
    method: 'POST',
    path: '/',
    query: options.query ?? {},
    headers: options.headers ?? {},
    remoteAddress: options.remoteAddress ?? SENDER_ADDRESS,
    body: body instanceof Readable ? body : Readable.from(body === undefined ? [] : [Buffer.from(body)]),
    signal: options.signal ?? new AbortController().signal
  }
}

function manifestBody(files: Record<string, FileMetadata> = FILES): string {
  return JSON.stringify(encodePrepareUploadRequest({ info: senderInfo, files }))
}

function counter(prefix: string): () => string {
  let n = 0
  return () => `${prefix}${++n}`
}

class FixedDecision implements DecisionProvider {
  requests: DecisionRequest[] = []

  constructor(private answer: (request: DecisionRequest) => string[] | null) {}

  async decide(request: DecisionRequest): Promise<string[] | null> {
    this.requests.push(request)
    return this.answer(request)
  }
}

describe('statusFor', () => {
  test('maps errors to status codes', () => {
    assert.equal(statusFor(new TokenInvalidError()), 403)
    assert.equal(statusFor(new AlreadyCompletedError()), 409)
    assert.equal(statusFor(new CancelledError()), 410)
    assert.equal(statusFor(new SizeMismatchError('big', true)), 413)
    assert.equal(statusFor(new SizeMismatchError('short', false)), 500)
    assert.equal(statusFor(new Error('other')), 500)
  })
})

describe('handlers', () => {
  let tmpDir: string
  let ctx: ReceiverContext
  let sessions: SessionRegistry
  let decision: FixedDecision

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'lansend-handlers-'))
    sessions = new SessionRegistry({ generateId: counter('s'), generateToken: counter('tok') })
    decision = new FixedDecision(r => r.files.map(f => f.id))
    ctx = {
      device: receiver,
      sessions,
      storage: new ReceiveStorage({ destination: tmpDir }),
      decision,
      decisionTimeoutMs: 1000
    }
  })

  afterEach(() => {
    sessions.destroy()
    fs.rmSync(tmpDir, { recursive: true, force: true })
  })

  async function prepare(): Promise<void> {
    const res = await handlePrepareUpload(request({ body: manifestBody() }), {}, ctx)
    assert.equal(res.status, 200)
  }

  describe('prepare-upload', () => {
    test('issues a session and tokens', async () => {
      const res = await handlePrepareUpload(request({ body: manifestBody() }), {}, ctx)
      assert.equal(res.status, 200)
      assert.deepEqual(JSON.parse(res.body), { sessionId: 's1', files: { f1: 'tok1', f2: 'tok2' } })
      assert.equal(sessions.get('s1')?.state, 'accepted')
    })

    test('hands the sender and files to the decision', async () => {
      await handlePrepareUpload(request({ body: manifestBody() }), {}, ctx)
      const seen = decision.requests[0]
      assert.ok(seen)
      assert.equal(seen.sessionId, 's1')
      assert.equal(seen.sender.alias, 'Phone')
      assert.equal(seen.sender.address, SENDER_ADDRESS)
      assert.deepEqual(seen.files.map(f => f.id), ['f1', 'f2'])
    })

    test('a partial decision only issues tokens for accepted files', async () => {
      ctx.decision = new FixedDecision(() => ['f2', 'bogus', 'toString'])
      const res = await handlePrepareUpload(request({ body: manifestBody() }), {}, ctx)
      assert.deepEqual(JSON.parse(res.body), { sessionId: 's1', files: { f2: 'tok1' } })
    })

    test('declined transfers get 403', async () => {
      ctx.decision = new FixedDecision(() => null)
      const res = await handlePrepareUpload(request({ body: manifestBody() }), {}, ctx)
      assert.equal(res.status, 403)
      assert.equal(res.body, '{"error":"File request declined by recipient"}')
      assert.equal(sessions.get('s1')?.state, 'rejected')
    })

    test('accepting nothing gives 204', async () => {
      ctx.decision = new FixedDecision(() => [])
      const res = await handlePrepareUpload(request({ body: manifestBody() }), {}, ctx)
      assert.equal(res.status, 204)
      assert.equal(res.body, '')
    })

    test('invalid JSON gives 400', async () => {
      const res = await handlePrepareUpload(request({ body: '{nope' }), {}, ctx)
      assert.equal(res.status, 400)
      assert.equal(res.body, '{"error":"Invalid JSON"}')
    })

    test('schema errors give 400', async () => {
      const res = await handlePrepareUpload(request({ body: JSON.stringify({ files: {} }) }), {}, ctx)
      assert.equal(res.status, 400)
      assert.equal(res.body, '{"error":"info: Device info must be an object"}')
    })

    test('unsafe names give 400', async () => {
      const files = { f1: { id: 'f1', fileName: '../../etc/passwd', size: 3, fileType: 'text/plain' } }
      const res = await handlePrepareUpload(request({ body: manifestBody(files) }), {}, ctx)
      assert.equal(res.status, 400)
      assert.equal(decision.requests.length, 0)
    })

    test('an empty file map gives 400', async () => {
      const res = await handlePrepareUpload(request({ body: manifestBody({}) }), {}, ctx)
      assert.equal(res.status, 400)
      assert.equal(res.body, '{"error":"Request must contain at least one file"}')
    })

    test('oversized manifests give 413', async () => {
      const res = await handlePrepareUpload(request({ body: Buffer.alloc(4 * 1024 * 1024 + 1, 32) }), {}, ctx)
      assert.equal(res.status, 413)
    })

    test('a sender that goes away while deciding is declined', async () => {
      const controller = new AbortController()
      ctx.decision = { decide: () => new Promise<string[] | null>(() => undefined) }
      const pending = handlePrepareUpload(request({ body: manifestBody(), signal: controller.signal }), {}, ctx)
      setTimeout(() => controller.abort(), 10)
      const res = await pending
      assert.equal(res.status, 403)
      assert.equal(sessions.get('s1')?.state, 'rejected')
    })

    test('a session cancelled while deciding gets no tokens', async () => {
      ctx.decision = new FixedDecision((r) => {
        sessions.cancel(r.sessionId)
        return ['f1']
      })
      const res = await handlePrepareUpload(request({ body: manifestBody() }), {}, ctx)
      assert.equal(res.status, 403)
      assert.equal(res.body, '{"error":"Session no longer exists"}')
    })
  })

  describe('upload', () => {
    const upload = (query: Record<string, string>, body: string | Readable, extra: FakeRequest = {}) =>
      handleUpload(request({ query, body, ...extra }), {}, ctx)

    test('stores the file and completes the file', async () => {
      await prepare()
      const res = await upload({ sessionId: 's1', fileId: 'f1', token: 'tok1' }, 'abc')
      assert.equal(res.status, 200)
      assert.equal(fs.readFileSync(path.join(tmpDir, 'a.txt'), 'utf8'), 'abc')
      assert.equal(sessions.get('s1')?.files.get('f1')?.status, 'completed')
    })

    test('the last file completes the session', async () => {
      await prepare()
      await upload({ sessionId: 's1', fileId: 'f1', token: 'tok1' }, 'abc')
      await upload({ sessionId: 's1', fileId: 'f2', token: 'tok2' }, 'de')
      assert.equal(sessions.get('s1')?.state, 'completed')
      assert.deepEqual(fs.readdirSync(tmpDir).sort(), ['a.txt', 'b.txt'])
    })

    test('a second upload with the same token gets 409', async () => {
      await prepare()
      await upload({ sessionId: 's1', fileId: 'f1', token: 'tok1' }, 'abc')
      const res = await upload({ sessionId: 's1', fileId: 'f1', token: 'tok1' }, 'abc')
      assert.equal(res.status, 409)
      assert.equal(res.body, '{"error":"File already received"}')
    })

    test('missing parameters give 400', async () => {
      const res = await upload({ sessionId: 's1', fileId: 'f1' }, 'abc')
      assert.equal(res.status, 400)
      assert.equal(res.body, '{"error":"Missing parameters"}')
    })

    test('a wrong token gets 403', async () => {
      await prepare()
      const res = await upload({ sessionId: 's1', fileId: 'f1', token: 'tok9' }, 'abc')
      assert.equal(res.status, 403)
      assert.equal(res.body, '{"error":"Invalid token"}')
    })

    test('an unknown session gets 403', async () => {
      const res = await upload({ sessionId: 'nope', fileId: 'f1', token: 'tok1' }, 'abc')
      assert.equal(res.status, 403)
    })

    test('uploads from another address get 403', async () => {
      await prepare()
      const res = await upload({ sessionId: 's1', fileId: 'f1', token: 'tok1' }, 'abc', { remoteAddress: '192.168.1.66' })
      assert.equal(res.status, 403)
      assert.equal(sessions.get('s1')?.files.get('f1')?.status, 'pending')
    })

    test('a declared length above the file size gets 413', async () => {
      await prepare()
      const res = await upload({ sessionId: 's1', fileId: 'f1', token: 'tok1' }, 'abcd', {
        headers: { 'content-length': '4' }
      })
      assert.equal(res.status, 413)
      assert.equal(sessions.get('s1')?.files.get('f1')?.status, 'failed')
      assert.deepEqual(fs.readdirSync(tmpDir), [])
    })

    test('a body longer than the file gets 413', async () => {
      await prepare()
      const res = await upload({ sessionId: 's1', fileId: 'f1', token: 'tok1' }, 'abcdef')
      assert.equal(res.status, 413)
      assert.equal(res.body, '{"error":"Received more than the declared 3 bytes"}')
      assert.deepEqual(fs.readdirSync(tmpDir), [])
    })

    test('a short body gets 500 and stores nothing', async () => {
      await prepare()
      const res = await upload({ sessionId: 's1', fileId: 'f1', token: 'tok1' }, 'ab')
      assert.equal(res.status, 500)
      assert.equal(res.body, '{"error":"Received 2 of 3 bytes"}')
      assert.deepEqual(fs.readdirSync(tmpDir), [])
    })

    test('uploads to a cancelled session get 410', async () => {
      await prepare()
      sessions.cancel('s1')
      const res = await upload({ sessionId: 's1', fileId: 'f1', token: 'tok1' }, 'abc')
      assert.equal(res.status, 410)
    })

    test('cancelling mid-upload stops the write with 410', async () => {
      await prepare()
      const body = new PassThrough()
      const pending = upload({ sessionId: 's1', fileId: 'f1', token: 'tok1' }, body)
      body.write('a')
      setTimeout(() => sessions.cancel('s1'), 20)
      const res = await pending
      assert.equal(res.status, 410)
      assert.deepEqual(fs.readdirSync(tmpDir), [])
    })

    test('a cancel that lands while committing keeps the file out of place', async () => {
      await prepare()
      const storage = ctx.storage
      const begin = storage.begin.bind(storage)
      storage.begin = async (metadata) => {
        const partial = await begin(metadata)
        const commit = partial.commit.bind(partial)
        partial.commit = (signal) => {
          sessions.cancel('s1')
          return commit(signal)
        }
        return partial
      }

      const res = await upload({ sessionId: 's1', fileId: 'f1', token: 'tok1' }, 'abc')
      assert.equal(res.status, 410)
      assert.equal(res.body, '{"error":"Session was cancelled"}')
      assert.equal(sessions.get('s1')?.state, 'cancelled')
      assert.deepEqual(fs.readdirSync(tmpDir), [])
    })

    test('a sender hanging up mid-upload fails the file', async () => {
      await prepare()
      const controller = new AbortController()
      const body = new PassThrough()
      const pending = upload({ sessionId: 's1', fileId: 'f1', token: 'tok1' }, body, { signal: controller.signal })
      body.write('a')
      setTimeout(() => {
        controller.abort()
        body.end()
      }, 20)
      const res = await pending
      assert.equal(res.status, 500)
      assert.equal(sessions.get('s1')?.files.get('f1')?.status, 'failed')
    })
  })

  describe('cancel', () => {
    test('missing session id gives 400', () => {
      assert.equal(handleCancel(request(), {}, ctx).status, 400)
    })

    test('cancels an inbound session', async () => {
      await prepare()
      const res = handleCancel(request({ query: { sessionId: 's1' } }), {}, ctx)
      assert.equal(res.status, 200)
      assert.equal(sessions.get('s1')?.state, 'cancelled')
    })

    test('falls through to outbound sessions without notifying back', () => {
      const calls: [string, boolean][] = []
      ctx.outbound = { cancel: (id, notify) => { calls.push([id, notify]); return true } }
      const res = handleCancel(request({ query: { sessionId: 'out1' } }), {}, ctx)
      assert.equal(res.status, 200)
      assert.deepEqual(calls, [['out1', false]])
    })

    test('unknown sessions still get 200', () => {
      assert.equal(handleCancel(request({ query: { sessionId: 'nope' } }), {}, ctx).status, 200)
    })
  })
})
