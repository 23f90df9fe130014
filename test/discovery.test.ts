import { describe, test, afterEach } from 'node:test'
import assert from 'node:assert/strict'
import { DiscoveryEngine } from '../src/discovery/discovery.js'
import { DeviceRegistry, type RegistryEntry } from '../src/discovery/registry.js'
import type { DatagramHandler, DatagramTransport } from '../src/discovery/udp.js'
import { encodeAnnouncement } from '../src/protocol/schema.js'
import type { DeviceInfo } from '../src/protocol/types.js'
import { delay } from '../src/utils.js'

const GROUP = '224.0.0.167'
const PORT = 53317

// In-memory network: multicast reaches every member (sender included), unicast one address
class Hub {
  members = new Map<string, DatagramHandler>()
  sent: { from: string; to: string; data: Buffer }[] = []

  transport(address: string): HubTransport {
    return new HubTransport(this, address)
  }

  deliver(from: string, to: string, data: Buffer): void {
    this.sent.push({ from, to, data })
    const targets = to === GROUP ? Array.from(this.members.values()) : [this.members.get(to)]
    for (const handler of targets) {
      if (handler) setImmediate(() => handler(data, { address: from, port: PORT }))
    }
  }
}

class HubTransport implements DatagramTransport {
  constructor(private hub: Hub, private address: string) {}

  async start(onMessage: DatagramHandler): Promise<void> {
    this.hub.members.set(this.address, onMessage)
  }

  async send(data: Buffer, address: string, _port: number): Promise<void> {
    this.hub.deliver(this.address, address, data)
  }

  async close(): Promise<void> {
    this.hub.members.delete(this.address)
  }
}

function device(alias: string, fingerprint: string): DeviceInfo {
  return {
    alias,
    fingerprint,
    deviceModel: null,
    deviceType: 'headless',
    version: '2.0',
    port: 53318,
    https: false,
    download: false
  }
}

const engines: DiscoveryEngine[] = []

function node(hub: Hub, alias: string, fingerprint: string, address: string, reply?: boolean): DiscoveryEngine {
  const engine = new DiscoveryEngine({
    device: device(alias, fingerprint),
    registry: new DeviceRegistry(),
    transport: hub.transport(address),
    multicastAddress: GROUP,
    port: PORT,
    announceIntervalMs: 60_000,
    reply
  })
  engines.push(engine)
  return engine
}

afterEach(async () => {
  for (const engine of engines.splice(0)) await engine.stop()
})

describe('DiscoveryEngine', () => {
  test('moves from idle to listening', async () => {
    const engine = node(new Hub(), 'A', 'aaaa', '10.0.0.1')
    assert.equal(engine.state, 'idle')
    await engine.start()
    assert.equal(engine.state, 'listening')
    await engine.stop()
    assert.equal(engine.state, 'idle')
  })

  test('two devices converge through announce and reply', async () => {
    const hub = new Hub()
    const a = node(hub, 'A', 'aaaa', '10.0.0.1')
    const b = node(hub, 'B', 'bbbb', '10.0.0.2')
    await a.start()
    await b.start()
    await delay(20)

    assert.deepEqual(a.registry.active().map(e => [e.alias, e.address]), [['B', '10.0.0.2']])
    assert.deepEqual(b.registry.active().map(e => [e.alias, e.address]), [['A', '10.0.0.1']])

    const reply = hub.sent.find(s => s.from === '10.0.0.1' && s.to === '10.0.0.2')
    assert.ok(reply)
    assert.equal(JSON.parse(reply.data.toString()).announce, false)
  })

  test('ignores its own announcements', async () => {
    const engine = node(new Hub(), 'A', 'aaaa', '10.0.0.1')
    await engine.start()
    await delay(10)
    assert.equal(engine.registry.size, 0)
  })

  test('does not reply when replies are disabled', async () => {
    const hub = new Hub()
    const a = node(hub, 'A', 'aaaa', '10.0.0.1', false)
    const b = node(hub, 'B', 'bbbb', '10.0.0.2')
    await a.start()
    await b.start()
    await delay(20)
    assert.equal(a.registry.size, 1)
    assert.equal(hub.sent.filter(s => s.to !== GROUP).length, 0)
    assert.equal(b.registry.size, 0)
  })

  test('does not answer a reply', async () => {
    const hub = new Hub()
    const a = node(hub, 'A', 'aaaa', '10.0.0.1')
    await a.start()
    hub.deliver('10.0.0.9', '10.0.0.1', Buffer.from(encodeAnnouncement({ ...device('Z', 'zzzz'), announce: false })))
    await delay(10)
    assert.equal(a.registry.get('zzzz')?.alias, 'Z')
    assert.equal(hub.sent.filter(s => s.from === '10.0.0.1' && s.to === '10.0.0.9').length, 0)
  })

  test('emits discovered once and updated on change', async () => {
    const hub = new Hub()
    const a = node(hub, 'A', 'aaaa', '10.0.0.1')
    const discovered: string[] = []
    const updated: string[] = []
    a.on('device-discovered', (e: RegistryEntry) => discovered.push(e.alias))
    a.on('device-updated', (e: RegistryEntry) => updated.push(e.alias))
    await a.start()

    const send = (alias: string): void => {
      hub.deliver('10.0.0.9', GROUP, Buffer.from(encodeAnnouncement({ ...device(alias, 'zzzz'), announce: true })))
    }
    send('Z')
    await delay(10)
    send('Z')
    await delay(10)
    send('Z2')
    await delay(10)

    assert.deepEqual(discovered, ['Z'])
    assert.deepEqual(updated, ['Z2'])
  })

  test('drops malformed and oversized datagrams', async () => {
    const hub = new Hub()
    const a = node(hub, 'A', 'aaaa', '10.0.0.1')
    await a.start()
    hub.deliver('10.0.0.9', GROUP, Buffer.from('not json'))
    hub.deliver('10.0.0.9', GROUP, Buffer.from(JSON.stringify({ alias: 'x' })))
    const big = { ...device('Big', 'bbbb'), announce: true, padding: 'x'.repeat(70 * 1024) }
    hub.deliver('10.0.0.9', GROUP, Buffer.from(JSON.stringify(big)))
    await delay(10)
    assert.equal(a.registry.size, 0)
  })

  test('stop clears the registry', async () => {
    const hub = new Hub()
    const a = node(hub, 'A', 'aaaa', '10.0.0.1')
    const b = node(hub, 'B', 'bbbb', '10.0.0.2')
    await a.start()
    await b.start()
    await delay(20)
    await a.stop()
    assert.equal(a.registry.size, 0)
  })

  test('a failing transport leaves the engine idle', async () => {
    const engine = new DiscoveryEngine({
      device: device('A', 'aaaa'),
      registry: new DeviceRegistry(),
      transport: {
        start: async () => { throw new Error('EADDRINUSE') },
        send: async () => {},
        close: async () => {}
      },
      multicastAddress: GROUP,
      port: PORT
    })
    await assert.rejects(engine.start(), /EADDRINUSE/)
    assert.equal(engine.state, 'idle')
  })

  test('announce reports send failures', async () => {
    const engine = new DiscoveryEngine({
      device: device('A', 'aaaa'),
      registry: new DeviceRegistry(),
      transport: {
        start: async () => {},
        send: async () => { throw new Error('ENETUNREACH') },
        close: async () => {}
      },
      multicastAddress: GROUP,
      port: PORT,
      announceIntervalMs: 60_000
    })
    engines.push(engine)
    await engine.start()
    assert.equal(await engine.announce(), false)
  })

  test('scan returns the live devices', async () => {
    const hub = new Hub()
    const a = node(hub, 'A', 'aaaa', '10.0.0.1')
    const b = node(hub, 'B', 'bbbb', '10.0.0.2')
    await b.start()
    await a.start()
    const found = await a.scan(20)
    assert.deepEqual(found.map(e => e.fingerprint), ['bbbb'])
  })
})
