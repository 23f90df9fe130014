import { EventEmitter } from 'node:events'
import { encodeAnnouncement, parseAnnouncement } from '../protocol/schema.js'
import type { DeviceInfo } from '../protocol/types.js'
import { delay, errorMessage, shortId } from '../utils.js'
import type { DeviceRegistry, RegistryEntry } from './registry.js'
import type { DatagramSource, DatagramTransport } from './udp.js'

export interface DiscoveryOptions {
  device: DeviceInfo
  registry: DeviceRegistry
  transport: DatagramTransport
  multicastAddress: string
  port: number                  // discovery (multicast) port
  announceIntervalMs?: number
  reply?: boolean               // answer announcements with a unicast reply
}

export interface DiscoveryEvents {
  'device-discovered': (entry: RegistryEntry) => void
  'device-updated': (entry: RegistryEntry) => void
  'device-lost': (fingerprint: string) => void
}

export type DiscoveryState = 'idle' | 'announcing' | 'listening'

const MAX_DATAGRAM_BYTES = 64 * 1024

export class DiscoveryEngine extends EventEmitter {
  private options: DiscoveryOptions
  private timer: ReturnType<typeof setInterval> | null = null
  private _state: DiscoveryState = 'idle'

  constructor(options: DiscoveryOptions) {
    super()
    this.options = options
  }

  get state(): DiscoveryState {
    return this._state
  }

  get registry(): DeviceRegistry {
    return this.options.registry
  }

  async start(): Promise<void> {
    if (this._state !== 'idle') return

    this._state = 'announcing'
    try {
      await this.options.transport.start((data, from) => this.handleDatagram(data, from))
    } catch (err) {
      this._state = 'idle'
      throw err
    }

    await this.announce()

    this.timer = setInterval(() => {
      for (const fingerprint of this.options.registry.prune()) {
        this.emit('device-lost', fingerprint)
      }
      void this.announce()
    }, this.options.announceIntervalMs ?? 5_000)

    this._state = 'listening'
    console.log(`Discovery listening on ${this.options.multicastAddress}:${this.options.port}`)
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
    await this.options.transport.close()
    this.options.registry.clear()
    this._state = 'idle'
  }

  /** Multicasts our announcement. Send failures are logged and retried next cycle. */
  async announce(): Promise<boolean> {
    return this.sendAnnouncement(true, this.options.multicastAddress)
  }

  /** Announces, waits, and returns the devices that are live afterwards. */
  async scan(durationMs: number): Promise<RegistryEntry[]> {
    await this.announce()
    await delay(durationMs)
    return this.options.registry.active()
  }

  private async sendAnnouncement(announce: boolean, address: string): Promise<boolean> {
    const payload = Buffer.from(encodeAnnouncement({ ...this.options.device, announce }))
    try {
      await this.options.transport.send(payload, address, this.options.port)
      return true
    } catch (err) {
      console.error(`Announcement to ${address} failed: ${errorMessage(err)}`)
      return false
    }
  }

  private handleDatagram(data: Buffer, from: DatagramSource): void {
    if (data.length > MAX_DATAGRAM_BYTES) return

    const own = this.options.device
    const parsed = parseAnnouncement(data, { port: own.port, https: own.https })
    if (!parsed.ok) return

    const announcement = parsed.value
    if (announcement.fingerprint === own.fingerprint) return

    const { announce, ...info } = announcement
    const result = this.options.registry.upsert(info, from.address)
    const entry = this.options.registry.get(info.fingerprint)

    if (entry && (result === 'added' || result === 'revived')) {
      console.log(`Discovered ${entry.alias} (${shortId(entry.fingerprint)}) at ${entry.address}:${entry.port}`)
      this.emit('device-discovered', entry)
    } else if (entry && result === 'updated') {
      this.emit('device-updated', entry)
    }

    if (announce && this.options.reply !== false) {
      void this.sendAnnouncement(false, from.address)
    }
  }
}
