import type { Settings } from './config.js'
import { DiscoveryEngine } from './discovery/discovery.js'
import { DeviceRegistry, type RegistryEntry } from './discovery/registry.js'
import { UdpTransport, type DatagramTransport } from './discovery/udp.js'
import { ok, type NegotiationError, type Result } from './errors.js'
import type { ReceiverContext } from './http/handlers.js'
import { ReceiverServer } from './http/server.js'
import type { IdentityProvider } from './identity.js'
import { PROTOCOL_VERSION, type DeviceInfo } from './protocol/types.js'
import { ConsolePrompt, QuickSavePolicy, type DecisionProvider } from './receive/decision.js'
import { SessionRegistry, type TransferSession } from './receive/sessions.js'
import { ReceiveStorage } from './receive/storage.js'
import { TransferExecutor, type TransferRun } from './send/executor.js'
import type { SendingFiles } from './send/files.js'
import { negotiate } from './send/negotiator.js'
import { delay, errorMessage, shortId } from './utils.js'

export interface DaemonOptions {
  settings: Settings
  identity: IdentityProvider
  decision?: DecisionProvider
  transport?: DatagramTransport
  serve?: boolean          // run the receiver server (default true)
  discover?: boolean       // run multicast discovery (default true)
  host?: string
}

const PEER_POLL_MS = 200
const NEGOTIATION_GRACE_MS = 30_000

export class LanSendDaemon {
  readonly registry: DeviceRegistry
  readonly sessions: SessionRegistry
  readonly storage: ReceiveStorage
  readonly executor: TransferExecutor
  private options: DaemonOptions
  private context: ReceiverContext
  private server: ReceiverServer | null = null
  private discovery: DiscoveryEngine | null = null
  private _device: DeviceInfo

  constructor(options: DaemonOptions) {
    const { settings, identity } = options
    this.options = options
    this.registry = new DeviceRegistry({ livenessMs: settings.livenessMs })
    this.sessions = new SessionRegistry({ sessionTimeoutMs: settings.sessionTimeoutMs })
    this.storage = new ReceiveStorage({ destination: settings.destination, overwrite: settings.overwrite })
    this.executor = new TransferExecutor({ concurrency: settings.concurrency })

    this._device = {
      alias: settings.alias,
      fingerprint: identity.fingerprint(),
      deviceModel: settings.deviceModel,
      deviceType: 'headless',
      version: PROTOCOL_VERSION,
      port: settings.httpPort,
      https: settings.https,
      download: false
    }

    this.context = {
      device: this._device,
      sessions: this.sessions,
      storage: this.storage,
      decision: options.decision ?? (settings.quickSave ? new QuickSavePolicy(this.storage) : new ConsolePrompt()),
      decisionTimeoutMs: settings.decisionTimeoutMs,
      outbound: this.executor
    }
  }

  get device(): DeviceInfo {
    return this._device
  }

  async start(): Promise<DeviceInfo> {
    const { settings, identity } = this.options

    if (!settings.https) {
      console.log('HTTPS disabled: peers are not authenticated, transfers rely on LAN trust only')
    }

    if (this.options.serve !== false) {
      this.server = new ReceiverServer({
        port: settings.httpPort,
        host: this.options.host,
        tls: settings.https ? { key: identity.keyPem, cert: identity.certPem } : null,
        context: this.context
      })
      const port = await this.server.start()
      this._device = { ...this._device, port }
      this.context.device = this._device
    }

    this.sessions.start()
    this.sessions.on('session-finished', (session: TransferSession) => {
      console.log(`Session ${shortId(session.sessionId)} ${session.state}`)
    })

    if (this.options.discover !== false) {
      this.discovery = new DiscoveryEngine({
        device: this._device,
        registry: this.registry,
        transport: this.options.transport ??
          new UdpTransport({ port: settings.port, multicastAddress: settings.multicastAddress }),
        multicastAddress: settings.multicastAddress,
        port: settings.port,
        announceIntervalMs: settings.announceIntervalMs
      })
      try {
        await this.discovery.start()
      } catch (err) {
        console.error(`Discovery unavailable: ${errorMessage(err)}`)
        this.discovery = null
      }
    }

    console.log(`${this._device.alias} ready (${shortId(this._device.fingerprint)})`)
    return this._device
  }

  async stop(): Promise<void> {
    this.executor.cancelAll()
    this.sessions.destroy()
    this.sessions.removeAllListeners()
    if (this.discovery) {
      await this.discovery.stop()
      this.discovery = null
    }
    if (this.server) {
      await this.server.stop()
      this.server = null
    }
  }

  async scan(durationMs: number): Promise<RegistryEntry[]> {
    if (!this.discovery) return this.registry.active()
    return this.discovery.scan(durationMs)
  }

  /** Polls the registry until a matching live device shows up, or the timeout passes. */
  async waitForPeer(query: string | undefined, timeoutMs: number): Promise<RegistryEntry | undefined> {
    const deadline = Date.now() + timeoutMs
    for (;;) {
      const peer = query ? this.registry.find(query) : this.registry.active()[0]
      if (peer || Date.now() >= deadline) return peer
      await delay(PEER_POLL_MS)
    }
  }

  /** Negotiates with the peer and, once accepted, starts uploading. */
  async send(
    peer: RegistryEntry,
    files: SendingFiles,
    signal?: AbortSignal
  ): Promise<Result<TransferRun, NegotiationError>> {
    const manifest = files.manifest(this._device)
    const negotiated = await negotiate(peer, manifest, {
      signal,
      timeoutMs: this.options.settings.decisionTimeoutMs + NEGOTIATION_GRACE_MS
    })
    if (!negotiated.ok) return negotiated

    return ok(this.executor.run(negotiated.value, files))
  }
}
