import type { DeviceInfo, Peer } from '../protocol/types.js'

export interface RegistryEntry extends Peer {
  lastSeen: number
}

export type UpsertResult = 'added' | 'updated' | 'refreshed' | 'revived'

export interface DeviceRegistryOptions {
  livenessMs?: number
  now?: () => number
}

// Stale entries stay visible to get()/all() until this many liveness windows pass
const EVICT_AFTER_WINDOWS = 3

export class DeviceRegistry {
  readonly livenessMs: number
  private now: () => number
  private entries: Map<string, RegistryEntry> = new Map()  // fingerprint -> entry

  constructor(options: DeviceRegistryOptions = {}) {
    this.livenessMs = options.livenessMs ?? 10_000
    this.now = options.now ?? Date.now
  }

  get size(): number {
    return this.entries.size
  }

  upsert(info: DeviceInfo, address: string): UpsertResult {
    const existing = this.entries.get(info.fingerprint)
    const entry: RegistryEntry = { ...info, address, lastSeen: this.now() }
    this.entries.set(info.fingerprint, entry)

    if (!existing) return 'added'
    if (this.isStale(existing)) return 'revived'
    return sameDevice(existing, entry) ? 'refreshed' : 'updated'
  }

  get(fingerprint: string): RegistryEntry | undefined {
    return this.entries.get(fingerprint)
  }

  isStale(entry: RegistryEntry): boolean {
    return this.now() - entry.lastSeen > this.livenessMs
  }

  active(): RegistryEntry[] {
    return this.all().filter(e => !this.isStale(e))
  }

  all(): RegistryEntry[] {
    return Array.from(this.entries.values())
  }

  /**
   * Finds a live device by exact fingerprint, alias (case-insensitive) or
   * unambiguous fingerprint prefix.
   */
  find(query: string): RegistryEntry | undefined {
    const live = this.active()
    const lower = query.toLowerCase()

    const byFingerprint = live.find(e => e.fingerprint.toLowerCase() === lower)
    if (byFingerprint) return byFingerprint

    const byAlias = live.filter(e => e.alias.toLowerCase() === lower)
    if (byAlias.length === 1) return byAlias[0]

    const byPrefix = live.filter(e => e.fingerprint.toLowerCase().startsWith(lower))
    return byPrefix.length === 1 ? byPrefix[0] : undefined
  }

  /** Evicts entries stale for several liveness windows, returning their fingerprints. */
  prune(): string[] {
    const cutoff = this.now() - this.livenessMs * EVICT_AFTER_WINDOWS
    const evicted: string[] = []
    for (const [fingerprint, entry] of this.entries) {
      if (entry.lastSeen < cutoff) {
        this.entries.delete(fingerprint)
        evicted.push(fingerprint)
      }
    }
    return evicted
  }

  clear(): void {
    this.entries.clear()
  }
}

function sameDevice(a: RegistryEntry, b: RegistryEntry): boolean {
  return a.alias === b.alias &&
    a.address === b.address &&
    a.deviceModel === b.deviceModel &&
    a.deviceType === b.deviceType &&
    a.version === b.version &&
    a.port === b.port &&
    a.https === b.https &&
    a.download === b.download
}
