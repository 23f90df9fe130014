export const PROTOCOL_VERSION = '2.0'
export const FALLBACK_PROTOCOL_VERSION = '1.0'

export const DEFAULT_MULTICAST = '224.0.0.167'
export const DEFAULT_PORT = 53317
export const DEFAULT_HTTP_PORT = DEFAULT_PORT + 1

export const DEVICE_TYPES = ['mobile', 'desktop', 'web', 'headless', 'server'] as const
export type DeviceType = typeof DEVICE_TYPES[number]

export type ProtocolType = 'http' | 'https'

export interface DeviceInfo {
  alias: string
  fingerprint: string
  deviceModel: string | null
  deviceType: DeviceType
  version: string        // major.minor
  port: number           // HTTP(S) port of the peer's server
  https: boolean
  download: boolean
}

export interface Announcement extends DeviceInfo {
  announce: boolean      // false for a unicast reply
}

/** A device plus the address its announcement came from. */
export interface Peer extends DeviceInfo {
  address: string
}

export interface FileMetadata {
  id: string
  fileName: string       // may contain '/'-separated relative directories
  size: number
  fileType: string       // MIME type
  sha256?: string
  preview?: string
}

export interface TransferManifest {
  info: DeviceInfo
  files: Record<string, FileMetadata>
}

export interface SessionResponse {
  sessionId: string
  files: Record<string, string>  // fileId -> token
}

// --- Wire shapes ---

export interface WireDevice {
  alias: string
  version: string
  deviceModel: string | null
  deviceType: DeviceType
  fingerprint: string
  port: number
  protocol: ProtocolType
  download: boolean
}

export interface WireAnnouncement extends WireDevice {
  announce: boolean
}

export interface PrepareUploadRequest {
  info: WireDevice
  files: Record<string, FileMetadata>
}
