import { type Result, ok, fail } from '../errors.js'
import {
  DEVICE_TYPES,
  FALLBACK_PROTOCOL_VERSION,
  type Announcement,
  type DeviceInfo,
  type DeviceType,
  type FileMetadata,
  type PrepareUploadRequest,
  type SessionResponse,
  type TransferManifest,
  type WireAnnouncement,
  type WireDevice
} from './types.js'

// Values taken from our own settings when a peer omits them (v1 peers do)
export interface DeviceFallback {
  port: number
  https: boolean
}

const SHA256_PATTERN = /^[a-f0-9]{64}$/i

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isDeviceType(value: unknown): value is DeviceType {
  return DEVICE_TYPES.some(type => type === value)
}

export function isValidPort(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= 65535
}

export function toWireDevice(info: DeviceInfo): WireDevice {
  return {
    alias: info.alias,
    version: info.version,
    deviceModel: info.deviceModel,
    deviceType: info.deviceType,
    fingerprint: info.fingerprint,
    port: info.port,
    protocol: info.https ? 'https' : 'http',
    download: info.download
  }
}

export function parseDevice(value: unknown, fallback: DeviceFallback): Result<DeviceInfo, string> {
  if (!isRecord(value)) return fail('Device info must be an object')

  const { alias, fingerprint, version, deviceModel, deviceType, port, protocol, download } = value

  if (typeof alias !== 'string') return fail('Missing required field: alias')
  if (typeof fingerprint !== 'string' || fingerprint.length === 0) {
    return fail('Missing required field: fingerprint')
  }
  if (version != null && typeof version !== 'string') return fail('version must be a string')
  if (deviceModel != null && typeof deviceModel !== 'string') return fail('deviceModel must be a string')
  if (port != null && !isValidPort(port)) return fail('port must be an integer between 1 and 65535')
  if (protocol != null && protocol !== 'http' && protocol !== 'https') {
    return fail('protocol must be "http" or "https"')
  }
  if (download != null && typeof download !== 'boolean') return fail('download must be a boolean')

  return ok({
    alias,
    fingerprint,
    deviceModel: deviceModel ?? null,
    deviceType: isDeviceType(deviceType) ? deviceType : 'desktop',
    version: version ?? FALLBACK_PROTOCOL_VERSION,
    port: port ?? fallback.port,
    https: protocol == null ? fallback.https : protocol === 'https',
    download: download ?? false
  })
}

// --- Announcements ---

export function encodeAnnouncement(announcement: Announcement): string {
  const wire: WireAnnouncement = {
    ...toWireDevice(announcement),
    announce: announcement.announce
  }
  return JSON.stringify(wire)
}

export function parseAnnouncement(data: string | Buffer, fallback: DeviceFallback): Result<Announcement, string> {
  let raw: unknown
  try {
    raw = JSON.parse(typeof data === 'string' ? data : data.toString('utf8'))
  } catch {
    return fail('Announcement is not valid JSON')
  }

  const device = parseDevice(raw, fallback)
  if (!device.ok) return device
  if (!isRecord(raw)) return fail('Announcement must be an object')

  // v1 peers send `announcement`, v2 peers send `announce`
  const flag = raw['announce'] ?? raw['announcement']
  if (flag != null && typeof flag !== 'boolean') return fail('announce must be a boolean')

  return ok({ ...device.value, announce: flag ?? false })
}

// --- Files ---

export function validateFileName(name: string): string | null {
  if (name.length === 0) return 'File name cannot be empty'
  if (name.includes('\0')) return 'File name contains a NUL byte'
  if (name.startsWith('/') || name.startsWith('\\') || /^[a-zA-Z]:/.test(name)) {
    return 'File name must be relative'
  }
  const segments = name.split(/[\\/]/)
  if (segments.some(s => s === '..')) return 'File name must not contain ".." segments'
  if (segments.every(s => s === '' || s === '.')) return 'File name has no usable segment'
  return null
}

export function parseFileMetadata(id: string, value: unknown): Result<FileMetadata, string> {
  if (!isRecord(value)) return fail(`File ${id} must be an object`)

  const { fileName, size, fileType, sha256, preview } = value

  if (value['id'] !== id) return fail(`File id does not match its key: ${id}`)
  if (typeof fileName !== 'string') return fail(`File ${id}: missing fileName`)
  const nameError = validateFileName(fileName)
  if (nameError) return fail(`File ${id}: ${nameError}`)
  if (typeof size !== 'number' || !Number.isSafeInteger(size) || size <= 0) {
    return fail(`File ${id}: size must be a positive integer`)
  }
  if (typeof fileType !== 'string' || fileType.length === 0) return fail(`File ${id}: missing fileType`)
  if (sha256 != null && (typeof sha256 !== 'string' || !SHA256_PATTERN.test(sha256))) {
    return fail(`File ${id}: sha256 must be 64 hexadecimal characters`)
  }
  if (preview != null && typeof preview !== 'string') return fail(`File ${id}: preview must be a string`)

  const file: FileMetadata = { id, fileName, size, fileType }
  if (typeof sha256 === 'string') file.sha256 = sha256.toLowerCase()
  if (typeof preview === 'string') file.preview = preview
  return ok(file)
}

// --- prepare-upload ---

export function encodePrepareUploadRequest(manifest: TransferManifest): PrepareUploadRequest {
  return {
    info: toWireDevice(manifest.info),
    files: manifest.files
  }
}

export function parsePrepareUploadRequest(value: unknown, fallback: DeviceFallback): Result<TransferManifest, string> {
  if (!isRecord(value)) return fail('Request body must be an object')

  const info = parseDevice(value['info'], fallback)
  if (!info.ok) return fail(`info: ${info.error}`)

  const rawFiles = value['files']
  if (!isRecord(rawFiles)) return fail('Missing required field: files')

  // fromEntries keeps a peer's "__proto__" id as a plain key
  const files: [string, FileMetadata][] = []
  for (const [id, rawFile] of Object.entries(rawFiles)) {
    const file = parseFileMetadata(id, rawFile)
    if (!file.ok) return file
    files.push([id, file.value])
  }

  return ok({ info: info.value, files: Object.fromEntries(files) })
}

export function parseSessionResponse(value: unknown): Result<SessionResponse, string> {
  if (!isRecord(value)) return fail('Response body must be an object')

  const { sessionId, files } = value
  if (typeof sessionId !== 'string' || sessionId.length === 0) return fail('Missing required field: sessionId')
  if (!isRecord(files)) return fail('Missing required field: files')

  const tokens: [string, string][] = []
  for (const [fileId, token] of Object.entries(files)) {
    if (typeof token !== 'string' || token.length === 0) return fail(`Token for ${fileId} must be a string`)
    tokens.push([fileId, token])
  }

  return ok({ sessionId, files: Object.fromEntries(tokens) })
}
