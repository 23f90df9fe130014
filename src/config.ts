import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import { isRecord, isValidPort } from './protocol/schema.js'
import { DEFAULT_HTTP_PORT, DEFAULT_MULTICAST, DEFAULT_PORT } from './protocol/types.js'

export interface Config {
  alias?: string
  deviceModel?: string
  port?: number               // multicast port
  httpPort?: number
  multicastAddress?: string
  https?: boolean
  destination?: string
  quickSave?: boolean
  overwrite?: boolean
  concurrency?: number
  decisionTimeoutMs?: number
  sessionTimeoutMs?: number
  announceIntervalMs?: number
  livenessMs?: number
}

export type Settings = Required<Config>

export interface ConfigValidationError {
  field: string
  message: string
}

export type Env = Record<string, string | undefined>

const CONFIG_FILE = 'config.json'

export const DEFAULT_SETTINGS: Omit<Settings, 'alias' | 'deviceModel'> = {
  port: DEFAULT_PORT,
  httpPort: DEFAULT_HTTP_PORT,
  multicastAddress: DEFAULT_MULTICAST,
  https: false,
  destination: '.',
  quickSave: false,
  overwrite: false,
  concurrency: 4,
  decisionTimeoutMs: 60_000,
  sessionTimeoutMs: 300_000,
  announceIntervalMs: 5_000,
  livenessMs: 10_000
}

export function getConfigDir(env: Env = process.env): string {
  return env['LANSEND_HOME'] || path.join(os.homedir(), '.lansend')
}

export function getConfigPath(env: Env = process.env): string {
  return path.join(getConfigDir(env), CONFIG_FILE)
}

export function ensureConfigDir(dir = getConfigDir()): void {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true })
  }
}

// --- Field validators ---

export function validateAlias(alias: unknown): string | null {
  if (typeof alias !== 'string') return 'Alias must be a string'
  if (alias.trim().length === 0) return 'Alias cannot be empty'
  if (alias.length > 64) return 'Alias must be 64 characters or less'
  return null
}

export function validateMulticastAddress(address: unknown): string | null {
  if (typeof address !== 'string') return 'Multicast address must be a string'
  const match = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/.exec(address)
  if (!match) return 'Multicast address must be an IPv4 dotted quad'
  const octets = match.slice(1).map(Number)
  if (octets.some(o => o > 255)) return 'Multicast address octets must be 0-255'
  const first = octets[0] ?? 0
  if (first < 224 || first > 239) return 'Multicast address must be in 224.0.0.0/4'
  return null
}

function validatePort(value: unknown, label: string): string | null {
  if (typeof value !== 'number') return `${label} must be a number`
  if (!isValidPort(value)) return `${label} must be an integer between 1 and 65535`
  return null
}

function validateInt(value: unknown, label: string, min: number, max = Number.MAX_SAFE_INTEGER): string | null {
  if (typeof value !== 'number') return `${label} must be a number`
  if (!Number.isInteger(value) || value < min || value > max) {
    return max === Number.MAX_SAFE_INTEGER
      ? `${label} must be an integer of at least ${min}`
      : `${label} must be an integer between ${min} and ${max}`
  }
  return null
}

function validateBoolean(value: unknown, label: string): string | null {
  return typeof value === 'boolean' ? null : `${label} must be a boolean`
}

const FIELD_VALIDATORS: Record<keyof Config, (value: unknown) => string | null> = {
  alias: validateAlias,
  deviceModel: v => typeof v === 'string' && v.length > 0 ? null : 'Device model must be a non-empty string',
  port: v => validatePort(v, 'Port'),
  httpPort: v => validatePort(v, 'HTTP port'),
  multicastAddress: validateMulticastAddress,
  https: v => validateBoolean(v, 'https'),
  destination: v => typeof v === 'string' && v.length > 0 ? null : 'Destination must be a non-empty string',
  quickSave: v => validateBoolean(v, 'quickSave'),
  overwrite: v => validateBoolean(v, 'overwrite'),
  concurrency: v => validateInt(v, 'Concurrency', 1, 32),
  decisionTimeoutMs: v => validateInt(v, 'Decision timeout', 1000),
  sessionTimeoutMs: v => validateInt(v, 'Session timeout', 1000),
  announceIntervalMs: v => validateInt(v, 'Announce interval', 100),
  livenessMs: v => validateInt(v, 'Liveness window', 1000)
}

export const CONFIG_KEYS = Object.keys(FIELD_VALIDATORS)

export function validateConfig(config: unknown): ConfigValidationError[] {
  const errors: ConfigValidationError[] = []

  if (!isRecord(config)) {
    errors.push({ field: 'config', message: 'Config must be an object' })
    return errors
  }

  for (const [field, validate] of Object.entries(FIELD_VALIDATORS)) {
    const value = config[field]
    if (value === undefined) continue
    const message = validate(value)
    if (message) errors.push({ field, message })
  }

  return errors
}

function valid(field: keyof Config, value: unknown): boolean {
  return value !== undefined && FIELD_VALIDATORS[field](value) === null
}

// Copies the individually valid fields; unknown keys are dropped
function pickValid(c: Record<string, unknown>): Config {
  const config: Config = {}
  const { alias, deviceModel, port, httpPort, multicastAddress, https, destination, quickSave, overwrite } = c
  const { concurrency, decisionTimeoutMs, sessionTimeoutMs, announceIntervalMs, livenessMs } = c

  if (typeof alias === 'string' && valid('alias', alias)) config.alias = alias
  if (typeof deviceModel === 'string' && valid('deviceModel', deviceModel)) config.deviceModel = deviceModel
  if (typeof port === 'number' && valid('port', port)) config.port = port
  if (typeof httpPort === 'number' && valid('httpPort', httpPort)) config.httpPort = httpPort
  if (typeof multicastAddress === 'string' && valid('multicastAddress', multicastAddress)) {
    config.multicastAddress = multicastAddress
  }
  if (typeof https === 'boolean') config.https = https
  if (typeof destination === 'string' && valid('destination', destination)) config.destination = destination
  if (typeof quickSave === 'boolean') config.quickSave = quickSave
  if (typeof overwrite === 'boolean') config.overwrite = overwrite
  if (typeof concurrency === 'number' && valid('concurrency', concurrency)) config.concurrency = concurrency
  if (typeof decisionTimeoutMs === 'number' && valid('decisionTimeoutMs', decisionTimeoutMs)) {
    config.decisionTimeoutMs = decisionTimeoutMs
  }
  if (typeof sessionTimeoutMs === 'number' && valid('sessionTimeoutMs', sessionTimeoutMs)) {
    config.sessionTimeoutMs = sessionTimeoutMs
  }
  if (typeof announceIntervalMs === 'number' && valid('announceIntervalMs', announceIntervalMs)) {
    config.announceIntervalMs = announceIntervalMs
  }
  if (typeof livenessMs === 'number' && valid('livenessMs', livenessMs)) config.livenessMs = livenessMs

  return config
}

export function loadConfig(file = getConfigPath()): Config {
  try {
    if (!fs.existsSync(file)) return {}

    const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf8'))
    if (!isRecord(parsed)) {
      console.error(`Config in ${file} must be a JSON object, using defaults.`)
      return {}
    }

    const errors = validateConfig(parsed)
    if (errors.length > 0) {
      console.error(`Config validation errors in ${file}:`)
      for (const err of errors) {
        console.error(`  - ${err.field}: ${err.message}`)
      }
      console.error('Using default values for invalid fields.')
    }
    return pickValid(parsed)
  } catch (err) {
    if (err instanceof SyntaxError) {
      console.error(`Invalid JSON in config file ${file}:`, err.message)
    } else {
      console.error('Failed to load config:', err)
    }
  }
  return {}
}

export function saveConfig(config: Config, file = getConfigPath()): boolean {
  const errors = validateConfig(config)
  if (errors.length > 0) {
    console.error('Cannot save invalid config:')
    for (const err of errors) {
      console.error(`  - ${err.field}: ${err.message}`)
    }
    return false
  }

  try {
    ensureConfigDir(path.dirname(file))
    fs.writeFileSync(file, JSON.stringify(config, null, 2))
    return true
  } catch (err) {
    console.error('Failed to save config:', err)
    return false
  }
}

// --- Settings ---

export function defaultAlias(): string {
  const host = os.hostname()
  return host.length > 0 && host.length <= 64 ? host : 'Desktop CLI'
}

export function defaultDeviceModel(): string {
  switch (os.platform()) {
    case 'linux': return 'Linux'
    case 'darwin': return 'macOS'
    case 'win32': return 'Windows'
    default: return os.type()
  }
}

function parseBooleanEnv(value: string): boolean | null {
  switch (value.trim().toLowerCase()) {
    case '1': case 'true': case 'yes': case 'on': return true
    case '0': case 'false': case 'no': case 'off': return false
    default: return null
  }
}

function parseIntEnv(value: string): number | null {
  if (!/^\d+$/.test(value.trim())) return null
  return Number(value.trim())
}

function warnEnv(name: string, message: string): void {
  console.error(`Ignoring ${name}: ${message}`)
}

export function resolveSettings(config: Config = {}, env: Env = process.env): Settings {
  const settings: Settings = {
    ...DEFAULT_SETTINGS,
    alias: defaultAlias(),
    deviceModel: defaultDeviceModel(),
    ...pickValid({ ...config })
  }

  const alias = env['LANSEND_ALIAS']
  if (alias !== undefined) {
    const error = validateAlias(alias)
    if (error) warnEnv('LANSEND_ALIAS', error)
    else settings.alias = alias
  }

  const ports: [string, 'port' | 'httpPort'][] = [['LANSEND_PORT', 'port'], ['LANSEND_HTTP_PORT', 'httpPort']]
  for (const [name, field] of ports) {
    const raw = env[name]
    if (raw === undefined) continue
    const port = parseIntEnv(raw)
    if (port === null || !isValidPort(port)) warnEnv(name, 'must be an integer between 1 and 65535')
    else settings[field] = port
  }

  const multicast = env['LANSEND_MULTIADDR']
  if (multicast !== undefined) {
    const error = validateMulticastAddress(multicast)
    if (error) warnEnv('LANSEND_MULTIADDR', error)
    else settings.multicastAddress = multicast
  }

  const destination = env['LANSEND_DESTINATION']
  if (destination !== undefined) {
    if (destination.length === 0) warnEnv('LANSEND_DESTINATION', 'cannot be empty')
    else settings.destination = destination
  }

  const flags: [string, 'https' | 'quickSave'][] = [['LANSEND_HTTPS', 'https'], ['LANSEND_QUICK_SAVE', 'quickSave']]
  for (const [name, field] of flags) {
    const raw = env[name]
    if (raw === undefined) continue
    const flag = parseBooleanEnv(raw)
    if (flag === null) warnEnv(name, 'must be true or false')
    else settings[field] = flag
  }

  return settings
}
