#!/usr/bin/env node
import fs from 'node:fs'
import path from 'node:path'
import {
  loadConfig,
  saveConfig,
  getConfigPath,
  resolveSettings,
  validateConfig,
  CONFIG_KEYS,
  type Config,
  type Settings
} from './config.js'
import { applyFlags, parseArgs } from './cli.js'
import { LanSendDaemon } from './daemon.js'
import type { RegistryEntry } from './discovery/registry.js'
import { loadIdentity } from './identity.js'
import type { SessionOutcome, TransferEvent } from './send/executor.js'
import { SendingFiles } from './send/files.js'
import { formatSize, shortId, errorMessage } from './utils.js'

const DEFAULT_SCAN_MS = 3_000
const PEER_WAIT_MS = 5_000

function printUsage(): void {
  console.log(`
lansend - LAN file transfer (LocalSend v2 protocol)

Usage:
  lansend <command> [options]

Commands:
  receive                  Run as a receiver until interrupted
  send <input...>          Send files, directories or text (inputs that are not paths are sent as text)
  scan [--time <ms>]       List devices on the network
  config                   Show current configuration
  config set <key> <value> Store a setting in the config file
  help                     Show this help message

Options:
  --alias <name>           Device name shown to peers
  --port <port>            Discovery (multicast) port (default: 53317)
  --http-port <port>       Receiver port (default: 53318)
  --multiaddr <ip>         Multicast group (default: 224.0.0.167)
  --https                  Serve and verify over HTTPS
  --dest <dir>             receive: where files are saved (default: .)
  --quick-save             receive: accept every file without asking
  --overwrite              receive: replace existing files instead of renaming
  --to <device>            send: alias or fingerprint prefix of the receiver

Environment Variables:
  LANSEND_HOME, LANSEND_ALIAS, LANSEND_PORT, LANSEND_HTTP_PORT,
  LANSEND_MULTIADDR, LANSEND_DESTINATION, LANSEND_HTTPS, LANSEND_QUICK_SAVE

Config: ${getConfigPath()}
`)
}

function createDaemon(settings: Settings, serve = true): LanSendDaemon {
  return new LanSendDaemon({ settings, identity: loadIdentity(), serve })
}

function printDevices(devices: RegistryEntry[]): void {
  if (devices.length === 0) {
    console.log('No devices found.')
    return
  }
  console.log(`Devices: ${devices.length}`)
  for (const d of devices) {
    const model = d.deviceModel ? ` ${d.deviceModel}` : ''
    console.log(`  ${d.alias} (${d.deviceType}${model}) ${d.address}:${d.port} ${d.https ? 'https' : 'http'} [${shortId(d.fingerprint)}]`)
  }
}

async function receive(settings: Settings): Promise<void> {
  const daemon = createDaemon(settings)
  await daemon.start()
  console.log(`Saving to ${daemon.storage.destination}${settings.quickSave ? ' (quick save)' : ''}`)
  console.log('Ready. Waiting for transfers...')

  let shuttingDown = false
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return
    shuttingDown = true
    console.log('')
    console.log('Shutting down...')
    await daemon.stop()
    process.exit(0)
  }

  const onSignal = (): void => {
    shutdown().catch((err: unknown) => {
      console.error('Error during shutdown:', errorMessage(err))
      process.exit(1)
    })
  }
  process.on('SIGINT', onSignal)
  process.on('SIGTERM', onSignal)
}

async function collectInputs(inputs: string[]): Promise<SendingFiles> {
  const files = new SendingFiles()
  for (const input of Array.from(new Set(inputs))) {
    const resolved = path.resolve(input)
    const stat = fs.existsSync(resolved) ? fs.statSync(resolved) : null
    if (stat?.isFile()) {
      await files.addFile(resolved)
    } else if (stat?.isDirectory()) {
      await files.addDirectory(resolved)
    } else {
      files.addText(input)
    }
  }
  return files
}

function logEvent(event: TransferEvent, files: SendingFiles, reported: Map<string, number>): void {
  const name = files.get(event.fileId)?.fileName ?? event.fileId
  switch (event.type) {
    case 'progress': {
      // Log every quarter rather than every chunk
      const quarter = Math.floor((event.bytesTransferred / event.bytesTotal) * 4)
      if (quarter > (reported.get(event.fileId) ?? 0) && quarter < 4) {
        reported.set(event.fileId, quarter)
        console.log(`  ${name}: ${quarter * 25}% (${formatSize(event.bytesTransferred)})`)
      }
      break
    }
    case 'completed':
      console.log(`  ${name}: done`)
      break
    case 'failed':
      console.error(`  ${name}: failed (${event.error.message})`)
      break
    case 'cancelled':
      console.log(`  ${name}: cancelled`)
      break
    case 'rejected':
      console.log(`  ${name}: skipped by receiver`)
      break
  }
}

async function send(settings: Settings, inputs: string[], to: string | undefined): Promise<number> {
  if (inputs.length === 0) {
    console.error('Error: nothing to send')
    console.error('Usage: lansend send [--to <device>] <file|dir|text>...')
    return 1
  }

  const files = await collectInputs(inputs)
  if (files.size === 0) {
    console.error('Error: nothing to send (all files empty)')
    return 1
  }

  const daemon = createDaemon(settings)
  await daemon.start()

  const controller = new AbortController()
  let cancelRun: (() => void) | null = null
  const onSignal = (): void => {
    console.log('\nCancelling...')
    controller.abort()
    cancelRun?.()
  }
  process.on('SIGINT', onSignal)

  try {
    console.log(to ? `Looking for ${to}...` : 'Looking for devices...')
    const peer = await daemon.waitForPeer(to, PEER_WAIT_MS)
    if (!peer) {
      console.error(to ? `Error: device "${to}" not found` : 'Error: no devices found')
      printDevices(daemon.registry.active())
      return 1
    }

    const total = files.list().reduce((sum, f) => sum + f.size, 0)
    console.log(`Sending ${files.size} file(s), ${formatSize(total)} to ${peer.alias} (${peer.address})`)

    const started = await daemon.send(peer, files, controller.signal)
    if (!started.ok) {
      console.error(`Error: ${started.error.message}`)
      return 1
    }

    const run = started.value
    cancelRun = run.cancel
    const reported = new Map<string, number>()
    for await (const event of run.events) {
      logEvent(event, files, reported)
    }

    const outcome: SessionOutcome = await run.done
    console.log(`Transfer ${outcome.status}`)
    return outcome.status === 'completed' ? 0 : 1
  } finally {
    process.off('SIGINT', onSignal)
    await daemon.stop()
  }
}

async function scan(settings: Settings, durationMs: number): Promise<void> {
  const daemon = createDaemon(settings, false)
  await daemon.start()
  try {
    printDevices(await daemon.scan(durationMs))
  } finally {
    await daemon.stop()
  }
}

function showConfig(config: Config, settings: Settings): void {
  console.log('Current configuration:')
  console.log(`  Config file: ${getConfigPath()}`)
  const errors = validateConfig(config)
  console.log(`  Stored: ${Object.keys(config).length > 0 ? JSON.stringify(config) : '(empty)'}${errors.length > 0 ? ' (invalid)' : ''}`)
  console.log('')
  console.log('Effective settings:')
  for (const [key, value] of Object.entries(settings)) {
    console.log(`  ${key}: ${String(value)}`)
  }
}

function setConfig(config: Config, key: string | undefined, value: string | undefined): number {
  if (!key || value === undefined) {
    console.error('Usage: lansend config set <key> <value>')
    return 1
  }
  if (!CONFIG_KEYS.includes(key)) {
    console.error(`Error: unknown key "${key}" (one of: ${CONFIG_KEYS.join(', ')})`)
    return 1
  }
  // Typed readings first, the raw string last
  const candidates: unknown[] = [value]
  if (value === 'true' || value === 'false') candidates.unshift(value === 'true')
  else if (/^\d+$/.test(value)) candidates.unshift(Number(value))
  const parsed = candidates.find(c => validateConfig({ [key]: c }).length === 0) ?? candidates[0]

  const next = { ...config, [key]: parsed }
  const errors = validateConfig(next)
  if (errors.length > 0) {
    for (const err of errors) console.error(`Error: ${err.field}: ${err.message}`)
    return 1
  }
  if (!saveConfig(next)) return 1
  console.log(`Set ${key} = ${value}`)
  return 0
}

async function main(): Promise<void> {
  const { command, positional, flags } = parseArgs(process.argv.slice(2))

  if (!command || flags['help'] === true) {
    printUsage()
    process.exit(0)
  }

  const config = loadConfig()
  const settings = resolveSettings(applyFlags(config, flags))

  switch (command) {
    case 'receive':
      await receive(settings)
      break

    case 'send': {
      const to = flags['to']
      const code = await send(settings, positional, typeof to === 'string' ? to : undefined)
      process.exit(code)
    }

    case 'scan': {
      const time = flags['time']
      const duration = typeof time === 'string' && /^\d+$/.test(time) ? Number(time) : DEFAULT_SCAN_MS
      await scan(settings, duration)
      break
    }

    case 'config':
      if (positional[0] === 'set') {
        process.exit(setConfig(config, positional[1], positional[2]))
      }
      showConfig(config, settings)
      break

    case 'help':
      printUsage()
      break

    default:
      console.error(`Unknown command: ${command}`)
      console.error('Run "lansend help" for usage.')
      process.exit(1)
  }
}

main().catch((err) => {
  console.error('Fatal error:', err)
  process.exit(1)
})
