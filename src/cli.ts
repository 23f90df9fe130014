import type { Config } from './config.js'

export interface ParsedArgs {
  command: string | undefined
  positional: string[]
  flags: Record<string, string | true>
}

// --flag, --flag value, --flag=value
export function parseArgs(argv: string[]): ParsedArgs {
  const BOOLEAN_FLAGS = new Set(['quick-save', 'https', 'overwrite', 'help'])
  const positional: string[] = []
  const flags: Record<string, string | true> = {}

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? ''
    if (arg === '--') {
      positional.push(...argv.slice(i + 1))
      break
    }
    if (arg === '-h') {
      flags['help'] = true
    } else if (arg.startsWith('--')) {
      const eqIdx = arg.indexOf('=')
      if (eqIdx > 0) {
        flags[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1)
      } else {
        const name = arg.slice(2)
        const next = argv[i + 1]
        if (!BOOLEAN_FLAGS.has(name) && next !== undefined && !next.startsWith('--')) {
          flags[name] = next
          i++
        } else {
          flags[name] = true
        }
      }
    } else {
      positional.push(arg)
    }
  }

  return { command: positional.shift(), positional, flags }
}

/** Applies command-line flags on top of config and environment. */
export function applyFlags(config: Config, flags: ParsedArgs['flags']): Config {
  const merged: Config = { ...config }
  const str = (name: string): string | undefined => {
    const value = flags[name]
    return typeof value === 'string' ? value : undefined
  }
  const int = (name: string): number | undefined => {
    const value = str(name)
    return value !== undefined && /^\d+$/.test(value) ? Number(value) : undefined
  }

  const alias = str('alias')
  if (alias !== undefined) merged.alias = alias
  const port = int('port')
  if (port !== undefined) merged.port = port
  const httpPort = int('http-port')
  if (httpPort !== undefined) merged.httpPort = httpPort
  const multiaddr = str('multiaddr')
  if (multiaddr !== undefined) merged.multicastAddress = multiaddr
  const dest = str('dest')
  if (dest !== undefined) merged.destination = dest
  if (flags['https'] === true) merged.https = true
  if (flags['quick-save'] === true) merged.quickSave = true
  if (flags['overwrite'] === true) merged.overwrite = true
  return merged
}
