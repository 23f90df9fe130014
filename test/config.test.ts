import { test, describe, beforeEach, afterEach } from 'node:test'
import assert from 'node:assert/strict'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import {
  validateAlias,
  validateMulticastAddress,
  validateConfig,
  loadConfig,
  saveConfig,
  resolveSettings,
  getConfigDir,
  getConfigPath,
  DEFAULT_SETTINGS,
  CONFIG_KEYS
} from '../src/config.js'

describe('validateAlias', () => {
  test('accepts a normal alias', () => {
    assert.equal(validateAlias('Living Room PC'), null)
  })

  test('rejects blank aliases', () => {
    assert.equal(validateAlias('   '), 'Alias cannot be empty')
  })

  test('rejects long aliases', () => {
    assert.equal(validateAlias('x'.repeat(65)), 'Alias must be 64 characters or less')
  })

  test('rejects non-strings', () => {
    assert.equal(validateAlias(5), 'Alias must be a string')
  })
})

describe('validateMulticastAddress', () => {
  test('accepts the default group', () => {
    assert.equal(validateMulticastAddress('224.0.0.167'), null)
  })

  test('rejects unicast addresses', () => {
    assert.equal(validateMulticastAddress('192.168.1.1'), 'Multicast address must be in 224.0.0.0/4')
  })

  test('rejects bad octets', () => {
    assert.equal(validateMulticastAddress('224.0.0.300'), 'Multicast address octets must be 0-255')
  })

  test('rejects non-addresses', () => {
    assert.equal(validateMulticastAddress('localhost'), 'Multicast address must be an IPv4 dotted quad')
  })
})

describe('validateConfig', () => {
  test('empty config is valid', () => {
    assert.deepEqual(validateConfig({}), [])
  })

  test('reports each bad field', () => {
    assert.deepEqual(validateConfig({ port: 0, https: 'yes', concurrency: 100 }), [
      { field: 'port', message: 'Port must be an integer between 1 and 65535' },
      { field: 'https', message: 'https must be a boolean' },
      { field: 'concurrency', message: 'Concurrency must be an integer between 1 and 32' }
    ])
  })

  test('rejects non-objects', () => {
    assert.deepEqual(validateConfig('x'), [{ field: 'config', message: 'Config must be an object' }])
  })

  test('ignores unknown keys', () => {
    assert.deepEqual(validateConfig({ color: 'blue' }), [])
  })

  test('every default is valid', () => {
    assert.deepEqual(validateConfig(DEFAULT_SETTINGS), [])
  })

  test('lists the known keys', () => {
    assert.ok(CONFIG_KEYS.includes('quickSave'))
    assert.ok(!CONFIG_KEYS.includes('color'))
  })
})

describe('config file', () => {
  let tmpDir: string
  let file: string

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'lansend-config-'))
    file = path.join(tmpDir, 'config.json')
  })

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true })
  })

  test('missing file gives empty config', () => {
    assert.deepEqual(loadConfig(file), {})
  })

  test('save then load', () => {
    assert.equal(saveConfig({ alias: 'Desk', quickSave: true }, file), true)
    assert.deepEqual(loadConfig(file), { alias: 'Desk', quickSave: true })
  })

  test('save creates the directory', () => {
    const nested = path.join(tmpDir, 'a', 'b', 'config.json')
    assert.equal(saveConfig({ port: 5000 }, nested), true)
    assert.ok(fs.existsSync(nested))
  })

  test('refuses to save invalid config', () => {
    assert.equal(saveConfig({ port: 70000 }, file), false)
    assert.equal(fs.existsSync(file), false)
  })

  test('keeps valid fields when others are invalid', () => {
    fs.writeFileSync(file, JSON.stringify({ alias: 'Desk', port: 'nope', httpPort: 6000, extra: 1 }))
    assert.deepEqual(loadConfig(file), { alias: 'Desk', httpPort: 6000 })
  })

  test('invalid JSON gives empty config', () => {
    fs.writeFileSync(file, '{ alias: ')
    assert.deepEqual(loadConfig(file), {})
  })

  test('non-object JSON gives empty config', () => {
    fs.writeFileSync(file, '[1, 2]')
    assert.deepEqual(loadConfig(file), {})
  })
})

describe('config paths', () => {
  test('LANSEND_HOME overrides the directory', () => {
    assert.equal(getConfigDir({ LANSEND_HOME: '/tmp/ls' }), '/tmp/ls')
    assert.equal(getConfigPath({ LANSEND_HOME: '/tmp/ls' }), path.join('/tmp/ls', 'config.json'))
  })

  test('defaults to a directory under home', () => {
    assert.equal(getConfigDir({}), path.join(os.homedir(), '.lansend'))
  })
})

describe('resolveSettings', () => {
  test('applies defaults', () => {
    const settings = resolveSettings({ alias: 'Desk' }, {})
    assert.equal(settings.alias, 'Desk')
    assert.equal(settings.port, 53317)
    assert.equal(settings.httpPort, 53318)
    assert.equal(settings.multicastAddress, '224.0.0.167')
    assert.equal(settings.https, false)
    assert.equal(settings.destination, '.')
    assert.equal(settings.concurrency, 4)
  })

  test('drops invalid config fields', () => {
    const settings = resolveSettings({ alias: 'Desk', httpPort: 0 }, {})
    assert.equal(settings.httpPort, 53318)
  })

  test('environment overrides config', () => {
    const settings = resolveSettings({ alias: 'Desk', port: 5000 }, {
      LANSEND_ALIAS: 'Laptop',
      LANSEND_PORT: '6000',
      LANSEND_HTTP_PORT: '6001',
      LANSEND_MULTIADDR: '239.1.2.3',
      LANSEND_DESTINATION: '/srv/in',
      LANSEND_HTTPS: 'yes',
      LANSEND_QUICK_SAVE: '1'
    })
    assert.equal(settings.alias, 'Laptop')
    assert.equal(settings.port, 6000)
    assert.equal(settings.httpPort, 6001)
    assert.equal(settings.multicastAddress, '239.1.2.3')
    assert.equal(settings.destination, '/srv/in')
    assert.equal(settings.https, true)
    assert.equal(settings.quickSave, true)
  })

  test('ignores invalid environment values', () => {
    const settings = resolveSettings({ alias: 'Desk', https: true }, {
      LANSEND_ALIAS: ' ',
      LANSEND_PORT: '99999',
      LANSEND_MULTIADDR: '10.0.0.1',
      LANSEND_HTTPS: 'maybe'
    })
    assert.equal(settings.alias, 'Desk')
    assert.equal(settings.port, 53317)
    assert.equal(settings.multicastAddress, '224.0.0.167')
    assert.equal(settings.https, true)
  })

  test('false-like environment values disable flags', () => {
    const settings = resolveSettings({ alias: 'Desk', quickSave: true }, { LANSEND_QUICK_SAVE: 'off' })
    assert.equal(settings.quickSave, false)
  })
})
