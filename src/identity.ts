import fs from 'node:fs'
import path from 'node:path'
import { X509Certificate, generateKeyPairSync } from 'node:crypto'
import forge from 'node-forge'
import { getConfigDir, ensureConfigDir } from './config.js'
import { generateId, hashHex, shortId, errorMessage } from './utils.js'

export interface CertificateMaterial {
  keyPem: string
  certPem: string
}

const KEY_FILE = 'key.pem'
const CERT_FILE = 'cert.pem'
const VALIDITY_YEARS = 10

export function getIdentityDir(): string {
  return path.join(getConfigDir(), 'identity')
}

export function validateFingerprint(fingerprint: string): string | null {
  if (!fingerprint) return 'Fingerprint is required'
  if (!/^[a-f0-9]{64}$/i.test(fingerprint)) {
    return 'Fingerprint must be 64 hexadecimal characters'
  }
  return null
}

/**
 * Fingerprint of a certificate (PEM or DER): BLAKE2b-256 of its
 * SubjectPublicKeyInfo, lowercase hex. Re-issuing a certificate for the
 * same key keeps the fingerprint.
 */
export function fingerprintOf(certificate: Buffer | string): string {
  const spki = new X509Certificate(certificate).publicKey.export({ type: 'spki', format: 'der' })
  return hashHex(spki)
}

/** True when the certificate presented on a connection belongs to the announced fingerprint. */
export function verifyFingerprint(peerFingerprint: string, certificateDer: Buffer): boolean {
  try {
    return fingerprintOf(certificateDer) === peerFingerprint.toLowerCase()
  } catch {
    return false
  }
}

export function generateCertificate(commonName = generateId()): CertificateMaterial {
  const { publicKey, privateKey } = generateKeyPairSync('rsa', {
    modulusLength: 2048,
    publicKeyEncoding: { type: 'spki', format: 'pem' },
    privateKeyEncoding: { type: 'pkcs8', format: 'pem' }
  })

  const cert = forge.pki.createCertificate()
  cert.publicKey = forge.pki.publicKeyFromPem(publicKey)
  cert.serialNumber = `01${generateId().slice(0, 16)}`
  cert.validity.notBefore = new Date()
  cert.validity.notAfter = new Date()
  cert.validity.notAfter.setFullYear(cert.validity.notBefore.getFullYear() + VALIDITY_YEARS)

  const attrs = [{ name: 'commonName', value: commonName }]
  cert.setSubject(attrs)
  cert.setIssuer(attrs)
  cert.sign(forge.pki.privateKeyFromPem(privateKey), forge.md.sha256.create())

  return { keyPem: privateKey, certPem: forge.pki.certificateToPem(cert) }
}

export class IdentityProvider {
  readonly keyPem: string
  readonly certPem: string
  private readonly ownFingerprint: string

  constructor(material: CertificateMaterial) {
    this.keyPem = material.keyPem
    this.certPem = material.certPem
    this.ownFingerprint = fingerprintOf(material.certPem)
  }

  fingerprint(): string {
    return this.ownFingerprint
  }

  verify(peerFingerprint: string, certificateDer: Buffer): boolean {
    return verifyFingerprint(peerFingerprint, certificateDer)
  }
}

export function saveIdentity(material: CertificateMaterial, dir = getIdentityDir()): void {
  ensureConfigDir(dir)
  const keyPath = path.join(dir, KEY_FILE)
  fs.writeFileSync(keyPath, material.keyPem)
  fs.chmodSync(keyPath, 0o600)
  fs.writeFileSync(path.join(dir, CERT_FILE), material.certPem)
}

export function loadIdentity(dir = getIdentityDir()): IdentityProvider {
  const keyPath = path.join(dir, KEY_FILE)
  const certPath = path.join(dir, CERT_FILE)

  if (fs.existsSync(keyPath) && fs.existsSync(certPath)) {
    try {
      return new IdentityProvider({
        keyPem: fs.readFileSync(keyPath, 'utf8'),
        certPem: fs.readFileSync(certPath, 'utf8')
      })
    } catch (err) {
      console.error(`Unreadable identity in ${dir} (${errorMessage(err)}), generating a new one`)
    }
  }

  const material = generateCertificate()
  try {
    saveIdentity(material, dir)
  } catch (err) {
    console.error('Failed to save identity:', errorMessage(err))
  }

  const identity = new IdentityProvider(material)
  console.log(`Generated new identity ${shortId(identity.fingerprint())}`)
  return identity
}
