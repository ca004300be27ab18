/**
 * SSH key pair generation
 *
 * Private keys are PKCS#8 PEM; public keys are OpenSSH `authorized_keys` lines
 * assembled from the JWK export of the public key.
 */

import { generateKeyPair, type KeyObject } from 'node:crypto'
import { promisify } from 'node:util'
import type { EllipticCurve, SSHKeyOptions } from '../domain/types.js'
import type { SSHKeyMaterial } from '../gateway/types.js'
import { VaultsmithError } from './errors.js'

const generateKeyPairAsync = promisify(generateKeyPair)

export const DEFAULT_RSA_BITS = 4096

const OPENSSH_CURVES: Record<EllipticCurve, string> = {
  prime256v1: 'nistp256',
  secp384r1: 'nistp384',
  secp521r1: 'nistp521'
}

// SSH wire encoding (RFC 4251): uint32 length prefix + bytes
function sshString(data: Buffer | string): Buffer {
  const bytes = typeof data === 'string' ? Buffer.from(data, 'utf8') : data
  const length = Buffer.alloc(4)
  length.writeUInt32BE(bytes.length)
  return Buffer.concat([length, bytes])
}

function sshMpint(data: Buffer): Buffer {
  let start = 0
  while (start < data.length - 1 && data[start] === 0) start++
  let bytes = data.subarray(start)
  if (bytes[0] & 0x80) {
    bytes = Buffer.concat([Buffer.from([0]), bytes])
  }
  return sshString(bytes)
}

function jwkField(value: string | undefined, name: string): Buffer {
  if (!value) {
    throw new VaultsmithError(`Public key export is missing JWK field "${name}"`, 'SSH_KEYGEN_FAILED')
  }
  return Buffer.from(value, 'base64url')
}

function exportPrivateKey(key: KeyObject): string {
  const pem = key.export({ type: 'pkcs8', format: 'pem' })
  return typeof pem === 'string' ? pem : pem.toString('utf8')
}

function publicKeyBlob(key: KeyObject, options: SSHKeyOptions): { algorithm: string; blob: Buffer } {
  const jwk = key.export({ format: 'jwk' })

  switch (options.type) {
    case 'rsa': {
      const algorithm = 'ssh-rsa'
      return {
        algorithm,
        blob: Buffer.concat([sshString(algorithm), sshMpint(jwkField(jwk.e, 'e')), sshMpint(jwkField(jwk.n, 'n'))])
      }
    }
    case 'ec': {
      const curve = OPENSSH_CURVES[options.curve]
      const algorithm = `ecdsa-sha2-${curve}`
      const point = Buffer.concat([Buffer.from([0x04]), jwkField(jwk.x, 'x'), jwkField(jwk.y, 'y')])
      return { algorithm, blob: Buffer.concat([sshString(algorithm), sshString(curve), sshString(point)]) }
    }
    case 'ed25519': {
      const algorithm = 'ssh-ed25519'
      return { algorithm, blob: Buffer.concat([sshString(algorithm), sshString(jwkField(jwk.x, 'x'))]) }
    }
  }
}

/**
 * Render a public key in OpenSSH format
 */
export function toOpenSSHPublicKey(key: KeyObject, options: SSHKeyOptions): string {
  const { algorithm, blob } = publicKeyBlob(key, options)
  return `${algorithm} ${blob.toString('base64')}`
}

async function generate(options: SSHKeyOptions): Promise<{ publicKey: KeyObject; privateKey: KeyObject }> {
  switch (options.type) {
    case 'rsa':
      return generateKeyPairAsync('rsa', { modulusLength: options.bits ?? DEFAULT_RSA_BITS })
    case 'ec':
      return generateKeyPairAsync('ec', { namedCurve: options.curve })
    case 'ed25519':
      return generateKeyPairAsync('ed25519')
  }
}

export async function generateSSHKey(options: SSHKeyOptions): Promise<SSHKeyMaterial> {
  const { publicKey, privateKey } = await generate(options)
  return {
    privateKey: exportPrivateKey(privateKey),
    publicKey: toOpenSSHPublicKey(publicKey, options)
  }
}
