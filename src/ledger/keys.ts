import { p256 } from '@noble/curves/p256';
import { sha256Bytes } from './canonical.js';

/**
 * ECDSA key material over NIST P-256.
 *
 * At the wire boundary keys and signatures travel as base64 of their raw
 * bytes: a 32-byte private scalar, a 64-byte public key (X || Y, no SEC1
 * prefix) and a 64-byte signature (r || s). A node's address is its encoded
 * public key.
 */

export interface WalletKeyPair {
  privateKey: Uint8Array;
  publicKey: Uint8Array;
}

const RAW_PUBLIC_KEY_LENGTH = 64;
const UNCOMPRESSED_PREFIX = 0x04;

export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64');
}

export function decodeBase64(text: string): Uint8Array {
  if (!/^[A-Za-z0-9+/]*={0,2}$/.test(text) || text.length % 4 !== 0) {
    throw new Error('Value is not valid base64');
  }
  return new Uint8Array(Buffer.from(text, 'base64'));
}

function toRawPublicKey(sec1: Uint8Array): Uint8Array {
  return sec1.slice(1);
}

function toSec1PublicKey(raw: Uint8Array): Uint8Array {
  if (raw.length !== RAW_PUBLIC_KEY_LENGTH) {
    throw new Error(`Public key must be ${RAW_PUBLIC_KEY_LENGTH} bytes, got ${raw.length}`);
  }
  const sec1 = new Uint8Array(RAW_PUBLIC_KEY_LENGTH + 1);
  sec1[0] = UNCOMPRESSED_PREFIX;
  sec1.set(raw, 1);
  return sec1;
}

export function derivePublicKey(privateKey: Uint8Array): Uint8Array {
  return toRawPublicKey(p256.getPublicKey(privateKey, false));
}

export function generateKeyPair(): WalletKeyPair {
  const privateKey = p256.utils.randomPrivateKey();
  return { privateKey, publicKey: derivePublicKey(privateKey) };
}

/**
 * Rebuild a key pair from its base64 form. The public key is derived when it
 * is not supplied and must match the private key when it is.
 */
export function keyPairFromBase64(privateKey: string, publicKey?: string): WalletKeyPair {
  const privateBytes = decodeBase64(privateKey);
  if (!p256.utils.isValidPrivateKey(privateBytes)) {
    throw new Error('Private key is not a valid P-256 scalar');
  }
  const derived = derivePublicKey(privateBytes);
  if (publicKey && encodeBase64(derived) !== publicKey) {
    throw new Error('Public key does not match the private key');
  }
  return { privateKey: privateBytes, publicKey: derived };
}

export function addressOf(publicKey: Uint8Array): string {
  return encodeBase64(publicKey);
}

/** Sign `message` (hashed with SHA-256) and return the raw r || s signature. */
export function signMessage(message: string, privateKey: Uint8Array): Uint8Array {
  return p256.sign(sha256Bytes(message), privateKey).toCompactRawBytes();
}

/**
 * Check a raw r || s signature over `message`. Malformed keys or signatures
 * are reported as a failed verification.
 */
export function verifyMessage(message: string, signature: Uint8Array, publicKey: Uint8Array): boolean {
  try {
    const parsed = p256.Signature.fromCompact(signature);
    return p256.verify(parsed, sha256Bytes(message), toSec1PublicKey(publicKey));
  } catch {
    return false;
  }
}
