import { createHash } from 'crypto';

/**
 * Canonical (order-independent) encoding used for every consensus hash and
 * signature in the ledger.
 *
 * Mappings become lists of `[key, value]` pairs sorted by key, sequences keep
 * their order and scalars pass through. The result is rendered with JSON, so
 * two mappings holding the same pairs always encode to the same string no
 * matter in which order their keys were inserted.
 */

export type CanonicalScalar = string | number | boolean | null;
export type CanonicalValue = CanonicalScalar | CanonicalValue[];

// Anything the encoder accepts: JSON-like values, including interfaces such as
// the ledger records, which carry no index signature.
export type Encodable = CanonicalScalar | undefined | readonly Encodable[] | object;

function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function canonicalize(value: Encodable): CanonicalValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new TypeError(`Cannot canonicalize non-finite number ${value}`);
    }
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item: Encodable) => canonicalize(item));
  }
  return Object.keys(value)
    .sort(compareKeys)
    .map((key): CanonicalValue => [key, canonicalize(Reflect.get(value, key))]);
}

export function encodeCanonical(value: Encodable): string {
  return JSON.stringify(canonicalize(value));
}

export function sha256Hex(data: string | Uint8Array): string {
  return createHash('sha256').update(data).digest('hex');
}

export function sha256Bytes(data: string | Uint8Array): Uint8Array {
  return new Uint8Array(createHash('sha256').update(data).digest());
}
