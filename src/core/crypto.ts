/**
 * Cryptographic utilities for the claim registry.
 * Uses @noble/ed25519 for call signatures and blakejs for hashing.
 */

import * as ed from '@noble/ed25519';
import blake from 'blakejs';
import canonicalizeJson from 'canonicalize';
import { sha512 } from '@noble/hashes/sha2.js';
import type { Keypair, Principal } from './types.js';

// ed25519 v2 requires setting the sha512 hash
ed.etc.sha512Sync = (...m: Uint8Array[]) => {
  const h = sha512.create();
  for (const msg of m) h.update(msg);
  return h.digest();
};

const HEX_RE = /^(?:0x)?(?:[0-9a-fA-F]{2})*$/;

/** Base64url encode (no padding) */
export function toBase64url(bytes: Uint8Array): string {
  let binary = '';
  for (let i = 0; i < bytes.length; i++) {
    binary += String.fromCharCode(bytes[i]);
  }
  return btoa(binary).replace(/\+/g, '-').replace(/\//g, '_').replace(/=+$/, '');
}

/** Base64url decode */
export function fromBase64url(str: string): Uint8Array {
  const padded = str.replace(/-/g, '+').replace(/_/g, '/');
  const binary = atob(padded);
  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i);
  }
  return bytes;
}

/** Lowercase hex, no prefix */
export function toHex(bytes: Uint8Array): string {
  let out = '';
  for (const b of bytes) out += b.toString(16).padStart(2, '0');
  return out;
}

/** Parse hex with an optional 0x prefix. Throws on odd length or non-hex digits. */
export function fromHex(hex: string): Uint8Array {
  if (!isHex(hex)) {
    throw new Error(`Invalid hex string: ${hex.length > 16 ? hex.slice(0, 16) + '…' : hex}`);
  }
  const digits = hex.startsWith('0x') ? hex.slice(2) : hex;
  const bytes = new Uint8Array(digits.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(digits.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

export function isHex(value: string): boolean {
  return HEX_RE.test(value);
}

const PUBLIC_KEY_ID_RE = /^[A-Za-z0-9_-]{43}$/;

/**
 * True when `id` is the one base64url spelling of a 32-byte public key: no padding,
 * and no stray bits in the last character. Each key has exactly one such id.
 */
export function isCanonicalKeyId(id: string): boolean {
  if (!PUBLIC_KEY_ID_RE.test(id)) return false;
  return toBase64url(fromBase64url(id)) === id;
}

/** Generate an Ed25519 keypair */
export function generateKeypair(name?: string): Keypair {
  const privateKey = ed.utils.randomPrivateKey();
  const publicKey = ed.getPublicKey(privateKey);
  const principal: Principal = {
    id: toBase64url(publicKey),
    ...(name ? { name } : {}),
  };
  return { principal, privateKey };
}

/** Sign a message with Ed25519 */
export function sign(privateKey: Uint8Array, message: Uint8Array): Uint8Array {
  return ed.sign(message, privateKey);
}

/** Verify an Ed25519 signature. Malformed keys or signatures verify as false. */
export function verify(publicKey: Uint8Array, message: Uint8Array, signature: Uint8Array): boolean {
  try {
    return ed.verify(signature, message, publicKey);
  } catch {
    return false;
  }
}

/** BLAKE2b-256 hash */
export function blake2b256(data: Uint8Array): Uint8Array {
  return blake.blake2b(data, undefined, 32);
}

/** BLAKE2b-128 hash */
export function blake2b128(data: Uint8Array): Uint8Array {
  return blake.blake2b(data, undefined, 16);
}

/**
 * Storage key for a fingerprint: 16-byte BLAKE2b hash followed by the raw bytes.
 * Two keys are equal exactly when the fingerprints are byte-for-byte equal.
 */
export function blake2128Concat(data: Uint8Array): Uint8Array {
  const key = new Uint8Array(16 + data.length);
  key.set(blake2b128(data), 0);
  key.set(data, 16);
  return key;
}

/** Canonical JSON (RFC 8785) */
export function canonicalize(obj: unknown): string {
  const result = canonicalizeJson(obj);
  if (result === undefined) {
    throw new Error('Failed to canonicalize object');
  }
  return result;
}

/** Sign a canonical JSON object: canonicalize → BLAKE2b → Ed25519 sign */
export function signObject(privateKey: Uint8Array, obj: unknown): string {
  const payload = new TextEncoder().encode(canonicalize(obj));
  const sig = sign(privateKey, blake2b256(payload));
  return toBase64url(sig);
}

/** Verify signature over a canonical JSON object */
export function verifyObjectSignature(publicKeyB64: string, obj: unknown, signatureB64: string): boolean {
  let publicKey: Uint8Array;
  let signature: Uint8Array;
  try {
    publicKey = fromBase64url(publicKeyB64);
    signature = fromBase64url(signatureB64);
  } catch {
    return false;
  }
  const payload = new TextEncoder().encode(canonicalize(obj));
  return verify(publicKey, blake2b256(payload), signature);
}
