/**
 * SHA3-256 Hashing Utilities
 * @module utils/hash
 */

import sha3 from 'js-sha3';
const { sha3_256 } = sha3;

/**
 * SHA3-256 of a string, 64 hex characters
 */
export function hashText(text: string): string {
  return sha3_256(text);
}

/**
 * Digest of an activation snapshot.
 *
 * Keys are taken in the snapshot's own order and values are written with
 * full precision, so two runs hash equal only if every activation is
 * bit-identical.
 */
export function snapshotDigest(activations: Readonly<Record<string, number>>): string {
  const lines = Object.entries(activations).map(([id, value]) => `${id}=${value.toString()}`);
  return sha3_256(lines.join('\n'));
}

/**
 * Short form for display
 */
export function shortDigest(digest: string, length: number = 12): string {
  return digest.slice(0, length);
}

export function isValidDigest(str: string): boolean {
  return /^[a-f0-9]{64}$/i.test(str);
}
