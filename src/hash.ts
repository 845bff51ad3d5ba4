import { createHash, getHashes } from 'node:crypto';
import murmurHash from 'murmur-hash';
import { BuildError } from './errors.js';

/**
 * Function that returns an unsigned 32-bit hash of the input bytes.
 * Must be pure: the same bytes always give the same value.
 */
export type HashFunction = (input: Uint8Array) => number;

/**
 * Keys accepted by lookups. Strings are hashed as their UTF-8 bytes.
 */
export type RingKey = string | Uint8Array;

/**
 * Converts a key to the bytes that get hashed
 */
export function toBytes(key: RingKey): Uint8Array {
  return typeof key === 'string' ? Buffer.from(key, 'utf8') : key;
}

/**
 * Default hash: murmur3 x86 32-bit, seed 0. Each byte is handed to murmur as
 * one latin1 character, so the digest covers the exact bytes.
 */
export const murmur32: HashFunction = (input) =>
  murmurHash.v3.x86.hash32(
    Buffer.from(input.buffer, input.byteOffset, input.byteLength).toString('latin1'),
    0
  ) >>> 0;

/**
 * Creates a hash function using a built-in Node.js crypto algorithm.
 * @param algorithm - The name of the hashing algorithm (e.g., "sha1", "md5")
 * @returns A HashFunction reading the first four digest bytes
 * @throws {BuildError} UNKNOWN_HASH_ALGORITHM when node:crypto has no such algorithm
 */
export function hashFunctionForBuiltin(algorithm: string): HashFunction {
  const wanted = algorithm.toLowerCase();
  if (!getHashes().some((name) => name.toLowerCase() === wanted)) {
    throw new BuildError('UNKNOWN_HASH_ALGORITHM', `Unknown hash algorithm: ${algorithm}`);
  }
  return (input) => createHash(algorithm).update(input).digest().readUInt32BE(0);
}

/**
 * Maps the `hash` option to a function; undefined selects murmur32
 */
export function resolveHashFunction(hash?: HashFunction | string): HashFunction {
  if (hash === undefined) {
    return murmur32;
  }
  return typeof hash === 'string' ? hashFunctionForBuiltin(hash) : hash;
}
