import { faker } from '@faker-js/faker';
import type { HashFunction } from '../src/index.js';

/**
 * Generate a random key for lookups
 * @param prefix Optional prefix for the key
 */
export function generateKey(prefix?: string): string {
  const base = faker.string.alphanumeric(16);
  return prefix ? `${prefix}-${base}` : base;
}

/**
 * Text a ring hashes to place replica `replica` of `node`
 */
export function vnodeLabel(node: string, replica: number): string {
  return `${node}\0${replica}`;
}

/**
 * Hash function answering from a fixed table, keyed by the UTF-8 text of the
 * input. Throws for anything not in the table so a test cannot pass by accident.
 */
export function stubHash(positions: ReadonlyMap<string, number>): HashFunction {
  return (input) => {
    const text = Buffer.from(input).toString('utf8');
    const position = positions.get(text);
    if (position === undefined) {
      throw new Error(`stub hash has no position for ${JSON.stringify(text)}`);
    }
    return position;
  };
}

/**
 * Runs `fn` and returns what it threw
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

export { faker };
