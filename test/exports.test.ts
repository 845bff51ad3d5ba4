import { describe, expect, test } from 'vitest';
import * as ring from '../src/index.js';
import { BuildError, HashRingError, LookupError } from '../src/index.js';

describe('exports', () => {
  test('exposes the ring, the functional API and the hash adapters', () => {
    expect(typeof ring.HashRing.build).toBe('function');
    expect(typeof ring.build).toBe('function');
    expect(typeof ring.lookup).toBe('function');
    expect(typeof ring.murmur32).toBe('function');
    expect(typeof ring.hashFunctionForBuiltin).toBe('function');
    expect(ring.DEFAULT_REPLICAS).toBe(150);
    expect(ring.MAX_NODE_ID_LENGTH).toBe(1000);
  });

  test('errors share a base class and carry their code', () => {
    const buildError = new BuildError('EMPTY_NODE_LIST', 'Node list cannot be empty');
    const lookupError = new LookupError('EMPTY_RING', 'empty');

    expect(buildError).toBeInstanceOf(HashRingError);
    expect(buildError).toBeInstanceOf(Error);
    expect(buildError.name).toBe('BuildError');
    expect(buildError.code).toBe('EMPTY_NODE_LIST');
    expect(buildError.message).toBe('Node list cannot be empty');

    expect(lookupError).toBeInstanceOf(HashRingError);
    expect(lookupError.name).toBe('LookupError');
    expect(lookupError.code).toBe('EMPTY_RING');
  });
});
