/**
 * vnode-ring: statically built consistent hashing ring with virtual nodes
 * @module vnode-ring
 */

import type { RingKey } from './hash.js';
import { HashRing, type HashRingOptions, type NodeId, type NodeInput } from './ring.js';

export { HashRing, DEFAULT_REPLICAS, MAX_NODE_ID_LENGTH } from './ring.js';
export type { HashRingOptions, NodeId, NodeInput, NodeSpec, VirtualNode } from './ring.js';
export { murmur32, hashFunctionForBuiltin, resolveHashFunction, toBytes } from './hash.js';
export type { HashFunction, RingKey } from './hash.js';
export { HashRingError, BuildError, LookupError } from './errors.js';
export type { BuildErrorCode, LookupErrorCode } from './errors.js';

/**
 * Builds a ring placing `replicas` virtual nodes for each node.
 * @throws {BuildError} when `nodes` is empty or `replicas` is not a positive integer
 */
export function build(
  nodes: ReadonlyArray<NodeInput>,
  replicas: number,
  options: Omit<HashRingOptions, 'replicas'> = {}
): HashRing {
  return HashRing.build(nodes, { ...options, replicas });
}

/**
 * Gets the node owning `key` on `ring`.
 * @throws {LookupError} when the ring is empty
 */
export function lookup(ring: HashRing, key: RingKey): NodeId {
  return ring.lookup(key);
}
