import { BuildError, LookupError } from './errors.js';
import { resolveHashFunction, toBytes, type HashFunction, type RingKey } from './hash.js';

/**
 * Identifier of a real node, e.g. "cache-1" or "10.0.0.4:11211"
 */
export type NodeId = string;

/**
 * A node with its own replica count, overriding the ring default
 */
export interface NodeSpec {
  id: NodeId;
  replicas?: number;
}

export type NodeInput = NodeId | NodeSpec;

/**
 * One position of a real node on the ring
 */
export interface VirtualNode {
  /** Unsigned 32-bit position in the keyspace */
  readonly hash: number;
  /** The real node owning this position */
  readonly node: NodeId;
  /** Replica index within the owning node, from 0 */
  readonly replica: number;
}

/**
 * Configuration options for HashRing
 */
export interface HashRingOptions {
  /**
   * Number of virtual nodes per real node, unless the node sets its own
   * More replicas = better distribution but more memory
   * @default 150
   */
  replicas?: number;

  /**
   * Hash function, or the name of a node:crypto algorithm such as "sha1"
   * @default murmur3 (32-bit)
   */
  hash?: HashFunction | string;
}

export const DEFAULT_REPLICAS = 150;
export const MAX_NODE_ID_LENGTH = 1000;

/**
 * HashRing - a consistent hashing ring built once from a fixed node list.
 *
 * Each node is hashed into the 32-bit keyspace at `replicas` positions. A key
 * belongs to the first position at or after its own hash, wrapping around to
 * the lowest position. Positions with equal hashes are ordered by node id and
 * then replica index, so the same inputs always produce the same ring.
 *
 * Instances are immutable; to change membership build a new ring.
 *
 * @example
 * ```typescript
 * const ring = HashRing.build(['cache-1', 'cache-2', 'cache-3'], { replicas: 200 });
 * ring.lookup('user:123'); // e.g. 'cache-2', on every call
 * ring.lookupN('user:123', 2); // e.g. ['cache-2', 'cache-1']
 * ```
 */
export class HashRing {
  private readonly hashFn: HashFunction;
  private readonly replicas: number;
  private readonly owners: ReadonlyMap<NodeId, number>;
  private readonly ring: readonly VirtualNode[];

  private constructor(
    hashFn: HashFunction,
    replicas: number,
    owners: ReadonlyMap<NodeId, number>,
    ring: readonly VirtualNode[]
  ) {
    this.hashFn = hashFn;
    this.replicas = replicas;
    this.owners = owners;
    this.ring = ring;
  }

  /**
   * Builds a ring from a non-empty node list. A repeated node id is ignored
   * after its first occurrence, replica override included.
   * @throws {BuildError} EMPTY_NODE_LIST, INVALID_REPLICA_COUNT, INVALID_NODE_ID
   * or UNKNOWN_HASH_ALGORITHM
   */
  static build(nodes: ReadonlyArray<NodeInput>, options: HashRingOptions = {}): HashRing {
    if (nodes.length === 0) {
      throw new BuildError('EMPTY_NODE_LIST', 'Node list cannot be empty');
    }

    const replicas = options.replicas ?? DEFAULT_REPLICAS;
    assertReplicaCount(replicas);
    const hashFn = resolveHashFunction(options.hash);

    const owners = new Map<NodeId, number>();
    for (const input of nodes) {
      const id = typeof input === 'string' ? input : input.id;
      const count = typeof input === 'string' ? replicas : (input.replicas ?? replicas);
      assertNodeId(id);
      if (owners.has(id)) {
        continue;
      }
      assertReplicaCount(count);
      owners.set(id, count);
    }

    const ring: VirtualNode[] = [];
    for (const [node, count] of owners) {
      for (let replica = 0; replica < count; replica++) {
        const hash = hashFn(toBytes(`${node}\0${replica}`)) >>> 0;
        ring.push(Object.freeze({ hash, node, replica }));
      }
    }
    ring.sort(compareVirtualNodes);

    return new HashRing(hashFn, replicas, owners, Object.freeze(ring));
  }

  /**
   * A ring without nodes. Every lookup on it fails with EMPTY_RING.
   */
  static empty(options: HashRingOptions = {}): HashRing {
    const replicas = options.replicas ?? DEFAULT_REPLICAS;
    assertReplicaCount(replicas);
    return new HashRing(resolveHashFunction(options.hash), replicas, new Map(), Object.freeze([]));
  }

  /**
   * Number of virtual nodes on the ring
   */
  get size(): number {
    return this.ring.length;
  }

  /**
   * Real node ids in the order they were given
   */
  get nodes(): NodeId[] {
    return Array.from(this.owners.keys());
  }

  /**
   * All positions, sorted ascending by (hash, node, replica)
   */
  get virtualNodes(): readonly VirtualNode[] {
    return this.ring;
  }

  has(node: NodeId): boolean {
    return this.owners.has(node);
  }

  /**
   * Number of virtual nodes owned by `node`, 0 when it is not on the ring
   */
  replicasOf(node: NodeId): number {
    return this.owners.get(node) ?? 0;
  }

  /**
   * Gets the node owning `key`.
   * @throws {LookupError} EMPTY_RING when the ring has no nodes
   */
  lookup(key: RingKey): NodeId {
    const node = this.tryLookup(key);
    if (node === undefined) {
      throw new LookupError('EMPTY_RING', 'Cannot look up a key in an empty ring');
    }
    return node;
  }

  /**
   * Like `lookup()`, but returns undefined for an empty ring
   */
  tryLookup(key: RingKey): NodeId | undefined {
    if (this.ring.length === 0) {
      return undefined;
    }
    return this.ring[this.successorIndex(key)].node;
  }

  /**
   * Yields every distinct node once, in ring order starting from the owner
   * of `key`. The first value is the same node `lookup(key)` returns; the
   * ones after it are the fallbacks for replication or failover.
   */
  *candidates(key: RingKey): Generator<NodeId, void, undefined> {
    if (this.ring.length === 0) {
      return;
    }

    const seen = new Set<NodeId>();
    const start = this.successorIndex(key);
    for (let offset = 0; offset < this.ring.length && seen.size < this.owners.size; offset++) {
      const { node } = this.ring[(start + offset) % this.ring.length];
      if (!seen.has(node)) {
        seen.add(node);
        yield node;
      }
    }
  }

  /**
   * Gets up to `count` distinct nodes for `key`, owner first
   */
  lookupN(key: RingKey, count: number): NodeId[] {
    const chosen: NodeId[] = [];
    if (count <= 0) {
      return chosen;
    }

    for (const node of this.candidates(key)) {
      chosen.push(node);
      if (chosen.length >= count) {
        break;
      }
    }
    return chosen;
  }

  toString(): string {
    return `HashRing(nodes=${this.owners.size}, positions=${this.ring.length}, replicas=${this.replicas})`;
  }

  private successorIndex(key: RingKey): number {
    const hash = this.hashFn(toBytes(key)) >>> 0;
    const index = binarySearchRing(this.ring, hash);
    return index === this.ring.length ? 0 : index;
  }
}

function assertReplicaCount(replicas: number): void {
  if (!Number.isInteger(replicas) || replicas < 1) {
    throw new BuildError(
      'INVALID_REPLICA_COUNT',
      `Replica count must be a positive integer, got ${replicas}`
    );
  }
}

function assertNodeId(id: NodeId): void {
  if (id.length === 0) {
    throw new BuildError('INVALID_NODE_ID', 'Node identifier cannot be empty');
  }
  if (id.length > MAX_NODE_ID_LENGTH) {
    throw new BuildError(
      'INVALID_NODE_ID',
      `Node identifier exceeds maximum length of ${MAX_NODE_ID_LENGTH} characters`
    );
  }
}

function compareVirtualNodes(a: VirtualNode, b: VirtualNode): number {
  if (a.hash !== b.hash) {
    return a.hash - b.hash;
  }
  if (a.node !== b.node) {
    return a.node < b.node ? -1 : 1;
  }
  return a.replica - b.replica;
}

/**
 * Index of the first virtual node whose hash is >= `hash`, or the ring
 * length when every position is lower.
 */
function binarySearchRing(ring: readonly VirtualNode[], hash: number): number {
  let lo = 0;
  let hi = ring.length - 1;

  while (lo <= hi) {
    const mid = (lo + hi) >>> 1;
    if (ring[mid].hash >= hash) {
      hi = mid - 1;
    } else {
      lo = mid + 1;
    }
  }

  return lo;
}
