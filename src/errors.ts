/**
 * Reasons a ring cannot be built
 */
export type BuildErrorCode =
  | 'EMPTY_NODE_LIST'
  | 'INVALID_REPLICA_COUNT'
  | 'INVALID_NODE_ID'
  | 'UNKNOWN_HASH_ALGORITHM';

/**
 * Reasons a lookup cannot be answered
 */
export type LookupErrorCode = 'EMPTY_RING';

/**
 * Base class of every error thrown by the ring
 */
export class HashRingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Thrown by `HashRing.build()` when its input is rejected. No ring is produced.
 */
export class BuildError extends HashRingError {
  readonly code: BuildErrorCode;

  constructor(code: BuildErrorCode, message: string) {
    super(message);
    this.code = code;
  }
}

/**
 * Thrown by `HashRing.lookup()` when no node can own the key
 */
export class LookupError extends HashRingError {
  readonly code: LookupErrorCode;

  constructor(code: LookupErrorCode, message: string) {
    super(message);
    this.code = code;
  }
}
