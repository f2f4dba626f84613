/**
 * Error types for collection operations
 *
 * Invariants:
 * - Every error aborts the operation in progress; nothing in the library catches and continues
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all collection errors
 */
export abstract class CollectionError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when stored bytes cannot be decoded or a container's two halves disagree
 */
export class InconsistentStateError extends CollectionError {
  readonly code = "E_INCONSISTENT_STATE";

  constructor(detail: string, options?: ErrorOptions) {
    super(`Inconsistent collection state: ${detail}`, options);
  }
}

/**
 * Thrown when an index-addressed mutation targets a slot outside the container
 */
export class IndexOutOfBoundsError extends CollectionError {
  readonly code = "E_INDEX_OUT_OF_BOUNDS";

  constructor(
    public readonly index: number,
    public readonly length: number,
    options?: ErrorOptions
  ) {
    super(`Index out of bounds: ${index} (length ${length})`, options);
  }
}

/**
 * Thrown by a storage backend that cannot satisfy a read or write
 */
export class StorageExhaustedError extends CollectionError {
  readonly code = "E_RESOURCE_EXHAUSTED";

  constructor(detail: string, options?: ErrorOptions) {
    super(`Storage exhausted: ${detail}`, options);
  }
}

/**
 * Thrown by a codec on malformed input or a value it cannot encode
 */
export class CodecError extends CollectionError {
  readonly code = "E_CODEC";

  constructor(detail: string, options?: ErrorOptions) {
    super(`Codec failure: ${detail}`, options);
  }
}

/**
 * Thrown when a Lazy cell is read but nothing was ever stored under its key
 */
export class MissingValueError extends CollectionError {
  readonly code = "E_MISSING_VALUE";

  constructor(storageKeyHex: string, options?: ErrorOptions) {
    super(`No value found for storage key 0x${storageKeyHex}`, options);
  }
}

/**
 * Thrown when a closed store is used
 */
export class StoreClosedError extends CollectionError {
  readonly code = "E_STORE_CLOSED";

  constructor(options?: ErrorOptions) {
    super("Store is closed", options);
  }
}

/**
 * Thrown for invalid store options or environment configuration
 */
export class ConfigError extends CollectionError {
  readonly code = "E_CONFIG";

  constructor(detail: string, options?: ErrorOptions) {
    super(`Invalid configuration: ${detail}`, options);
  }
}
