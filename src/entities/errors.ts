/**
 * Merkleization error types
 *
 * All errors are tagged with Schema.TaggedError for exhaustive handling.
 * Every error here is recoverable at the call site; broken internal
 * invariants are thrown instead.
 *
 * @since 0.1.0
 */

import { Schema } from "effect";

/**
 * The byte-producing collaborator failed before chunks could be packed
 *
 * @category Error
 * @since 0.1.0
 */
export class SerializationError extends Schema.TaggedError<SerializationError>()(
  "SerializationError",
  {
    message: Schema.String,
    cause: Schema.optional(Schema.Unknown),
  }
) {}

/**
 * A buffer meant to hold chunks is not a multiple of 32 bytes long
 *
 * @category Error
 * @since 0.1.0
 */
export class PartialChunkError extends Schema.TaggedError<PartialChunkError>()(
  "PartialChunkError",
  {
    message: Schema.String,
    length: Schema.Int,
  }
) {}

/**
 * More chunks (or elements) than the declared capacity allows
 *
 * @category Error
 * @since 0.1.0
 */
export class InputExceedsLimitError extends Schema.TaggedError<InputExceedsLimitError>()(
  "InputExceedsLimitError",
  {
    message: Schema.String,
    limit: Schema.BigIntFromSelf,
    count: Schema.Int,
  }
) {}

export class InvalidBranchError extends Schema.TaggedError<InvalidBranchError>()(
  "InvalidBranchError",
  {
    message: Schema.String,
    depth: Schema.Int,
    length: Schema.Int,
  }
) {}

export class InvalidProofError extends Schema.TaggedError<InvalidProofError>()(
  "InvalidProofError",
  {
    message: Schema.String,
    expected: Schema.String,
    actual: Schema.String,
  }
) {}

export class IndexOutOfBoundsError extends Schema.TaggedError<IndexOutOfBoundsError>()(
  "IndexOutOfBoundsError",
  {
    message: Schema.String,
    index: Schema.Int,
    size: Schema.Int,
  }
) {}

export type MerkleizationError =
  | SerializationError
  | PartialChunkError
  | InputExceedsLimitError;
