import { Context, Either, Layer } from "effect";
import * as Chunks from "../../entities/chunks";
import type { SerializationError } from "../../entities/errors";
import { BYTES_PER_CHUNK } from "../../entities/node";

// ============================================================================
// CAPABILITY: CHUNK PACKER
// ============================================================================

/**
 * Byte-producing collaborator: the serialization of one value
 */
export type Serializer<A> = (
  value: A
) => Either.Either<Uint8Array, SerializationError>;

/**
 * Packer capability — turns serialized values into the leaf layer
 */
export class Packer extends Context.Tag("@services/merkleization/Packer")<
  Packer,
  {
    readonly pack: <A>(
      values: Iterable<A>,
      serialize: Serializer<A>
    ) => Either.Either<Chunks.ChunkBuffer, SerializationError>;
    readonly packBytes: (buffer: Uint8Array) => Chunks.ChunkBuffer;
  }
>() {}

/**
 * Right-pad with zero bytes to a multiple of 32. Aligned input comes back
 * as is, so padding twice is a no-op.
 * @internal
 */
export const packBytesPure = (buffer: Uint8Array): Chunks.ChunkBuffer => {
  const remainder = buffer.length % BYTES_PER_CHUNK;
  if (remainder === 0) return Chunks.ChunkBufferSchema.make(buffer);

  const padded = new Uint8Array(buffer.length + BYTES_PER_CHUNK - remainder);
  padded.set(buffer);
  return Chunks.ChunkBufferSchema.make(padded);
};

/**
 * Serialize every value in order into one buffer, then pad
 * @internal
 */
export const packPure = <A>(
  values: Iterable<A>,
  serialize: Serializer<A>
): Either.Either<Chunks.ChunkBuffer, SerializationError> => {
  const parts: Uint8Array[] = [];
  let length = 0;

  for (const value of values) {
    const serialized = serialize(value);
    if (Either.isLeft(serialized)) return Either.left(serialized.left);
    parts.push(serialized.right);
    length += serialized.right.length;
  }

  const buffer = new Uint8Array(length);
  let offset = 0;
  for (const part of parts) {
    buffer.set(part, offset);
    offset += part.length;
  }
  return Either.right(packBytesPure(buffer));
};

/**
 * Live implementation of Packer
 *
 * @category Services
 * @since 0.1.0
 */
export const PackerLive = Layer.succeed(
  Packer,
  Packer.of({
    pack: packPure,
    packBytes: packBytesPure,
  })
);
