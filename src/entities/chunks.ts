/**
 * Chunk buffers and leaf counts: the validated inputs of the tree merkleizer
 *
 * - `ChunkBuffer`: bytes whose length is a multiple of 32
 * - `LeafCount`: an exact power of two in [1, 2^63]
 *
 * Both are branded, so the merkleizer never has to re-check them.
 *
 * @module Chunks
 * @since 0.1.0
 */

import { Either, Schema } from "effect";
import { BYTES_PER_CHUNK } from "./node";
import { PartialChunkError } from "./errors";

/**
 * Depth range of the zero-hash table; a tree of height 64 has 2^63 leaves
 */
export const MAX_MERKLE_TREE_DEPTH = 64;

const MAX_LEAF_COUNT = 1n << BigInt(MAX_MERKLE_TREE_DEPTH - 1);

// ============================================================================
// CHUNK BUFFER
// ============================================================================

export const ChunkBufferSchema = Schema.Uint8ArrayFromSelf.pipe(
  Schema.filter(
    (bytes) =>
      bytes.length % BYTES_PER_CHUNK === 0 ||
      `chunk buffers are a multiple of ${BYTES_PER_CHUNK} bytes, got ${bytes.length}`
  ),
  Schema.brand("ChunkBuffer")
);

export type ChunkBuffer = typeof ChunkBufferSchema.Type;

/**
 * Accept a byte buffer as chunks, refusing a trailing partial chunk
 */
export const fromBytes = (
  bytes: Uint8Array
): Either.Either<ChunkBuffer, PartialChunkError> =>
  bytes.length % BYTES_PER_CHUNK === 0
    ? Either.right(ChunkBufferSchema.make(bytes))
    : Either.left(
        new PartialChunkError({
          message: `cannot merkleize a partial chunk of length ${
            bytes.length % BYTES_PER_CHUNK
          } (buffer length ${bytes.length})`,
          length: bytes.length,
        })
      );

export const empty = (): ChunkBuffer =>
  ChunkBufferSchema.make(new Uint8Array(0));

export const chunkCount = (chunks: ChunkBuffer): number =>
  chunks.length / BYTES_PER_CHUNK;

// ============================================================================
// LEAF COUNT
// ============================================================================

export const LeafCountSchema = Schema.BigIntFromSelf.pipe(
  Schema.filter(
    (n) =>
      (n > 0n && n <= MAX_LEAF_COUNT && (n & (n - 1n)) === 0n) ||
      `leaf count must be a power of two in [1, 2^${
        MAX_MERKLE_TREE_DEPTH - 1
      }], got ${n}`
  ),
  Schema.brand("LeafCount")
);

export type LeafCount = typeof LeafCountSchema.Type;

/**
 * Smallest power of two >= n, with nextPowerOfTwo(0) = 1
 */
export const nextPowerOfTwo = (n: number | bigint): LeafCount => {
  const target = BigInt(n);
  let power = 1n;
  while (power < target) power <<= 1n;
  return LeafCountSchema.make(power);
};

export const leafCountAtDepth = (depth: number): LeafCount =>
  LeafCountSchema.make(1n << BigInt(depth));

/**
 * log2 of a leaf count: the number of levels above the leaves
 */
export const depthOf = (leafCount: LeafCount): number =>
  leafCount.toString(2).length - 1;
