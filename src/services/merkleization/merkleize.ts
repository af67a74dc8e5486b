/**
 * Tree Merkleizer
 *
 * Root of the binary tree whose bottom layer is `chunks`, padded with zero
 * chunks up to a power-of-two leaf count. Padding is virtual: only the real
 * chunks are ever hashed, and every subtree to the right of the last real
 * node is read from the zero-hash table. Cost is O(chunk count) hashes plus
 * O(height) table lookups, whatever the leaf count (up to 2^63).
 *
 * @module Merkleization/Merkleize
 * @since 0.1.0
 */

import { Context, Effect, Either, Layer, Option } from "effect";
import * as Chunks from "../../entities/chunks";
import { InputExceedsLimitError } from "../../entities/errors";
import * as Node from "../../entities/node";
import { MerkleizationContext, type ZeroHashTable } from "./context";
import { HashingService, type HashNodesFn } from "./hash";

const { BYTES_PER_CHUNK } = Node;

// ============================================================================
// CAPABILITY: MERKLEIZER
// ============================================================================

/**
 * Merkleizer capability — roots of chunk buffers
 *
 * @category Capabilities
 * @since 0.1.0
 */
export class Merkleizer extends Context.Tag("@services/merkleization/Merkleizer")<
  Merkleizer,
  {
    readonly merkleize: (
      chunks: Chunks.ChunkBuffer,
      limit: Option.Option<bigint>
    ) => Either.Either<Node.Node, InputExceedsLimitError>;
    readonly merkleizeChunksWithVirtualPadding: (
      chunks: Chunks.ChunkBuffer,
      leafCount: Chunks.LeafCount
    ) => Node.Node;
  }
>() {}

/**
 * Hash one level of the working buffer in place.
 *
 * Slots 0..lastIndex hold the real nodes of the level at `depth` above the
 * leaves. Pair (i, i+1) is hashed into slot i/2. The parent slot aliases the
 * left child when i = 0 and otherwise lies below every child still unread,
 * and both children are consumed into the digest before it is written.
 * A right child past lastIndex is virtual and comes from the table.
 *
 * Returns lastIndex for the level above.
 * @internal
 */
export const hashLevelInPlace = (
  layer: Uint8Array,
  lastIndex: number,
  depth: number,
  context: ZeroHashTable,
  hashNodes: HashNodesFn
): number => {
  for (let i = 0; i <= lastIndex; i += 2) {
    const left = layer.subarray(i * BYTES_PER_CHUNK, (i + 1) * BYTES_PER_CHUNK);
    const right =
      i < lastIndex
        ? layer.subarray((i + 1) * BYTES_PER_CHUNK, (i + 2) * BYTES_PER_CHUNK)
        : context.at(depth);
    layer.set(hashNodes(left, right), (i / 2) * BYTES_PER_CHUNK);
  }
  return Math.floor(lastIndex / 2);
};

/**
 * Pure implementation of merkleizeChunksWithVirtualPadding
 * @internal
 */
export const merkleizeChunksWithVirtualPaddingPure = (
  chunks: Chunks.ChunkBuffer,
  leafCount: Chunks.LeafCount,
  context: ZeroHashTable,
  hashNodes: HashNodesFn
): Node.Node => {
  const chunkCount = Chunks.chunkCount(chunks);
  const depth = Chunks.depthOf(leafCount);

  if (chunkCount === 0) return context.at(depth);

  // Fewer leaves than chunks cannot happen through `merkleize`
  if (BigInt(chunkCount) > leafCount) {
    throw new RangeError(
      `${chunkCount} chunks do not fit in ${leafCount} leaves`
    );
  }

  const layer = Uint8Array.from(chunks);
  let lastIndex = chunkCount - 1;
  for (let level = 0; level < depth; level++) {
    lastIndex = hashLevelInPlace(layer, lastIndex, level, context, hashNodes);
  }

  return Node.fromBytes(layer.subarray(0, BYTES_PER_CHUNK));
};

/**
 * Leaf count for `chunkCount` chunks under an optional declared limit
 * @internal
 */
export const leafCountFor = (
  chunkCount: number,
  limit: Option.Option<bigint>
): Either.Either<Chunks.LeafCount, InputExceedsLimitError> =>
  Option.match(limit, {
    onNone: () => Either.right(Chunks.nextPowerOfTwo(chunkCount)),
    onSome: (max) =>
      max < BigInt(chunkCount)
        ? Either.left(
            new InputExceedsLimitError({
              message: `cannot merkleize ${chunkCount} chunks: exceeds the declared limit ${max}`,
              limit: max,
              count: chunkCount,
            })
          )
        : Either.right(Chunks.nextPowerOfTwo(max)),
  });

/**
 * Pure implementation of merkleize
 * @internal
 */
export const merkleizePure = (
  chunks: Chunks.ChunkBuffer,
  limit: Option.Option<bigint>,
  context: ZeroHashTable,
  hashNodes: HashNodesFn
): Either.Either<Node.Node, InputExceedsLimitError> =>
  Either.map(leafCountFor(Chunks.chunkCount(chunks), limit), (leafCount) =>
    merkleizeChunksWithVirtualPaddingPure(chunks, leafCount, context, hashNodes)
  );

/**
 * Live implementation of Merkleizer
 *
 * @category Services
 * @since 0.1.0
 */
export const MerkleizerLive = Layer.effect(
  Merkleizer,
  Effect.gen(function* () {
    const hashing = yield* HashingService;
    const context = yield* MerkleizationContext;

    return Merkleizer.of({
      merkleize: (chunks, limit) =>
        merkleizePure(chunks, limit, context, hashing.hashNodes),
      merkleizeChunksWithVirtualPadding: (chunks, leafCount) =>
        merkleizeChunksWithVirtualPaddingPure(
          chunks,
          leafCount,
          context,
          hashing.hashNodes
        ),
    });
  })
);
