/**
 * Incremental Hash Cache
 *
 * A per-value side structure holding every real node of the value's tree
 * (virtual padding is never stored) and one dirty set per level. Mutating
 * an element marks its chunk and all of that chunk's ancestors dirty; the
 * next root computation only produces dirty chunks and only rehashes dirty
 * ancestors. A different chunk count or leaf count discards the whole cache,
 * since every leaf position may have moved.
 *
 * The cache is owned by one value and mutated in place. It never holds the
 * zero-hash table, which is passed in for each computation.
 *
 * @module Merkleization/Cache
 * @since 0.1.0
 */

import { Context, Effect, Either, Layer, Option } from "effect";
import * as Chunks from "../../entities/chunks";
import {
  type MerkleizationError,
  PartialChunkError,
} from "../../entities/errors";
import * as Node from "../../entities/node";
import { MerkleizationContext, type ZeroHashTable } from "./context";
import { HashingService, type HashNodesFn } from "./hash";
import { leafCountFor } from "./merkleize";

const { BYTES_PER_CHUNK } = Node;

/**
 * Producer of the chunk at a leaf position
 */
export type ChunkAt = (
  index: number
) => Either.Either<Uint8Array, MerkleizationError>;

interface Layout {
  readonly chunkCount: number;
  readonly leafCount: Chunks.LeafCount;
}

const slot = (level: Uint8Array, index: number): Uint8Array =>
  level.subarray(index * BYTES_PER_CHUNK, (index + 1) * BYTES_PER_CHUNK);

/**
 * Cached nodes and dirty bits of one value's tree
 *
 * @category Models
 * @since 0.1.0
 */
export class MerkleCache {
  // levels[d] holds the ceil(chunkCount / 2^d) real nodes at height d
  private levels: Uint8Array[] = [];
  private dirty: Set<number>[] = [];
  private layout: Option.Option<Layout> = Option.none();
  private root: Option.Option<Node.Node> = Option.none();

  /**
   * True when a root is cached and nothing has been invalidated since
   */
  get isValid(): boolean {
    return Option.isSome(this.root);
  }

  get chunkCount(): Option.Option<number> {
    return Option.map(this.layout, (layout) => layout.chunkCount);
  }

  /**
   * Mark one chunk and its ancestors dirty
   */
  invalidate(index: number): void {
    this.root = Option.none();
    if (Option.isNone(this.layout)) return;

    if (
      !Number.isInteger(index) ||
      index < 0 ||
      index >= this.layout.value.chunkCount
    ) {
      this.invalidateAll();
      return;
    }

    let position = index;
    for (const dirty of this.dirty) {
      dirty.add(position);
      position = Math.floor(position / 2);
    }
  }

  /**
   * Drop every cached node, for structural changes
   */
  invalidateAll(): void {
    this.levels = [];
    this.dirty = [];
    this.layout = Option.none();
    this.root = Option.none();
  }

  /**
   * Root of `chunkCount` chunks over `leafCount` leaves, reusing every
   * clean node. On failure nothing is written and the dirty marks stay.
   * @internal
   */
  compute(
    chunkCount: number,
    leafCount: Chunks.LeafCount,
    chunkAt: ChunkAt,
    context: ZeroHashTable,
    hashNodes: HashNodesFn
  ): Either.Either<Node.Node, MerkleizationError> {
    const sameLayout = Option.exists(
      this.layout,
      (layout) =>
        layout.chunkCount === chunkCount && layout.leafCount === leafCount
    );

    if (sameLayout && Option.isSome(this.root)) {
      return Either.right(Node.fromBytes(this.root.value));
    }
    if (!sameLayout) this.allocate(chunkCount, leafCount);

    const depth = Chunks.depthOf(leafCount);
    if (chunkCount === 0) {
      const root = context.at(depth);
      this.root = Option.some(root);
      return Either.right(Node.fromBytes(root));
    }

    const fresh: Array<readonly [number, Uint8Array]> = [];
    for (const index of this.dirty[0]) {
      const chunk = chunkAt(index);
      if (Either.isLeft(chunk)) return Either.left(chunk.left);
      if (chunk.right.length !== BYTES_PER_CHUNK) {
        return Either.left(
          new PartialChunkError({
            message: `chunk ${index} is ${chunk.right.length} bytes, expected ${BYTES_PER_CHUNK}`,
            length: chunk.right.length,
          })
        );
      }
      fresh.push([index, chunk.right]);
    }

    for (const [index, chunk] of fresh) {
      this.levels[0].set(chunk, index * BYTES_PER_CHUNK);
    }
    this.dirty[0].clear();

    for (let level = 1; level < this.levels.length; level++) {
      const children = this.levels[level - 1];
      const childCount = children.length / BYTES_PER_CHUNK;
      for (const parent of this.dirty[level]) {
        const left = slot(children, 2 * parent);
        const right =
          2 * parent + 1 < childCount
            ? slot(children, 2 * parent + 1)
            : context.at(level - 1);
        this.levels[level].set(
          hashNodes(left, right),
          parent * BYTES_PER_CHUNK
        );
      }
      this.dirty[level].clear();
    }

    // Above the last real level every right sibling is a zero subtree
    let root = Node.fromBytes(slot(this.levels[this.levels.length - 1], 0));
    for (let level = this.levels.length - 1; level < depth; level++) {
      root = hashNodes(root, context.at(level));
    }

    this.root = Option.some(root);
    return Either.right(Node.fromBytes(root));
  }

  private allocate(chunkCount: number, leafCount: Chunks.LeafCount): void {
    this.invalidateAll();
    this.layout = Option.some({ chunkCount, leafCount });
    if (chunkCount === 0) return;

    let size = chunkCount;
    for (;;) {
      this.levels.push(new Uint8Array(size * BYTES_PER_CHUNK));
      this.dirty.push(new Set(Array.from({ length: size }, (_, i) => i)));
      if (size === 1) break;
      size = Math.ceil(size / 2);
    }
  }
}

// ============================================================================
// CAPABILITY: CACHED MERKLEIZER
// ============================================================================

/**
 * CachedMerkleizer capability — `merkleize` over a value's MerkleCache
 *
 * @category Capabilities
 * @since 0.1.0
 */
export class CachedMerkleizer extends Context.Tag(
  "@services/merkleization/CachedMerkleizer"
)<
  CachedMerkleizer,
  {
    readonly merkleize: (
      cache: MerkleCache,
      chunkCount: number,
      limit: Option.Option<bigint>,
      chunkAt: ChunkAt
    ) => Either.Either<Node.Node, MerkleizationError>;
  }
>() {}

/**
 * Pure implementation of the cached merkleize
 * @internal
 */
export const merkleizeCachedPure = (
  cache: MerkleCache,
  chunkCount: number,
  limit: Option.Option<bigint>,
  chunkAt: ChunkAt,
  context: ZeroHashTable,
  hashNodes: HashNodesFn
): Either.Either<Node.Node, MerkleizationError> =>
  Either.flatMap(leafCountFor(chunkCount, limit), (leafCount) =>
    cache.compute(chunkCount, leafCount, chunkAt, context, hashNodes)
  );

/**
 * Live implementation of CachedMerkleizer
 *
 * @category Services
 * @since 0.1.0
 */
export const CachedMerkleizerLive = Layer.effect(
  CachedMerkleizer,
  Effect.gen(function* () {
    const hashing = yield* HashingService;
    const context = yield* MerkleizationContext;

    return CachedMerkleizer.of({
      merkleize: (cache, chunkCount, limit, chunkAt) =>
        merkleizeCachedPure(
          cache,
          chunkCount,
          limit,
          chunkAt,
          context,
          hashing.hashNodes
        ),
    });
  })
);
