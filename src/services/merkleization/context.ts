/**
 * Zero-Hash Context
 *
 * Precomputed roots of all-zero subtrees for every height below
 * MAX_MERKLE_TREE_DEPTH. Entry 0 is the zero chunk and entry i+1 is
 * H(entry[i] || entry[i]). Built once, read-only afterwards, shared by every
 * merkleization that needs virtual padding.
 *
 * @module Merkleization/Context
 * @since 0.1.0
 */

import { Context, Effect, Layer } from "effect";
import { MAX_MERKLE_TREE_DEPTH } from "../../entities/chunks";
import * as Node from "../../entities/node";
import { HashingService, type HashNodesFn } from "./hash";

/**
 * Immutable table of zero-subtree roots
 *
 * @category Models
 * @since 0.1.0
 */
export class ZeroHashTable {
  private constructor(private readonly zeroHashes: Uint8Array) {}

  /**
   * Compute the table: MAX_MERKLE_TREE_DEPTH - 1 hash operations
   */
  static make(hashNodes: HashNodesFn): ZeroHashTable {
    const buffer = new Uint8Array(MAX_MERKLE_TREE_DEPTH * Node.BYTES_PER_CHUNK);
    for (let depth = 0; depth < MAX_MERKLE_TREE_DEPTH - 1; depth++) {
      const source = buffer.subarray(
        depth * Node.BYTES_PER_CHUNK,
        (depth + 1) * Node.BYTES_PER_CHUNK
      );
      buffer.set(hashNodes(source, source), (depth + 1) * Node.BYTES_PER_CHUNK);
    }
    return new ZeroHashTable(buffer);
  }

  /**
   * Root of a perfectly balanced all-zero tree of the given height
   */
  at(depth: number): Node.Node {
    if (!Number.isInteger(depth) || depth < 0 || depth >= MAX_MERKLE_TREE_DEPTH) {
      throw new RangeError(
        `zero hash depth must be an integer in [0, ${MAX_MERKLE_TREE_DEPTH}), got ${depth}`
      );
    }
    return Node.fromBytes(
      this.zeroHashes.subarray(
        depth * Node.BYTES_PER_CHUNK,
        (depth + 1) * Node.BYTES_PER_CHUNK
      )
    );
  }
}

// ============================================================================
// CAPABILITY: MERKLEIZATION CONTEXT
// ============================================================================

/**
 * MerkleizationContext capability — the shared zero-hash table
 *
 * @category Capabilities
 * @since 0.1.0
 */
export class MerkleizationContext extends Context.Tag(
  "@services/merkleization/MerkleizationContext"
)<MerkleizationContext, ZeroHashTable>() {}

/**
 * Live implementation of MerkleizationContext. The layer is memoized, so the
 * table is computed once per program however many services depend on it.
 *
 * @category Services
 * @since 0.1.0
 */
export const MerkleizationContextLive = Layer.effect(
  MerkleizationContext,
  Effect.gen(function* () {
    const hashing = yield* HashingService;
    const table = ZeroHashTable.make(hashing.hashNodes);
    yield* Effect.logDebug(
      `Zero-hash table ready (${MAX_MERKLE_TREE_DEPTH} depths)`
    );
    return table;
  })
);
