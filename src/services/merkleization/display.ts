/**
 * Merkleization Display Capability
 *
 * Compact rendering of nodes and branches for debugging and inspection,
 * plus logged statistics of a merkleization.
 *
 * @module Merkleization/Display
 * @since 0.1.0
 */

import { Context, Effect, Layer, Option } from "effect";
import * as Chunks from "../../entities/chunks";
import * as Node from "../../entities/node";
import type * as Primitives from "../../entities/primitives";
import type { MerkleBranch } from "../../entities/proof";

/**
 * Hex form of a node, cut to `prefix` characters when given
 */
const displayNode = (
  node: Node.Node,
  prefix: Option.Option<Primitives.PositiveInt>
): string => {
  const hex = Node.toHex(node);
  return Option.match(prefix, {
    onNone: () => hex,
    onSome: (length) =>
      length >= hex.length ? hex : `${hex.substring(0, length)}...`,
  });
};

/**
 * Compact single-line representation of a branch.
 * Format: "Branch(index=..., depth=..., leaf=..., root=...)"
 */
const displayBranch = (proof: MerkleBranch): string => {
  const leaf = displayNode(proof.leaf, Option.some(8));
  const root = displayNode(proof.root, Option.some(8));
  return `Branch(index=${proof.index}, depth=${proof.depth}, leaf=${leaf}, root=${root})`;
};

/**
 * Log chunk count, leaf count, depth, virtual padding and root
 */
const displayStats = (
  chunks: Chunks.ChunkBuffer,
  leafCount: Chunks.LeafCount,
  root: Node.Node
): Effect.Effect<void> =>
  Effect.gen(function* () {
    const chunkCount = Chunks.chunkCount(chunks);
    const depth = Chunks.depthOf(leafCount);

    yield* Effect.logInfo("Merkleization Statistics");
    yield* Effect.logInfo(`Number of chunks:          ${chunkCount}`);
    yield* Effect.logInfo(`Number of leaves:          ${leafCount}`);
    yield* Effect.logInfo(`Tree depth:                ${depth}`);
    yield* Effect.logInfo(
      `Virtual leaves:            ${leafCount - BigInt(chunkCount)}`
    );
    yield* Effect.logInfo(`Hash tree root:            ${Node.toHex(root)}`);
    yield* Effect.logInfo("=".repeat(70));
  });

/**
 * Log a branch step by step, from the leaf up.
 * For each step, show the sibling and whether it sits on the left or right.
 */
const displayProof = (proof: MerkleBranch): Effect.Effect<void> =>
  Effect.gen(function* () {
    yield* Effect.logInfo("Merkle Branch");
    yield* Effect.logInfo(`Leaf index: ${proof.index}`);
    yield* Effect.logInfo(`Leaf: ${Node.toHex(proof.leaf)}`);
    yield* Effect.logInfo(`Depth: ${proof.depth}`);
    yield* Effect.logInfo("-".repeat(70));

    yield* Effect.forEach(proof.branch, (sibling, step) => {
      const isRightChild = ((proof.index >> BigInt(step)) & 1n) === 1n;
      const position = isRightChild ? "LEFT" : "RIGHT";
      return Effect.logInfo(
        `Step ${step + 1}: Sibling on ${position.padEnd(5)} | Hash: ${displayNode(
          sibling,
          Option.some(16)
        )}`
      );
    });

    yield* Effect.logInfo(`Root: ${Node.toHex(proof.root)}`);
    yield* Effect.logInfo("=".repeat(70));
  });

/**
 * MerkleDisplayService capability — compact visualization
 *
 * @category Capabilities
 * @since 0.1.0
 */
export class MerkleDisplayService extends Context.Tag(
  "@services/merkleization/MerkleDisplayService"
)<
  MerkleDisplayService,
  {
    readonly displayNode: (
      node: Node.Node,
      prefix: Option.Option<Primitives.PositiveInt>
    ) => string;
    readonly displayBranch: (proof: MerkleBranch) => string;
    readonly displayStats: (
      chunks: Chunks.ChunkBuffer,
      leafCount: Chunks.LeafCount,
      root: Node.Node
    ) => Effect.Effect<void>;
    readonly displayProof: (proof: MerkleBranch) => Effect.Effect<void>;
  }
>() {}

/**
 * Live implementation of MerkleDisplayService
 *
 * @category Services
 * @since 0.1.0
 */
export const MerkleDisplayServiceLive = Layer.succeed(
  MerkleDisplayService,
  MerkleDisplayService.of({
    displayNode,
    displayBranch,
    displayStats,
    displayProof,
  })
);
