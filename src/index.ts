/**
 * hash-tree-root: SSZ Merkleization for effect programs
 *
 * @since 0.1.0
 */

import { Layer } from "effect";
import { HashTreeRootLive } from "./services/hash_tree_root";
import { MerkleizationLive } from "./services/merkleization";

export * as Chunks from "./entities/chunks";
export * as Node from "./entities/node";
export * from "./entities/errors";
export type { MerkleBranch } from "./entities/proof";
export * from "./services/merkleization";
export * from "./services/hash_tree_root";

/**
 * Every capability, descriptor dispatch included, ready to provide
 *
 * @category Services
 * @since 0.1.0
 */
export const MainLive = HashTreeRootLive.pipe(
  Layer.provideMerge(MerkleizationLive)
);
