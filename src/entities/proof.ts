/**
 * Merkle Branch — Pure Model & Schema
 *
 * A branch is the list of sibling nodes from a leaf up to the root.
 * `branch[i]` is the sibling at height `i` above the leaves; bit `i` of
 * `index` tells whether the running node is a right child at that height.
 */

import { Schema } from "effect";
import { NodeSchema } from "./node";
import { NonNegativeIntSchema } from "./primitives";

export const MerkleBranchSchema = Schema.Struct({
  leaf: NodeSchema,
  branch: Schema.Array(NodeSchema),
  depth: NonNegativeIntSchema,
  index: Schema.NonNegativeBigIntFromSelf,
  root: NodeSchema,
});

export type MerkleBranch = typeof MerkleBranchSchema.Type;

/**
 * Create a Merkle branch
 */
export const makeMerkleBranch = (props: MerkleBranch): MerkleBranch =>
  MerkleBranchSchema.make({ ...props });
