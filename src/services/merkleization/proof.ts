import { Context, Effect, Either, Layer } from "effect";
import * as Chunks from "../../entities/chunks";
import {
  IndexOutOfBoundsError,
  InvalidBranchError,
  InvalidProofError,
} from "../../entities/errors";
import * as Node from "../../entities/node";
import { type MerkleBranch, makeMerkleBranch } from "../../entities/proof";
import { MerkleizationContext, type ZeroHashTable } from "./context";
import { HashingService, type HashNodesFn } from "./hash";
import { hashLevelInPlace } from "./merkleize";

const { BYTES_PER_CHUNK } = Node;

// ============================================================================
// CAPABILITY: MERKLE PROOF
// ============================================================================

/**
 * MerkleProofService capability — generates and verifies Merkle branches
 */
export class MerkleProofService extends Context.Tag(
  "@services/merkleization/MerkleProofService"
)<
  MerkleProofService,
  {
    readonly generateBranch: (
      chunks: Chunks.ChunkBuffer,
      leafCount: Chunks.LeafCount,
      index: number
    ) => Either.Either<MerkleBranch, IndexOutOfBoundsError>;
    readonly isValidMerkleBranch: (
      leaf: Node.Node,
      branch: ReadonlyArray<Node.Node>,
      depth: number,
      index: number | bigint,
      root: Node.Node
    ) => Either.Either<boolean, InvalidBranchError>;
    readonly validateBranch: (
      proof: MerkleBranch
    ) => Either.Either<true, InvalidProofError | InvalidBranchError>;
  }
>() {}

/**
 * Pure implementation of generateBranch
 *
 * Runs the same in-place level hashing as the merkleizer, capturing the
 * sibling of the running node before each level is overwritten. Siblings
 * past the last real node are zero subtrees. More chunks than leaves is a
 * defect, as in the merkleizer.
 * @internal
 */
export const generateBranchPure = (
  chunks: Chunks.ChunkBuffer,
  leafCount: Chunks.LeafCount,
  index: number,
  context: ZeroHashTable,
  hashNodes: HashNodesFn
): Either.Either<MerkleBranch, IndexOutOfBoundsError> => {
  const chunkCount = Chunks.chunkCount(chunks);
  if (!Number.isInteger(index) || index < 0 || index >= chunkCount) {
    return Either.left(
      new IndexOutOfBoundsError({
        message: `Index ${index} out of bounds [0, ${chunkCount - 1}]`,
        index: Number.isInteger(index) ? index : -1,
        size: chunkCount,
      })
    );
  }

  if (BigInt(chunkCount) > leafCount) {
    throw new RangeError(
      `${chunkCount} chunks do not fit in ${leafCount} leaves`
    );
  }

  const depth = Chunks.depthOf(leafCount);
  const layer = Uint8Array.from(chunks);
  const leaf = Node.fromBytes(
    layer.subarray(index * BYTES_PER_CHUNK, (index + 1) * BYTES_PER_CHUNK)
  );

  const branch: Node.Node[] = [];
  let lastIndex = chunkCount - 1;
  let position = index;
  for (let level = 0; level < depth; level++) {
    const sibling = position % 2 === 0 ? position + 1 : position - 1;
    branch.push(
      sibling <= lastIndex
        ? Node.fromBytes(
            layer.subarray(
              sibling * BYTES_PER_CHUNK,
              (sibling + 1) * BYTES_PER_CHUNK
            )
          )
        : context.at(level)
    );
    lastIndex = hashLevelInPlace(layer, lastIndex, level, context, hashNodes);
    position = Math.floor(position / 2);
  }

  return Either.right(
    makeMerkleBranch({
      leaf,
      branch,
      depth,
      index: BigInt(index),
      root: Node.fromBytes(layer.subarray(0, BYTES_PER_CHUNK)),
    })
  );
};

/**
 * Recompute the root implied by a leaf and its branch
 * @internal
 */
const rootFromBranch = (
  leaf: Node.Node,
  branch: ReadonlyArray<Node.Node>,
  depth: number,
  index: bigint,
  hashNodes: HashNodesFn
): Node.Node => {
  let value = leaf;
  for (let i = 0; i < depth; i++) {
    const isRightChild = ((index >> BigInt(i)) & 1n) === 1n;
    value = isRightChild
      ? hashNodes(branch[i], value)
      : hashNodes(value, branch[i]);
  }
  return value;
};

const checkBranchLength = (
  branch: ReadonlyArray<Node.Node>,
  depth: number
): Either.Either<void, InvalidBranchError> =>
  branch.length === depth
    ? Either.right<void>(undefined)
    : Either.left(
        new InvalidBranchError({
          message: `branch has ${branch.length} nodes, expected ${depth}`,
          depth,
          length: branch.length,
        })
      );

/**
 * Pure implementation of isValidMerkleBranch
 * @internal
 */
export const isValidMerkleBranchPure = (
  leaf: Node.Node,
  branch: ReadonlyArray<Node.Node>,
  depth: number,
  index: number | bigint,
  root: Node.Node,
  hashNodes: HashNodesFn
): Either.Either<boolean, InvalidBranchError> =>
  Either.map(checkBranchLength(branch, depth), () =>
    Node.NodeEquivalence(
      rootFromBranch(leaf, branch, depth, BigInt(index), hashNodes),
      root
    )
  );

/**
 * Pure implementation of validateBranch
 * @internal
 */
export const validateBranchPure = (
  proof: MerkleBranch,
  hashNodes: HashNodesFn
): Either.Either<true, InvalidProofError | InvalidBranchError> =>
  Either.flatMap(
    checkBranchLength(proof.branch, proof.depth),
    (): Either.Either<true, InvalidProofError> => {
      const actual = rootFromBranch(
        proof.leaf,
        proof.branch,
        proof.depth,
        proof.index,
        hashNodes
      );
      return Node.NodeEquivalence(actual, proof.root)
        ? Either.right<true>(true)
        : Either.left(
            new InvalidProofError({
              message: "Proof verification failed",
              expected: Node.toHex(proof.root),
              actual: Node.toHex(actual),
            })
          );
    }
  );

/**
 * Live implementation of MerkleProofService
 *
 * @category Services
 * @since 0.1.0
 */
export const MerkleProofServiceLive = Layer.effect(
  MerkleProofService,
  Effect.gen(function* () {
    const hashing = yield* HashingService;
    const context = yield* MerkleizationContext;

    return MerkleProofService.of({
      generateBranch: (chunks, leafCount, index) =>
        generateBranchPure(chunks, leafCount, index, context, hashing.hashNodes),
      isValidMerkleBranch: (leaf, branch, depth, index, root) =>
        isValidMerkleBranchPure(
          leaf,
          branch,
          depth,
          index,
          root,
          hashing.hashNodes
        ),
      validateBranch: (proof) => validateBranchPure(proof, hashing.hashNodes),
    });
  })
);
