/**
 * Hash Tree Root Service
 *
 * Binds the merkleization capabilities into one Toolkit and dispatches any
 * type descriptor through it.
 *
 * @module HashTreeRoot
 * @since 0.1.0
 */

import { Context, Effect, type Either, Layer } from "effect";
import type { MerkleizationError } from "../../entities/errors";
import type * as Node from "../../entities/node";
import { CachedMerkleizer } from "../merkleization/cache";
import { Merkleizer } from "../merkleization/merkleize";
import { DecorationMixer } from "../merkleization/mix";
import { Packer } from "../merkleization/pack";
import type { SszType, Toolkit } from "./types";

export * as Ssz from "./types";
export type { SszType, Toolkit, TypeOf, UnionValue } from "./types";
export { MerkleizedList } from "./list";

/**
 * HashTreeRoot capability
 *
 * @category Capabilities
 * @since 0.1.0
 */
export class HashTreeRoot extends Context.Tag("@services/HashTreeRoot")<
  HashTreeRoot,
  {
    readonly toolkit: Toolkit;
    readonly hashTreeRoot: <T>(
      type: SszType<T>,
      value: T
    ) => Either.Either<Node.Node, MerkleizationError>;
  }
>() {}

/**
 * Live implementation of HashTreeRoot
 *
 * Requires: Packer, Merkleizer, DecorationMixer, CachedMerkleizer
 *
 * @category Services
 * @since 0.1.0
 */
export const HashTreeRootLive = Layer.effect(
  HashTreeRoot,
  Effect.gen(function* () {
    const packer = yield* Packer;
    const merkleizer = yield* Merkleizer;
    const mixer = yield* DecorationMixer;
    const cached = yield* CachedMerkleizer;

    const toolkit: Toolkit = {
      pack: packer.pack,
      packBytes: packer.packBytes,
      merkleize: merkleizer.merkleize,
      merkleizeCached: cached.merkleize,
      mixInLength: mixer.mixInLength,
      mixInSelector: mixer.mixInSelector,
    };

    return HashTreeRoot.of({
      toolkit,
      hashTreeRoot: (type, value) => type.hashTreeRoot(value, toolkit),
    });
  })
);
