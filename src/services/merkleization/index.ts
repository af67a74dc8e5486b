export { HashingService, HashingServiceLive } from "./hash";
export type { HashNodesFn } from "./hash";
export {
  MerkleizationContext,
  MerkleizationContextLive,
  ZeroHashTable,
} from "./context";
export { Packer, PackerLive } from "./pack";
export type { Serializer } from "./pack";
export { Merkleizer, MerkleizerLive } from "./merkleize";
export { DecorationMixer, DecorationMixerLive } from "./mix";
export { CachedMerkleizer, CachedMerkleizerLive, MerkleCache } from "./cache";
export type { ChunkAt } from "./cache";
export { MerkleProofService, MerkleProofServiceLive } from "./proof";
export { MerkleDisplayService, MerkleDisplayServiceLive } from "./display";

/**
 * Merkleization Service — Effect-Based Capabilities
 *
 * Capabilities:
 * - Packer — serialized values to padded chunks
 * - Merkleizer — roots of chunk buffers with virtual padding
 * - DecorationMixer — length and selector mixing
 * - CachedMerkleizer — incremental roots over a MerkleCache
 * - MerkleProofService — branch generation and verification
 * - MerkleDisplayService — rendering and logged statistics
 *
 * Dependencies:
 * - every capability but Packer and MerkleDisplayService requires
 *   HashingService; those that pad also require MerkleizationContext
 *
 * @module MerkleizationService
 * @since 0.1.0
 */

import { Layer } from "effect";
import { CachedMerkleizerLive } from "./cache";
import { MerkleizationContextLive } from "./context";
import { MerkleDisplayServiceLive } from "./display";
import { HashingServiceLive } from "./hash";
import { MerkleizerLive } from "./merkleize";
import { DecorationMixerLive } from "./mix";
import { PackerLive } from "./pack";
import { MerkleProofServiceLive } from "./proof";

/**
 * All merkleization capabilities
 *
 * Requires: HashingService, MerkleizationContext
 *
 * @category Services
 * @since 0.1.0
 */
export const MerkleizationServiceLive = Layer.mergeAll(
  PackerLive,
  MerkleizerLive,
  DecorationMixerLive,
  CachedMerkleizerLive,
  MerkleProofServiceLive,
  MerkleDisplayServiceLive
);

/**
 * Every capability with its dependencies, the hashing service and the
 * zero-hash table included
 *
 * @category Services
 * @since 0.1.0
 */
export const MerkleizationLive = MerkleizationServiceLive.pipe(
  Layer.provideMerge(MerkleizationContextLive),
  Layer.provideMerge(HashingServiceLive)
);
