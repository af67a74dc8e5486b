/**
 * This module provides the hashing primitive of Merkleization as an Effect
 * service. Pure implementations using `ethers` for SHA-256.
 *
 * Capabilities:
 * - HashingService — SHA-256 digests and two-node hashing
 *
 * @module Merkleization/Hash
 * @since 0.1.0
 */

import { Context, Layer } from "effect";
import { getBytes, sha256 } from "ethers";
import * as Node from "../../entities/node";

// ============================================================================
// PURE IMPLEMENTATIONS
// ============================================================================

/**
 * Two-node hash function, as passed to the pure merkleization routines
 */
export type HashNodesFn = (left: Uint8Array, right: Uint8Array) => Node.Node;

/**
 * SHA-256 of raw bytes
 * @internal
 */
export const sha256Pure = (data: Uint8Array): Node.Node =>
  Node.NodeSchema.make(getBytes(sha256(data)));

/**
 * SHA-256 of `left || right`, no domain separation
 * @internal
 */
export const hashNodesPure: HashNodesFn = (left, right) => {
  const input = new Uint8Array(2 * Node.BYTES_PER_CHUNK);
  input.set(left, 0);
  input.set(right, Node.BYTES_PER_CHUNK);
  return sha256Pure(input);
};

// ============================================================================
// CAPABILITY: HASHING SERVICE
// ============================================================================

/**
 * HashingService capability — cryptographic hash operations
 *
 * All operations are deterministic and side-effect free. Each call owns its
 * hashing state, so the service is safe to share between fibers.
 *
 * @category Capabilities
 * @since 0.1.0
 */
export class HashingService extends Context.Tag(
  "@services/merkleization/HashingService"
)<
  HashingService,
  {
    readonly sha256: (data: Uint8Array) => Node.Node;
    readonly hashNodes: HashNodesFn;
  }
>() {}

/**
 * Live implementation of HashingService
 *
 * @category Services
 * @since 0.1.0
 */
export const HashingServiceLive = Layer.succeed(
  HashingService,
  HashingService.of({
    sha256: sha256Pure,
    hashNodes: hashNodesPure,
  })
);
