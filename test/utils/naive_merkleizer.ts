import * as Node from "../../src/entities/node";
import { hashNodesPure } from "../../src/services/merkleization/hash";

/**
 * Reference root: materialize every padding leaf, then hash level by level.
 * Only usable for small leaf counts.
 */
export const naiveMerkleize = (chunks: Uint8Array, leafCount: number): Node.Node => {
  let level: Uint8Array[] = [];
  for (let i = 0; i < leafCount; i++) {
    const start = i * Node.BYTES_PER_CHUNK;
    level.push(
      start < chunks.length
        ? chunks.slice(start, start + Node.BYTES_PER_CHUNK)
        : new Uint8Array(Node.BYTES_PER_CHUNK)
    );
  }
  while (level.length > 1) {
    const next: Uint8Array[] = [];
    for (let i = 0; i < level.length; i += 2) {
      next.push(hashNodesPure(level[i], level[i + 1]));
    }
    level = next;
  }
  return Node.fromBytes(level[0]);
};
