/**
 * Node: the 32-byte digest at every position of a Merkle tree
 *
 * A Node is a leaf chunk, an internal digest or a root. It is compared
 * byte-wise and defaults to 32 zero bytes. Every constructor returns a fresh
 * array, so a Node never aliases a working buffer.
 *
 * @module Node
 * @since 0.1.0
 */

import { Equivalence, Order, ParseResult, Schema } from "effect";
import { getBytes, hexlify } from "ethers";

export const BYTES_PER_CHUNK = 32;

// ============================================================================
// SCHEMAS
// ============================================================================

export const NodeSchema = Schema.Uint8ArrayFromSelf.pipe(
  Schema.filter(
    (bytes) =>
      bytes.length === BYTES_PER_CHUNK ||
      `a node is exactly ${BYTES_PER_CHUNK} bytes, got ${bytes.length}`
  ),
  Schema.brand("Node")
);

export type Node = typeof NodeSchema.Type;

/**
 * Hex representation of a node, with or without `0x` prefix on input,
 * always without prefix on output
 *
 * @category Schema
 * @since 0.1.0
 */
export const NodeFromHex = Schema.transformOrFail(Schema.String, NodeSchema, {
  strict: true,
  decode: (s, _, ast) =>
    ParseResult.try({
      try: () => {
        const normalized = s.startsWith("0x") ? s : `0x${s}`;
        if (!/^0x[0-9a-fA-F]{64}$/.test(normalized)) {
          throw new Error("Invalid node format");
        }
        return getBytes(normalized);
      },
      catch: () => new ParseResult.Type(ast, s),
    }),
  encode: (bytes) => ParseResult.succeed(hexlify(bytes).slice(2)),
});

// ============================================================================
// CONSTRUCTORS
// ============================================================================

/**
 * The default node: 32 zero bytes
 */
export const zero = (): Node => NodeSchema.make(new Uint8Array(BYTES_PER_CHUNK));

/**
 * Copy exactly 32 bytes into a new node. Any other length is a defect.
 */
export const fromBytes = (bytes: Uint8Array): Node =>
  NodeSchema.make(Uint8Array.from(bytes));

/**
 * Decode a 64-character hex string, throwing on malformed input
 */
export const unsafeFromHex = (hex: string): Node =>
  Schema.decodeSync(NodeFromHex)(hex);

export const toHex = (node: Node): string => hexlify(node).slice(2);

// ============================================================================
// COMPARISON
// ============================================================================

export const NodeEquivalence: Equivalence.Equivalence<Uint8Array> =
  Equivalence.make(
    (self, that) =>
      self.length === that.length &&
      self.every((byte, index) => byte === that[index])
  );

export const NodeOrder: Order.Order<Uint8Array> = Order.make((self, that) => {
  const length = Math.min(self.length, that.length);
  for (let i = 0; i < length; i++) {
    if (self[i] !== that[i]) return self[i] < that[i] ? -1 : 1;
  }
  return self.length === that.length ? 0 : self.length < that.length ? -1 : 1;
});
