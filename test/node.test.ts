import { assert, describe, it } from "@effect/vitest";
import { Either, Schema } from "effect";
import * as Node from "../src/entities/node";

const HEX = "00ff".repeat(16);

describe("Node", () => {
  it("decodes hex with or without a prefix", () => {
    const decode = Schema.decodeUnknownEither(Node.NodeFromHex);

    const plain = decode(HEX);
    const prefixed = decode(`0x${HEX}`);

    assert.isTrue(Either.isRight(plain));
    assert.isTrue(Either.isRight(prefixed));
    assert.strictEqual(Node.toHex(Node.unsafeFromHex(HEX)), HEX);
  });

  it("refuses anything but 32 bytes of hex", () => {
    const decode = Schema.decodeUnknownEither(Node.NodeFromHex);

    assert.isTrue(Either.isLeft(decode("00ff")));
    assert.isTrue(Either.isLeft(decode("zz".repeat(32))));
    assert.throws(() => Node.fromBytes(new Uint8Array(31)));
  });

  it("encodes without a prefix", () => {
    const encoded = Schema.encodeSync(Node.NodeFromHex)(Node.unsafeFromHex(HEX));
    assert.strictEqual(encoded, HEX);
  });

  it("copies its input", () => {
    const bytes = new Uint8Array(32).fill(3);
    const node = Node.fromBytes(bytes);
    bytes[0] = 0;
    assert.strictEqual(node[0], 3);
  });

  it("compares byte-wise", () => {
    const low = Node.unsafeFromHex("00".repeat(31) + "01");
    const high = Node.unsafeFromHex("01" + "00".repeat(31));

    assert.isTrue(Node.NodeEquivalence(low, Node.unsafeFromHex("00".repeat(31) + "01")));
    assert.isFalse(Node.NodeEquivalence(low, high));
    assert.strictEqual(Node.NodeOrder(low, high), -1);
    assert.strictEqual(Node.NodeOrder(high, low), 1);
    assert.strictEqual(Node.NodeOrder(Node.zero(), Node.zero()), 0);
  });
});
