import { assert, describe, it } from "@effect/vitest";
import { Effect } from "effect";
import * as Node from "../src/entities/node";
import { MerkleizationLive } from "../src/services/merkleization";
import { decorationRoot, DecorationMixer } from "../src/services/merkleization/mix";
import { assertNode } from "./utils/helpers";

describe("DecorationMixer", () => {
  it.effect("hashes the root with the little-endian length chunk", () =>
    Effect.gen(function* () {
      const mixer = yield* DecorationMixer;

      assertNode(
        mixer.mixInLength(Node.zero(), 0),
        "f5a5fd42d16a20302798ef6ed309979b43003d2320d9f0e8ea9831a92759fb4b"
      );
      assertNode(
        mixer.mixInLength(Node.zero(), 1),
        "cb592844121d926f1ca3ad4e1d6fb9d8e260ed6e3216361f7732e975a0e8bbf6"
      );
    }).pipe(Effect.provide(MerkleizationLive))
  );

  it.effect("separates different lengths", () =>
    Effect.gen(function* () {
      const mixer = yield* DecorationMixer;
      const root = Node.unsafeFromHex("0x" + "ab".repeat(32));

      const seen = new Set(
        [0, 1, 2, 255, 256, 65536].map((length) =>
          Node.toHex(mixer.mixInLength(root, length))
        )
      );

      assert.strictEqual(seen.size, 6);
    }).pipe(Effect.provide(MerkleizationLive))
  );

  it.effect("uses one formula for lengths and selectors", () =>
    Effect.gen(function* () {
      const mixer = yield* DecorationMixer;
      const root = Node.unsafeFromHex("0x" + "01".repeat(32));

      for (const decoration of [0, 3, 127]) {
        assert.isTrue(
          Node.NodeEquivalence(
            mixer.mixInLength(root, decoration),
            mixer.mixInSelector(root, decoration)
          )
        );
      }
    }).pipe(Effect.provide(MerkleizationLive))
  );

  it("encodes decorations as uint256 little-endian", () => {
    assertNode(decorationRoot(0x0102), "0201" + "00".repeat(30));
    assertNode(
      decorationRoot(Number.MAX_SAFE_INTEGER),
      "ffffffffffff1f" + "00".repeat(25)
    );
  });

  it("treats a negative or fractional decoration as a defect", () => {
    assert.throws(() => decorationRoot(-1));
    assert.throws(() => decorationRoot(1.5));
  });
});
