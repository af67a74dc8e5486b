import { assert, describe, it } from "@effect/vitest";
import { Effect } from "effect";
import * as Node from "../src/entities/node";
import {
  HashTreeRoot,
  MerkleizedList,
  Ssz,
  type Toolkit,
} from "../src/services/hash_tree_root";
import { MainLive } from "../src";
import {
  assertLeft,
  assertNode,
  assertNone,
  assertRight,
  assertSome,
} from "./utils/helpers";

const Values = Ssz.list(Ssz.uint16, 1024);
const Checkpoint = Ssz.container({ epoch: Ssz.uint64, root: Ssz.root });

/**
 * The service toolkit, recording every chunk the cached merkleizer asks for
 */
const spyingToolkit = (toolkit: Toolkit) => {
  const produced: number[] = [];
  const spy: Toolkit = {
    ...toolkit,
    merkleizeCached: (cache, chunkCount, limit, chunkAt) =>
      toolkit.merkleizeCached(cache, chunkCount, limit, (index) => {
        produced.push(index);
        return chunkAt(index);
      }),
  };
  return { spy, produced };
};

describe("MerkleizedList", () => {
  it.effect("roots like the list descriptor", () =>
    Effect.gen(function* () {
      const htr = yield* HashTreeRoot;
      const list = new MerkleizedList(Values, Array<number>(316).fill(65535));

      assertNode(
        assertRight(list.hashTreeRoot(htr.toolkit)),
        "d20d2246e1438d88de46f6f41c7b041f92b673845e51f2de93b944bf599e63b1"
      );
      assertNode(
        assertRight(new MerkleizedList(Values).hashTreeRoot(htr.toolkit)),
        "c9eece3e14d3c3db45c38bbf69a4cb7464981e2506d8424a0ba450dad9b9af30"
      );
    }).pipe(Effect.provide(MainLive))
  );

  it.effect("rehashes only the chunk holding a written element", () =>
    Effect.gen(function* () {
      const htr = yield* HashTreeRoot;
      const { spy, produced } = spyingToolkit(htr.toolkit);
      const list = new MerkleizedList(Values, Array<number>(316).fill(65535));

      assertRight(list.hashTreeRoot(spy));
      assert.strictEqual(produced.length, 20);
      assert.isTrue(list.isCached);

      produced.length = 0;
      assertRight(list.set(100, 7));
      assert.isFalse(list.isCached);

      const root = assertRight(list.hashTreeRoot(spy));
      const rebuilt = assertRight(htr.hashTreeRoot(Values, list.toArray()));

      assert.deepStrictEqual(produced, [6]);
      assert.strictEqual(Node.toHex(root), Node.toHex(rebuilt));
    }).pipe(Effect.provide(MainLive))
  );

  it.effect("serves an unchanged list from the cache", () =>
    Effect.gen(function* () {
      const htr = yield* HashTreeRoot;
      const { spy, produced } = spyingToolkit(htr.toolkit);
      const list = new MerkleizedList(Values, [1, 2, 3]);

      const first = assertRight(list.hashTreeRoot(spy));
      const second = assertRight(list.hashTreeRoot(spy));

      assert.deepStrictEqual(produced, [0]);
      assert.isTrue(Node.NodeEquivalence(first, second));
    }).pipe(Effect.provide(MainLive))
  );

  it.effect("tracks pushes and pops", () =>
    Effect.gen(function* () {
      const htr = yield* HashTreeRoot;
      const list = new MerkleizedList(Values, Array.from({ length: 16 }, (_, i) => i));
      assertRight(list.hashTreeRoot(htr.toolkit));

      assertRight(list.push(16));
      assert.strictEqual(list.length, 17);
      assert.strictEqual(
        Node.toHex(assertRight(list.hashTreeRoot(htr.toolkit))),
        Node.toHex(assertRight(htr.hashTreeRoot(Values, list.toArray())))
      );

      assert.strictEqual(assertSome(list.pop()), 16);
      assert.strictEqual(assertSome(list.pop()), 15);
      assert.strictEqual(
        Node.toHex(assertRight(list.hashTreeRoot(htr.toolkit))),
        Node.toHex(assertRight(htr.hashTreeRoot(Values, list.toArray())))
      );
    }).pipe(Effect.provide(MainLive))
  );

  it.effect("keeps composite elements in their own chunks", () =>
    Effect.gen(function* () {
      const htr = yield* HashTreeRoot;
      const { spy, produced } = spyingToolkit(htr.toolkit);
      const Checkpoints = Ssz.list(Checkpoint, 8);
      const list = new MerkleizedList(
        Checkpoints,
        Array.from({ length: 5 }, (_, i) => ({
          epoch: BigInt(i),
          root: Node.zero(),
        }))
      );
      assertRight(list.hashTreeRoot(spy));
      produced.length = 0;

      assertRight(list.set(3, { epoch: 99n, root: Node.zero() }));
      const root = assertRight(list.hashTreeRoot(spy));

      assert.deepStrictEqual(produced, [3]);
      assert.strictEqual(
        Node.toHex(root),
        Node.toHex(assertRight(htr.hashTreeRoot(Checkpoints, list.toArray())))
      );
    }).pipe(Effect.provide(MainLive))
  );

  it("bounds element access", () => {
    const list = new MerkleizedList(Values, [5, 6]);

    assert.strictEqual(assertSome(list.get(1)), 6);
    assertNone(list.get(2));
    assertNone(list.get(-1));

    const error = assertLeft(list.set(2, 1));
    assert.strictEqual(error._tag, "IndexOutOfBoundsError");
    assert.strictEqual(error.index, 2);
    assert.strictEqual(error.size, 2);
  });

  it("refuses to grow past its limit", () => {
    const list = new MerkleizedList(Ssz.list(Ssz.uint8, 2), [1, 2]);

    const error = assertLeft(list.push(3));

    assert.strictEqual(error._tag, "InputExceedsLimitError");
    assert.strictEqual(error.count, 3);
    assert.strictEqual(list.length, 2);
  });

  it.effect("refuses to root more initial values than its limit", () =>
    Effect.gen(function* () {
      const htr = yield* HashTreeRoot;
      const Short = Ssz.list(Ssz.uint16, 3);
      const list = new MerkleizedList(Short, [1, 2, 3, 4]);

      const error = assertLeft(list.hashTreeRoot(htr.toolkit));

      assert.strictEqual(error._tag, "InputExceedsLimitError");
      assert.strictEqual(error.message, "list of 4 elements exceeds its limit 3");
      if (error._tag === "InputExceedsLimitError") {
        assert.strictEqual(error.limit, 3n);
        assert.strictEqual(error.count, 4);
      }
      assert.strictEqual(
        assertLeft(htr.hashTreeRoot(Short, [1, 2, 3, 4])).message,
        error.message
      );
      assert.isFalse(list.isCached);
    }).pipe(Effect.provide(MainLive))
  );

  it("pops nothing from an empty list", () => {
    assertNone(new MerkleizedList(Values).pop());
  });

  it.effect("reports a bad element at root time", () =>
    Effect.gen(function* () {
      const htr = yield* HashTreeRoot;
      const list = new MerkleizedList(Values, [1, 2]);
      assertRight(list.set(0, 70000));

      const error = assertLeft(list.hashTreeRoot(htr.toolkit));

      assert.strictEqual(error.message, "value 70000 does not fit in uint16");
    }).pipe(Effect.provide(MainLive))
  );
});
