/**
 * Merkleization walkthrough: a padded root, a branch through virtual
 * padding, a cached list under mutation and a container root.
 *
 * Environment:
 * - MERKLE_DEMO_CHUNKS       number of chunks to merkleize (default 70)
 * - MERKLE_DEMO_LIMIT_DEPTH  log2 of the declared capacity (default 63)
 * - LOG_LEVEL                minimum log level (default Info)
 */

import * as NodeRuntime from "@effect/platform-node/NodeRuntime";
import { Config, Effect, Logger, LogLevel, Option } from "effect";
import * as Chunks from "../src/entities/chunks";
import * as Node from "../src/entities/node";
import {
  HashTreeRoot,
  MainLive,
  MerkleDisplayService,
  MerkleizedList,
  Merkleizer,
  MerkleProofService,
  Packer,
  Ssz,
} from "../src";

const DemoConfig = Config.all({
  chunks: Config.integer("MERKLE_DEMO_CHUNKS").pipe(
    Config.withDefault(70),
    Config.validate({
      message: "must be a positive integer",
      validation: (n) => n > 0,
    })
  ),
  limitDepth: Config.integer("MERKLE_DEMO_LIMIT_DEPTH").pipe(
    Config.withDefault(63),
    Config.validate({
      message: `must be in [0, ${Chunks.MAX_MERKLE_TREE_DEPTH - 1}]`,
      validation: (n) => n >= 0 && n < Chunks.MAX_MERKLE_TREE_DEPTH,
    })
  ),
  logLevel: Config.logLevel("LOG_LEVEL").pipe(
    Config.withDefault(LogLevel.Info)
  ),
});

const banner = (title: string) =>
  Effect.logInfo(`${"=".repeat(70)}\n${title}\n${"=".repeat(70)}`);

const demonstration = (chunkCount: number, limitDepth: number) =>
  Effect.gen(function* () {
    const packer = yield* Packer;
    const merkleizer = yield* Merkleizer;
    const proofs = yield* MerkleProofService;
    const display = yield* MerkleDisplayService;
    const htr = yield* HashTreeRoot;

    // ------------------------------------------------------------------
    yield* banner("VIRTUAL PADDING");

    // chunk i is filled with the byte (i % 255) + 1
    const bytes = new Uint8Array(chunkCount * Node.BYTES_PER_CHUNK);
    for (let i = 0; i < chunkCount; i++) {
      bytes.fill(
        (i % 255) + 1,
        i * Node.BYTES_PER_CHUNK,
        (i + 1) * Node.BYTES_PER_CHUNK
      );
    }
    const chunks = packer.packBytes(bytes);
    const leafCount = Chunks.leafCountAtDepth(limitDepth);

    const root = yield* merkleizer.merkleize(chunks, Option.some(leafCount));
    yield* display.displayStats(chunks, leafCount, root);

    // ------------------------------------------------------------------
    yield* banner("MERKLE BRANCH");

    const index = Math.min(5, chunkCount - 1);
    const proof = yield* proofs.generateBranch(chunks, leafCount, index);
    yield* display.displayProof(proof);
    yield* Effect.logInfo(display.displayBranch(proof));

    yield* proofs.validateBranch(proof).pipe(
      Effect.zipRight(Effect.logInfo("Verification: VALID")),
      Effect.catchAll((error) =>
        Effect.logWarning(`Verification: INVALID (${error.message})`)
      )
    );

    const tampered = Uint8Array.from(proof.leaf);
    tampered[0] ^= 0xff;
    yield* proofs
      .validateBranch({ ...proof, leaf: Node.fromBytes(tampered) })
      .pipe(
        Effect.zipRight(Effect.logWarning("Tampered leaf: VALID")),
        Effect.catchTag("InvalidProofError", (error) =>
          Effect.logInfo(
            `Tampered leaf: INVALID (root ${error.actual.slice(0, 16)}...)`
          )
        )
      );

    // ------------------------------------------------------------------
    yield* banner("INCREMENTAL HASHING");

    const Balances = Ssz.list(Ssz.uint64, 1 << 20);
    const balances = new MerkleizedList(
      Balances,
      Array.from({ length: 1000 }, (_, i) => BigInt(i) * 1_000_000n)
    );

    const before = yield* balances.hashTreeRoot(htr.toolkit);
    yield* Effect.logInfo(`Balances root:    ${Node.toHex(before)}`);

    yield* balances.set(500, 42n);
    yield* Effect.logDebug(`cache valid after set: ${balances.isCached}`);
    const after = yield* balances.hashTreeRoot(htr.toolkit);
    const rebuilt = yield* htr.hashTreeRoot(Balances, balances.toArray());
    yield* Effect.logInfo(`After one write:  ${Node.toHex(after)}`);
    yield* Effect.logInfo(
      `Matches a full rebuild: ${Node.NodeEquivalence(after, rebuilt)}`
    );

    // ------------------------------------------------------------------
    yield* banner("CONTAINERS AND UNIONS");

    const Checkpoint = Ssz.container({
      epoch: Ssz.uint64,
      root: Ssz.root,
    });
    const Vote = Ssz.union({
      None: Ssz.boolean,
      Checkpoint,
    });

    const vote = yield* htr.hashTreeRoot(Vote, {
      _tag: "Checkpoint",
      value: { epoch: 7n, root },
    });
    yield* Effect.logInfo(`Vote root:        ${Node.toHex(vote)}`);
  });

const program = Effect.gen(function* () {
  const config = yield* DemoConfig;
  yield* demonstration(config.chunks, config.limitDepth).pipe(
    Logger.withMinimumLogLevel(config.logLevel)
  );
});

program.pipe(
  Effect.provide(MainLive),
  Effect.provide(Logger.pretty),
  NodeRuntime.runMain
);
