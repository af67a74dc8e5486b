import * as Either from "effect/Either";
import * as Option from "effect/Option";
import { assert } from "@effect/vitest";
import * as Node from "../../src/entities/node";

/**
 * Assert that an Option is Some and return its value.
 * Fails the test if the Option is None.
 */
export const assertSome = <T>(
  option: Option.Option<T>,
  message: string = "Expected Some, got None"
): T => {
  return Option.match(option, {
    onNone: () => assert.fail(message),
    onSome: (value) => value,
  });
};

/**
 * Assert that an Option is None.
 * Fails the test if the Option is Some.
 */
export const assertNone = <T>(
  option: Option.Option<T>,
  message: string = "Expected None, got Some"
): void => {
  Option.match(option, {
    onNone: () => {},
    onSome: () => assert.fail(message),
  });
};

/**
 * Assert that an Either is Right and return its value.
 */
export const assertRight = <R, L>(either: Either.Either<R, L>): R =>
  Either.match(either, {
    onLeft: (error) => assert.fail(`Expected Right, got Left: ${String(error)}`),
    onRight: (value) => value,
  });

/**
 * Assert that an Either is Left and return its error.
 */
export const assertLeft = <R, L>(either: Either.Either<R, L>): L =>
  Either.match(either, {
    onLeft: (error) => error,
    onRight: () => assert.fail("Expected Left, got Right"),
  });

/**
 * Compare two nodes by hex, so a failure prints both roots
 */
export const assertNode = (actual: Uint8Array, expectedHex: string): void => {
  assert.strictEqual(Node.toHex(Node.fromBytes(actual)), expectedHex);
};

/**
 * A chunk buffer of `count` chunks, every byte of chunk i set to fill(i)
 */
export const filledChunks = (
  count: number,
  fill: (index: number) => number
): Uint8Array => {
  const bytes = new Uint8Array(count * Node.BYTES_PER_CHUNK);
  for (let i = 0; i < count; i++) {
    bytes.fill(fill(i), i * Node.BYTES_PER_CHUNK, (i + 1) * Node.BYTES_PER_CHUNK);
  }
  return bytes;
};
