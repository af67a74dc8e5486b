/**
 * MerkleizedList: a list value that owns its hash cache
 *
 * Element writes mark only the affected chunk dirty; pushes and pops change
 * the chunk layout and drop the cache.
 *
 * @module HashTreeRoot/List
 * @since 0.1.0
 */

import { Either, Option } from "effect";
import {
  IndexOutOfBoundsError,
  InputExceedsLimitError,
  type MerkleizationError,
} from "../../entities/errors";
import type * as Node from "../../entities/node";
import { MerkleCache } from "../merkleization/cache";
import type { ListType, Toolkit } from "./types";

/**
 * @category Models
 * @since 0.1.0
 */
export class MerkleizedList<T> {
  private readonly values: T[];
  private readonly cache = new MerkleCache();

  constructor(
    readonly type: ListType<T>,
    values: Iterable<T> = []
  ) {
    this.values = Array.from(values);
  }

  get length(): number {
    return this.values.length;
  }

  /**
   * True when the next `hashTreeRoot` is served from the cache
   */
  get isCached(): boolean {
    return this.cache.isValid;
  }

  toArray(): ReadonlyArray<T> {
    return [...this.values];
  }

  get(index: number): Option.Option<T> {
    return this.inBounds(index)
      ? Option.some(this.values[index])
      : Option.none();
  }

  set(index: number, value: T): Either.Either<void, IndexOutOfBoundsError> {
    if (!this.inBounds(index)) {
      return Either.left(
        new IndexOutOfBoundsError({
          message: `Index ${index} out of bounds for list of length ${this.values.length}`,
          index: Number.isInteger(index) ? index : -1,
          size: this.values.length,
        })
      );
    }
    this.values[index] = value;
    this.cache.invalidate(this.type.chunkIndexOf(index));
    return Either.right<void>(undefined);
  }

  push(value: T): Either.Either<void, InputExceedsLimitError> {
    if (this.values.length >= this.type.limit) {
      return Either.left(
        new InputExceedsLimitError({
          message: `list is full at its limit ${this.type.limit}`,
          limit: BigInt(this.type.limit),
          count: this.values.length + 1,
        })
      );
    }
    this.values.push(value);
    this.cache.invalidateAll();
    return Either.right<void>(undefined);
  }

  pop(): Option.Option<T> {
    if (this.values.length === 0) return Option.none();
    const last = this.values[this.values.length - 1];
    this.values.length -= 1;
    this.cache.invalidateAll();
    return Option.some(last);
  }

  hashTreeRoot(
    toolkit: Toolkit
  ): Either.Either<Node.Node, MerkleizationError> {
    const length = this.values.length;
    if (length > this.type.limit) {
      return Either.left(
        new InputExceedsLimitError({
          message: `list of ${length} elements exceeds its limit ${this.type.limit}`,
          limit: BigInt(this.type.limit),
          count: length,
        })
      );
    }
    return Either.map(
      toolkit.merkleizeCached(
        this.cache,
        this.type.chunkCount(length),
        Option.some(this.type.chunkLimit),
        (index) => this.type.chunkAt(this.values, index, toolkit)
      ),
      (root) => toolkit.mixInLength(root, length)
    );
  }

  private inBounds(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.values.length;
  }
}
