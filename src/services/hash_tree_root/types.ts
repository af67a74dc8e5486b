/**
 * Type descriptors: one hashing capability per kind of value
 *
 * Every descriptor implements `hashTreeRoot(value, toolkit)` with the fixed
 * packing and decoration policy of its kind:
 *
 * - **Basic**: the value's little-endian bytes as one padded chunk
 * - **Vector**: packed elements (basic) or element roots (composite)
 * - **List**: as vector, under a declared limit, mixed with the length
 * - **Bitvector / Bitlist**: bits packed LSB-first; bit-lists mix the length
 * - **Container**: field roots in declaration order
 * - **Union**: the variant's root mixed with its selector
 *
 * @module HashTreeRoot/Types
 * @since 0.1.0
 */

import { Either, Option } from "effect";
import type * as Chunks from "../../entities/chunks";
import { encodeUintLE, fitsInBytes, packBits } from "../../entities/encoding";
import {
  InputExceedsLimitError,
  type MerkleizationError,
  SerializationError,
} from "../../entities/errors";
import * as Node from "../../entities/node";
import type { ChunkAt, MerkleCache } from "../merkleization/cache";
import type { Serializer } from "../merkleization/pack";

// ============================================================================
// TOOLKIT
// ============================================================================

/**
 * The engine operations a descriptor needs, bound to one hashing service
 * and one zero-hash table
 */
export interface Toolkit {
  readonly pack: <A>(
    values: Iterable<A>,
    serialize: Serializer<A>
  ) => Either.Either<Chunks.ChunkBuffer, SerializationError>;
  readonly packBytes: (buffer: Uint8Array) => Chunks.ChunkBuffer;
  readonly merkleize: (
    chunks: Chunks.ChunkBuffer,
    limit: Option.Option<bigint>
  ) => Either.Either<Node.Node, InputExceedsLimitError>;
  readonly merkleizeCached: (
    cache: MerkleCache,
    chunkCount: number,
    limit: Option.Option<bigint>,
    chunkAt: ChunkAt
  ) => Either.Either<Node.Node, MerkleizationError>;
  readonly mixInLength: (root: Node.Node, length: number) => Node.Node;
  readonly mixInSelector: (root: Node.Node, selector: number) => Node.Node;
}

// ============================================================================
// DESCRIPTORS
// ============================================================================

export type SszKind =
  | "Basic"
  | "Vector"
  | "List"
  | "Bitvector"
  | "Bitlist"
  | "Container"
  | "Union";

export interface SszType<T> {
  readonly _tag: SszKind;
  readonly hashTreeRoot: (
    value: T,
    toolkit: Toolkit
  ) => Either.Either<Node.Node, MerkleizationError>;
}

export type TypeOf<S> = S extends SszType<infer T> ? T : never;

export interface BasicType<T> extends SszType<T> {
  readonly _tag: "Basic";
  readonly byteLength: number;
  readonly serialize: Serializer<T>;
}

export interface VectorType<T> extends SszType<ReadonlyArray<T>> {
  readonly _tag: "Vector";
  readonly element: SszType<T>;
  readonly length: number;
}

export interface ListType<T> extends SszType<ReadonlyArray<T>> {
  readonly _tag: "List";
  readonly element: SszType<T>;
  readonly limit: number;
  readonly chunkLimit: bigint;
  readonly chunkCount: (length: number) => number;
  readonly chunkIndexOf: (elementIndex: number) => number;
  readonly chunkAt: (
    values: ReadonlyArray<T>,
    index: number,
    toolkit: Toolkit
  ) => Either.Either<Uint8Array, MerkleizationError>;
}

export interface BitvectorType extends SszType<ReadonlyArray<boolean>> {
  readonly _tag: "Bitvector";
  readonly length: number;
}

export interface BitlistType extends SszType<ReadonlyArray<boolean>> {
  readonly _tag: "Bitlist";
  readonly limit: number;
}

export type Fields<S> = { readonly [K in keyof S]: SszType<S[K]> };

export interface ContainerType<S> extends SszType<S> {
  readonly _tag: "Container";
  readonly fields: Fields<S>;
}

/**
 * A union value: the active variant's name and its value
 */
export type UnionValue<S> = {
  readonly [K in keyof S]: { readonly _tag: K; readonly value: S[K] };
}[keyof S];

export interface UnionType<S> extends SszType<UnionValue<S>> {
  readonly _tag: "Union";
  readonly variants: Fields<S>;
}

export const isBasic = <T>(type: SszType<T>): type is BasicType<T> =>
  type._tag === "Basic";

// ============================================================================
// BASIC TYPES
// ============================================================================

const rootOfBasic =
  <T>(serialize: Serializer<T>) =>
  (value: T, toolkit: Toolkit): Either.Either<Node.Node, MerkleizationError> =>
    Either.flatMap(toolkit.pack([value], serialize), (chunks) =>
      toolkit.merkleize(chunks, Option.none())
    );

const uintType = <T extends number | bigint>(
  byteLength: number
): BasicType<T> => {
  const serialize: Serializer<T> = (value) => {
    if (typeof value === "number" && !Number.isSafeInteger(value)) {
      return Either.left(
        new SerializationError({
          message: `uint${8 * byteLength} value ${value} is not a safe integer`,
        })
      );
    }
    const big = BigInt(value);
    return fitsInBytes(big, byteLength)
      ? Either.right(encodeUintLE(big, byteLength))
      : Either.left(
          new SerializationError({
            message: `value ${big} does not fit in uint${8 * byteLength}`,
          })
        );
  };
  return {
    _tag: "Basic",
    byteLength,
    serialize,
    hashTreeRoot: rootOfBasic(serialize),
  };
};

export const uint8 = uintType<number>(1);
export const uint16 = uintType<number>(2);
export const uint32 = uintType<number>(4);
export const uint64 = uintType<bigint>(8);
export const uint128 = uintType<bigint>(16);
export const uint256 = uintType<bigint>(32);

const serializeBoolean: Serializer<boolean> = (value) =>
  Either.right(Uint8Array.of(value ? 1 : 0));

export const boolean: BasicType<boolean> = {
  _tag: "Basic",
  byteLength: 1,
  serialize: serializeBoolean,
  hashTreeRoot: rootOfBasic(serializeBoolean),
};

const serializeRoot: Serializer<Node.Node> = (value) =>
  Either.right(Uint8Array.from(value));

/**
 * A 32-byte root as a basic value: its hash tree root is itself
 */
export const root: BasicType<Node.Node> = {
  _tag: "Basic",
  byteLength: Node.BYTES_PER_CHUNK,
  serialize: serializeRoot,
  hashTreeRoot: rootOfBasic(serializeRoot),
};

// ============================================================================
// SEQUENCES
// ============================================================================

/**
 * Leaf layer of a sequence: packed bytes for basic elements, one root per
 * element otherwise
 */
const elementChunks = <T>(
  element: SszType<T>,
  values: ReadonlyArray<T>,
  toolkit: Toolkit
): Either.Either<Chunks.ChunkBuffer, MerkleizationError> => {
  if (isBasic(element)) return toolkit.pack(values, element.serialize);

  const buffer = new Uint8Array(values.length * Node.BYTES_PER_CHUNK);
  for (let i = 0; i < values.length; i++) {
    const elementRoot = element.hashTreeRoot(values[i], toolkit);
    if (Either.isLeft(elementRoot)) return Either.left(elementRoot.left);
    buffer.set(elementRoot.right, i * Node.BYTES_PER_CHUNK);
  }
  return Either.right(toolkit.packBytes(buffer));
};

const bitChunkLimit = (bits: number): bigint =>
  BigInt(Math.ceil(bits / (8 * Node.BYTES_PER_CHUNK)));

export const vector = <T>(element: SszType<T>, length: number): VectorType<T> => ({
  _tag: "Vector",
  element,
  length,
  hashTreeRoot: (values, toolkit) =>
    values.length !== length
      ? Either.left(
          new SerializationError({
            message: `vector expects ${length} elements, got ${values.length}`,
          })
        )
      : Either.flatMap(elementChunks(element, values, toolkit), (chunks) =>
          toolkit.merkleize(chunks, Option.none())
        ),
});

export const list = <T>(element: SszType<T>, limit: number): ListType<T> => {
  const perChunk = isBasic(element)
    ? Node.BYTES_PER_CHUNK / element.byteLength
    : 1;
  const chunkLimit = isBasic(element)
    ? BigInt(Math.ceil((limit * element.byteLength) / Node.BYTES_PER_CHUNK))
    : BigInt(limit);

  const tooLong = (length: number) =>
    new InputExceedsLimitError({
      message: `list of ${length} elements exceeds its limit ${limit}`,
      limit: BigInt(limit),
      count: length,
    });

  return {
    _tag: "List",
    element,
    limit,
    chunkLimit,
    chunkCount: (length) => Math.ceil(length / perChunk),
    chunkIndexOf: (elementIndex) => Math.floor(elementIndex / perChunk),
    chunkAt: (values, index, toolkit) =>
      elementChunks(
        element,
        values.slice(index * perChunk, (index + 1) * perChunk),
        toolkit
      ),
    hashTreeRoot: (values, toolkit) =>
      values.length > limit
        ? Either.left(tooLong(values.length))
        : elementChunks(element, values, toolkit).pipe(
            Either.flatMap((chunks) =>
              toolkit.merkleize(chunks, Option.some(chunkLimit))
            ),
            Either.map((listRoot) => toolkit.mixInLength(listRoot, values.length))
          ),
  };
};

export const bitvector = (length: number): BitvectorType => ({
  _tag: "Bitvector",
  length,
  hashTreeRoot: (bits, toolkit) =>
    bits.length !== length
      ? Either.left(
          new SerializationError({
            message: `bitvector expects ${length} bits, got ${bits.length}`,
          })
        )
      : toolkit.merkleize(
          toolkit.packBytes(packBits(bits)),
          Option.some(bitChunkLimit(length))
        ),
});

/**
 * Bits are packed without the delimiter bit of the serialized form; the
 * length is mixed in instead
 */
export const bitlist = (limit: number): BitlistType => ({
  _tag: "Bitlist",
  limit,
  hashTreeRoot: (bits, toolkit) =>
    bits.length > limit
      ? Either.left(
          new InputExceedsLimitError({
            message: `bitlist of ${bits.length} bits exceeds its limit ${limit}`,
            limit: BigInt(limit),
            count: bits.length,
          })
        )
      : Either.map(
          toolkit.merkleize(
            toolkit.packBytes(packBits(bits)),
            Option.some(bitChunkLimit(limit))
          ),
          (bitsRoot) => toolkit.mixInLength(bitsRoot, bits.length)
        ),
});

// ============================================================================
// CONTAINERS AND UNIONS
// ============================================================================

const keysOf = <S>(fields: Fields<S>): Array<Extract<keyof S, string>> =>
  Object.keys(fields) as Array<Extract<keyof S, string>>;

/**
 * Fields are hashed in declaration order
 */
export const container = <S extends object>(
  fields: Fields<S>
): ContainerType<S> => {
  const keys = keysOf(fields);

  return {
    _tag: "Container",
    fields,
    hashTreeRoot: (value, toolkit) => {
      const buffer = new Uint8Array(keys.length * Node.BYTES_PER_CHUNK);
      for (let i = 0; i < keys.length; i++) {
        const key = keys[i];
        const fieldRoot = fields[key].hashTreeRoot(value[key], toolkit);
        if (Either.isLeft(fieldRoot)) return Either.left(fieldRoot.left);
        buffer.set(fieldRoot.right, i * Node.BYTES_PER_CHUNK);
      }
      return toolkit.merkleize(toolkit.packBytes(buffer), Option.none());
    },
  };
};

/**
 * The selector of a variant is its declaration index
 */
export const union = <S extends object>(
  variants: Fields<S>
): UnionType<S> => {
  const keys = keysOf(variants);

  return {
    _tag: "Union",
    variants,
    hashTreeRoot: (selected, toolkit) => {
      const selector = keys.findIndex((key) => key === selected._tag);
      if (selector < 0) {
        return Either.left(
          new SerializationError({
            message: `unknown union variant ${String(selected._tag)}`,
          })
        );
      }
      return Either.map(
        variants[selected._tag].hashTreeRoot(selected.value, toolkit),
        (variantRoot) => toolkit.mixInSelector(variantRoot, selector)
      );
    },
  };
};
