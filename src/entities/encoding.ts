/**
 * Little-endian encodings of basic values, as they appear inside chunks
 *
 * @module Encoding
 * @since 0.1.0
 */

/**
 * Encode an unsigned integer into `byteLength` little-endian bytes.
 * Callers check the range; bits beyond `byteLength` are dropped.
 */
export const encodeUintLE = (value: bigint, byteLength: number): Uint8Array => {
  const out = new Uint8Array(byteLength);
  let rest = value;
  for (let i = 0; i < byteLength && rest > 0n; i++) {
    out[i] = Number(rest & 0xffn);
    rest >>= 8n;
  }
  return out;
};

export const fitsInBytes = (value: bigint, byteLength: number): boolean =>
  value >= 0n && value < 1n << BigInt(8 * byteLength);

/**
 * Pack bits LSB-first: bit `i` lands in byte `i / 8` at position `i % 8`
 */
export const packBits = (bits: ReadonlyArray<boolean>): Uint8Array => {
  const out = new Uint8Array(Math.ceil(bits.length / 8));
  bits.forEach((bit, i) => {
    if (bit) out[i >> 3] |= 1 << (i & 7);
  });
  return out;
};
