import { Context, Effect, Layer, Schema } from "effect";
import { encodeUintLE } from "../../entities/encoding";
import * as Node from "../../entities/node";
import { NonNegativeIntSchema } from "../../entities/primitives";
import { HashingService, type HashNodesFn } from "./hash";

// ============================================================================
// CAPABILITY: DECORATION MIXER
// ============================================================================

/**
 * DecorationMixer capability — binds a length or a union selector into a root
 *
 * @category Capabilities
 * @since 0.1.0
 */
export class DecorationMixer extends Context.Tag(
  "@services/merkleization/DecorationMixer"
)<
  DecorationMixer,
  {
    readonly mixInLength: (root: Node.Node, length: number) => Node.Node;
    readonly mixInSelector: (root: Node.Node, selector: number) => Node.Node;
  }
>() {}

const validateDecoration = Schema.decodeSync(NonNegativeIntSchema);

/**
 * Hash tree root of a decoration: the uint256 little-endian chunk
 * @internal
 */
export const decorationRoot = (decoration: number): Node.Node =>
  Node.NodeSchema.make(
    encodeUintLE(BigInt(validateDecoration(decoration)), Node.BYTES_PER_CHUNK)
  );

/**
 * H(root || root(decoration)); a negative or fractional decoration is a defect
 * @internal
 */
export const mixInDecorationPure = (
  root: Node.Node,
  decoration: number,
  hashNodes: HashNodesFn
): Node.Node => hashNodes(root, decorationRoot(decoration));

/**
 * Live implementation of DecorationMixer
 *
 * @category Services
 * @since 0.1.0
 */
export const DecorationMixerLive = Layer.effect(
  DecorationMixer,
  Effect.gen(function* () {
    const hashing = yield* HashingService;

    return DecorationMixer.of({
      mixInLength: (root, length) =>
        mixInDecorationPure(root, length, hashing.hashNodes),
      mixInSelector: (root, selector) =>
        mixInDecorationPure(root, selector, hashing.hashNodes),
    });
  })
);
