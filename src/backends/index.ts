/**
 * @module backends
 * @description Digest and entropy backends for the codec.
 */

export { SecureRandomSource, secureRandom } from "./secure-entropy.js";
export * from "./digest.js";
