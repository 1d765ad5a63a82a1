/**
 * @module backends/secure-entropy
 * @description CSPRNG-backed entropy source for session identifiers.
 *
 * Delegates to @noble/hashes `randomBytes`, which reads from the
 * platform's `crypto.getRandomValues`. The source holds no state, so one
 * shared instance serves every caller.
 */

import { randomBytes } from "@noble/hashes/utils";
import type { IEntropySource } from "../interfaces/entropy.js";

/**
 * SecureRandomSource — production IEntropySource.
 *
 * @example
 * ```ts
 * const id = generateSessionId(new SecureRandomSource());
 * ```
 */
export class SecureRandomSource implements IEntropySource {
  randomBytes(length: number): Uint8Array {
    return randomBytes(length);
  }
}

/** Default process-wide entropy source. */
export const secureRandom: IEntropySource = new SecureRandomSource();
