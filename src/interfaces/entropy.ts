/**
 * @module interfaces/entropy
 * @description IEntropySource — where session identifiers get their bits.
 *
 * Production code uses a CSPRNG-backed source. Tests inject a source that
 * returns fixed bytes so generated identifiers are reproducible.
 */

/**
 * @interface IEntropySource
 * @description Supplier of random bytes. Must be safe to call from any
 * number of independent callers; one read is made per generated id.
 */
export interface IEntropySource {
  /**
   * @query
   * @description Returns `length` fresh random bytes.
   * @postcondition The returned array has exactly `length` bytes.
   */
  randomBytes(length: number): Uint8Array;
}
