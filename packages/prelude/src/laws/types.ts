/**
 * Law Definition Types
 *
 * Laws are predicates that must hold for all valid implementations of a
 * typeclass. They are plain data, checked at runtime against sample inputs
 * with `verifyLaw`.
 *
 * @module
 */

/**
 * A law definition.
 *
 * @template Args - Tuple type of the law's input arguments
 *
 * @example
 * ```typescript
 * const identity: Law<[Maybe<number>]> = {
 *   name: "identity",
 *   check: (fa) => fa.fmap((a) => a).equals(fa),
 * };
 * ```
 */
export interface Law<Args extends unknown[] = unknown[]> {
  /**
   * Human-readable name of the law.
   * Used in error messages and test descriptions.
   */
  readonly name: string;

  /**
   * Optional description explaining the law in plain English.
   */
  readonly description?: string;

  /**
   * The law predicate. Returns true if the law holds for the given inputs.
   */
  check(...args: Args): boolean;
}

/**
 * Outcome of checking one law against a list of cases.
 */
export type LawVerificationResult =
  | {
      readonly status: "passed";
      readonly law: string;
      readonly cases: number;
    }
  | {
      readonly status: "failed";
      readonly law: string;
      readonly counterexample: string;
    };
