/**
 * Runtime law verification
 *
 * @module
 */

import type { Law, LawVerificationResult } from "./types.js";
import { showUnknown } from "../typeclasses/show.js";
import { LawViolationError } from "../errors.js";

/**
 * Check a law against every case, stopping at the first counterexample.
 *
 * @example
 * ```typescript
 * verifyLaw(laws.identity, [[Just(1)], [Nothing()]]);
 * // → { status: "passed", law: "identity", cases: 2 }
 * ```
 */
export function verifyLaw<Args extends unknown[]>(
  law: Law<Args>,
  cases: readonly Args[],
): LawVerificationResult {
  for (const args of cases) {
    if (!law.check(...args)) {
      return {
        status: "failed",
        law: law.name,
        counterexample: args.map((arg) => showUnknown.show(arg)).join(", "),
      };
    }
  }
  return { status: "passed", law: law.name, cases: cases.length };
}

/**
 * Throw for the first failed verification result.
 *
 * @throws {LawViolationError}
 */
export function assertLaws(results: readonly LawVerificationResult[]): void {
  for (const result of results) {
    if (result.status === "failed") {
      throw new LawViolationError(result.law, result.counterexample);
    }
  }
}
