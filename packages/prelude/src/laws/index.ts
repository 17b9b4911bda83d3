/**
 * Law Definitions
 *
 * Laws are data, not just comments: each law is a named predicate that can
 * be checked against sample inputs.
 *
 * ## Usage
 *
 * ```typescript
 * import { monadLaws, verifyLaw, assertLaws } from "@adt-prelude/prelude";
 *
 * const laws = monadLaws<MaybeF, number>(maybeMonad, MaybeOps.getEq(eqNumber));
 * assertLaws([
 *   verifyLaw(laws.identity, [[Just(1)], [Nothing()]]),
 *   verifyLaw(laws.leftIdentity, [[1, (n) => Just(n + 1)]]),
 * ]);
 * ```
 *
 * @module
 */

export type { Law, LawVerificationResult } from "./types.js";

export { functorLaws } from "./functor.js";
export type { FunctorLaws } from "./functor.js";

export { monadLaws } from "./monad.js";
export type { MonadLaws } from "./monad.js";

export { verifyLaw, assertLaws } from "./verify.js";
