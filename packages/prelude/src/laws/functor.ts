/**
 * Functor Laws
 *
 * Functor Laws:
 *   - Identity: F.fmap(fa, a => a) === fa
 *   - Composition: F.fmap(F.fmap(fa, f), g) === F.fmap(fa, a => g(f(a)))
 *
 * @module
 */

import type { Functor } from "../typeclasses/functor.js";
import type { Eq } from "../typeclasses/eq.js";
import type { Kind, TypeFunction } from "../hkt.js";
import type { Law } from "./types.js";

export interface FunctorLaws<F extends TypeFunction, A> {
  readonly identity: Law<[Kind<F, A>]>;
  readonly composition: Law<[Kind<F, A>, (a: A) => A, (a: A) => A]>;
}

/**
 * Generate laws for a Functor instance.
 *
 * @param Fn - The Functor instance to verify
 * @param EqFA - Eq instance for comparing F[A] values
 *
 * @example
 * ```typescript
 * const laws = functorLaws<MaybeF, number>(maybeFunctor, MaybeOps.getEq(eqNumber));
 * verifyLaw(laws.identity, [[Just(1)], [Nothing()]]);
 * ```
 */
export function functorLaws<F extends TypeFunction, A>(
  Fn: Functor<F>,
  EqFA: Eq<Kind<F, A>>,
): FunctorLaws<F, A> {
  return {
    identity: {
      name: "identity",
      description: "Mapping identity preserves structure: F.fmap(fa, a => a) === fa",
      check: (fa) =>
        EqFA.eqv(
          Fn.fmap<A, A>(fa, (a) => a),
          fa,
        ),
    },
    composition: {
      name: "composition",
      description: "Mapping composes: F.fmap(F.fmap(fa, f), g) === F.fmap(fa, a => g(f(a)))",
      check: (fa, f, g) =>
        EqFA.eqv(
          Fn.fmap<A, A>(Fn.fmap<A, A>(fa, f), g),
          Fn.fmap<A, A>(fa, (a) => g(f(a))),
        ),
    },
  };
}
