/**
 * Monad Laws
 *
 * Monad Laws:
 *   - Left identity: M.bind(M.pure(a), f) === f(a)
 *   - Right identity: M.bind(fa, M.pure) === fa
 *   - Associativity: M.bind(M.bind(fa, f), g) === M.bind(fa, a => M.bind(f(a), g))
 *
 * @module
 */

import type { Monad } from "../typeclasses/monad.js";
import type { Eq } from "../typeclasses/eq.js";
import type { Kind, TypeFunction } from "../hkt.js";
import type { Law } from "./types.js";
import { functorLaws, type FunctorLaws } from "./functor.js";

export interface MonadLaws<F extends TypeFunction, A> extends FunctorLaws<F, A> {
  readonly leftIdentity: Law<[A, (a: A) => Kind<F, A>]>;
  readonly rightIdentity: Law<[Kind<F, A>]>;
  readonly associativity: Law<[Kind<F, A>, (a: A) => Kind<F, A>, (a: A) => Kind<F, A>]>;
  readonly fmapFromBind: Law<[Kind<F, A>, (a: A) => A]>;
}

/**
 * Generate laws for a Monad instance, including its Functor laws.
 *
 * @param M - The Monad instance to verify
 * @param EqFA - Eq instance for comparing F[A] values
 */
export function monadLaws<F extends TypeFunction, A>(M: Monad<F>, EqFA: Eq<Kind<F, A>>): MonadLaws<F, A> {
  return {
    ...functorLaws<F, A>(M, EqFA),
    leftIdentity: {
      name: "left identity",
      description: "pure is left identity for bind: M.bind(M.pure(a), f) === f(a)",
      check: (a, f) => EqFA.eqv(M.bind<A, A>(M.pure(a), f), f(a)),
    },
    rightIdentity: {
      name: "right identity",
      description: "pure is right identity for bind: M.bind(fa, M.pure) === fa",
      check: (fa) =>
        EqFA.eqv(
          M.bind<A, A>(fa, (a) => M.pure(a)),
          fa,
        ),
    },
    associativity: {
      name: "associativity",
      description:
        "bind is associative: M.bind(M.bind(fa, f), g) === M.bind(fa, a => M.bind(f(a), g))",
      check: (fa, f, g) =>
        EqFA.eqv(
          M.bind<A, A>(M.bind<A, A>(fa, f), g),
          M.bind<A, A>(fa, (a) => M.bind<A, A>(f(a), g)),
        ),
    },
    fmapFromBind: {
      name: "fmap derived from bind",
      description: "fmap agrees with bind and pure: M.fmap(fa, f) === M.bind(fa, a => M.pure(f(a)))",
      check: (fa, f) =>
        EqFA.eqv(
          M.fmap<A, A>(fa, f),
          M.bind<A, A>(fa, (a) => M.pure(f(a))),
        ),
    },
  };
}
