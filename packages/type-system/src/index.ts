/**
 * @adt-prelude/type-system: type-level building blocks for @adt-prelude/prelude.
 *
 * Higher-kinded types via type functions (`Kind<F, A>`, shorthand `$<F, A>`)
 * so typeclasses such as Functor and Monad can abstract over `Maybe<_>` and
 * `Either<E, _>`.
 */

export type { TypeFunction, Kind, $, ArrayF, ReadonlyArrayF } from "./hkt.js";
