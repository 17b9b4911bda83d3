/**
 * Monad Typeclass
 *
 * Monad adds `pure` and `bind` to Functor - sequencing computations whose
 * next step depends on the previous result.
 *
 * Laws:
 *   - Left identity: M.bind(M.pure(a), f) === f(a)
 *   - Right identity: M.bind(m, M.pure) === m
 *   - Associativity: M.bind(M.bind(m, f), g) === M.bind(m, a => M.bind(f(a), g))
 */

import type { Kind, TypeFunction } from "../hkt.js";
import type { Functor } from "./functor.js";

// ============================================================================
// Monad
// ============================================================================

/**
 * Monad typeclass
 */
export interface Monad<F extends TypeFunction> extends Functor<F> {
  readonly pure: <A>(a: A) => Kind<F, A>;
  readonly bind: <A, B>(fa: Kind<F, A>, f: (a: A) => Kind<F, B>) => Kind<F, B>;
}

// ============================================================================
// Derived Operations
// ============================================================================

/**
 * Flatten a nested structure
 */
export function flatten<F extends TypeFunction>(
  M: Monad<F>,
): <A>(ffa: Kind<F, Kind<F, A>>) => Kind<F, A> {
  return <A>(ffa: Kind<F, Kind<F, A>>) => M.bind<Kind<F, A>, A>(ffa, (fa) => fa);
}

/**
 * Run a dependent computation for its effect and keep the original value
 */
export function flatTap<F extends TypeFunction>(
  M: Monad<F>,
): <A, B>(fa: Kind<F, A>, f: (a: A) => Kind<F, B>) => Kind<F, A> {
  return <A, B>(fa: Kind<F, A>, f: (a: A) => Kind<F, B>) =>
    M.bind<A, A>(fa, (a) => M.fmap<B, A>(f(a), () => a));
}

// ============================================================================
// Instance Creators
// ============================================================================

/**
 * Create a Monad instance from pure and bind, deriving fmap
 */
export function makeMonad<F extends TypeFunction>(
  pure: <A>(a: A) => Kind<F, A>,
  bind: <A, B>(fa: Kind<F, A>, f: (a: A) => Kind<F, B>) => Kind<F, B>,
): Monad<F> {
  return {
    pure,
    bind,
    fmap: <A, B>(fa: Kind<F, A>, f: (a: A) => B) => bind<A, B>(fa, (a) => pure(f(a))),
  };
}
