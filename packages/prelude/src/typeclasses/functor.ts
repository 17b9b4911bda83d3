/**
 * Functor Typeclass
 *
 * A type class of types that can be mapped over.
 * Instances must satisfy the following laws:
 *   - Identity: F.fmap(fa, a => a) === fa
 *   - Composition: F.fmap(F.fmap(fa, f), g) === F.fmap(fa, a => g(f(a)))
 *
 * All derived operations accept the typeclass dictionary as the first argument.
 */

import type { Kind, TypeFunction } from "../hkt.js";

// ============================================================================
// Functor
// ============================================================================

/**
 * Functor typeclass interface.
 */
export interface Functor<F extends TypeFunction> {
  readonly fmap: <A, B>(fa: Kind<F, A>, f: (a: A) => B) => Kind<F, B>;
}

// ============================================================================
// Derived Operations
// ============================================================================

/**
 * Replace all A values with a constant B value
 */
export function as<F extends TypeFunction>(F: Functor<F>): <A, B>(fa: Kind<F, A>, b: B) => Kind<F, B> {
  return <A, B>(fa: Kind<F, A>, b: B) => F.fmap<A, B>(fa, () => b);
}

/**
 * Lift a function to work on Functor values
 */
export function lift<F extends TypeFunction>(
  F: Functor<F>,
): <A, B>(f: (a: A) => B) => (fa: Kind<F, A>) => Kind<F, B> {
  return <A, B>(f: (a: A) => B) =>
    (fa: Kind<F, A>) =>
      F.fmap<A, B>(fa, f);
}

// ============================================================================
// Instance Creators
// ============================================================================

/**
 * Create a Functor instance from an fmap function
 */
export function makeFunctor<F extends TypeFunction>(
  fmap: <A, B>(fa: Kind<F, A>, f: (a: A) => B) => Kind<F, B>,
): Functor<F> {
  return { fmap };
}
