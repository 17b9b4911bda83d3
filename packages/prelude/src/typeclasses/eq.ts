/**
 * Eq Typeclass
 *
 * Laws:
 *   - Reflexivity: eqv(x, x) === true
 *   - Symmetry: eqv(x, y) === eqv(y, x)
 *   - Transitivity: eqv(x, y) && eqv(y, z) => eqv(x, z)
 */

// ============================================================================
// Eq
// ============================================================================

/**
 * Eq typeclass - equality comparison
 *
 * @example
 * ```typescript
 * const eq = getEq(eqNumber);
 * eq.eqv(Just(1), Just(1)); // true
 * ```
 */
export interface Eq<A> {
  readonly eqv: (x: A, y: A) => boolean;
}

// ============================================================================
// Eq Combinators
// ============================================================================

/**
 * Eq that uses strict equality
 */
export function eqStrict<A>(): Eq<A> {
  return {
    eqv: (x, y) => x === y,
  };
}

/**
 * Eq by mapping to a comparable value
 */
export function eqBy<A, B>(E: Eq<B>, f: (a: A) => B): Eq<A> {
  return {
    eqv: (x, y) => E.eqv(f(x), f(y)),
  };
}

/**
 * Eq for arrays (element-wise)
 */
export function eqArray<A>(E: Eq<A>): Eq<readonly A[]> {
  return {
    eqv: (xs, ys) => xs.length === ys.length && xs.every((x, i) => E.eqv(x, ys[i])),
  };
}

/**
 * Create an Eq instance from a custom equality function.
 */
export function makeEq<A>(eqv: (x: A, y: A) => boolean): Eq<A> {
  return { eqv };
}

/**
 * Negated equality
 */
export function neqv<A>(E: Eq<A>): (x: A, y: A) => boolean {
  return (x, y) => !E.eqv(x, y);
}

// ============================================================================
// Common Instances
// ============================================================================

export const eqString: Eq<string> = eqStrict();

/**
 * Uses Object.is, so NaN equals NaN and 0 differs from -0.
 */
export const eqNumber: Eq<number> = { eqv: Object.is };

export const eqBoolean: Eq<boolean> = eqStrict();
