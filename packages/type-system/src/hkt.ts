/**
 * Higher-Kinded Types via Type Functions
 *
 * TypeScript has no native way to abstract over a type constructor such as
 * `Maybe<_>`. This module encodes one as an interface whose `_` member mentions
 * `this["__kind__"]`; applying the function means intersecting it with a
 * concrete `__kind__` and reading `_` back out.
 *
 * ```typescript
 * interface MaybeF extends TypeFunction {
 *   readonly _: Maybe<this["__kind__"]>;
 * }
 *
 * type MaybeNumber = Kind<MaybeF, number>; // → Maybe<number>
 * ```
 *
 * Unlike a phantom marker, `Kind` resolves to the concrete type during
 * ordinary type checking, so typeclass instances are written against
 * `Maybe<A>` directly with no coercions and no build-time rewriting.
 *
 * ## Multi-arity type constructors
 *
 * For type constructors with multiple parameters, fix all but one:
 *
 * ```typescript
 * // Either<E, A> - fix E, vary A
 * interface EitherF<E> extends TypeFunction {
 *   readonly _: Either<E, this["__kind__"]>;
 * }
 *
 * // Kind<EitherF<string>, number> → Either<string, number>
 * ```
 */

// ============================================================================
// Core HKT Encoding
// ============================================================================

/**
 * Base interface for type-level functions.
 *
 * `__kind__` is the argument slot; `_` is the result, written in terms of
 * `this["__kind__"]`.
 */
export interface TypeFunction {
  readonly __kind__: unknown;
  readonly _: unknown;
}

/**
 * Apply the type function F to A.
 *
 * @example
 * ```typescript
 * type Numbers = Kind<ArrayF, number>; // Array<number>
 * ```
 */
export type Kind<F extends TypeFunction, A> = (F & { readonly __kind__: A })["_"];

/**
 * Alias for `Kind<F, A>`, shorthand syntax.
 */
export type $<F extends TypeFunction, A> = Kind<F, A>;

// ============================================================================
// Built-in Type-Level Functions
// ============================================================================

/**
 * Type-level function for `Array<A>`.
 */
export interface ArrayF extends TypeFunction {
  readonly _: Array<this["__kind__"]>;
}

/**
 * Type-level function for `ReadonlyArray<A>`.
 */
export interface ReadonlyArrayF extends TypeFunction {
  readonly _: ReadonlyArray<this["__kind__"]>;
}
