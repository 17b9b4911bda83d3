/**
 * Higher-Kinded Types for @adt-prelude/prelude
 *
 * Type-level functions for the prelude's data types, built on the encoding
 * from `@adt-prelude/type-system`.
 *
 * For Either<E, A> the error type is fixed and the value type varies:
 *
 * ```typescript
 * type Parsed = Kind<EitherF<string>, number>; // → Either<string, number>
 * ```
 */

export type { $, Kind, TypeFunction } from "@adt-prelude/type-system";

import type { TypeFunction } from "@adt-prelude/type-system";
import type { Maybe } from "./data/maybe.js";
import type { Either } from "./data/either.js";

/**
 * Type-level function for `Maybe<A>`.
 */
export interface MaybeF extends TypeFunction {
  readonly _: Maybe<this["__kind__"]>;
}

/**
 * Type-level function for `Either<E, A>` with E fixed.
 */
export interface EitherF<E> extends TypeFunction {
  readonly _: Either<E, this["__kind__"]>;
}
