/**
 * Data Types Index
 *
 * Re-exports the data types of @adt-prelude/prelude.
 *
 * - Types: `Maybe<A>`, `Either<E, A>`
 * - Constructors: `Just(...)`, `Nothing()`, `Left(...)`, `Right(...)`, `wrapError(...)`
 * - Module namespaces for the rest: `MaybeOps.getEq(...)`, `EitherOps.getShow(...)`
 */

// ============================================================================
// Maybe: Optional values
// ============================================================================

export { Just, Nothing, fromNullable, isJust, isNothing, maybeFunctor, maybeMonad } from "./maybe.js";
export type { Maybe } from "./maybe.js";
export * as MaybeOps from "./maybe.js";

// ============================================================================
// Either: Typed error handling
// ============================================================================

export {
  Left,
  Right,
  wrapError,
  isLeft,
  isRight,
  eitherFunctor,
  eitherMonad,
} from "./either.js";
export type { Either, ErrorKind } from "./either.js";
export * as EitherOps from "./either.js";

// ============================================================================
// Conversions
// ============================================================================

export { maybeToEither, eitherToMaybe } from "./conversions.js";
