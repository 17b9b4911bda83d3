/**
 * @adt-prelude/prelude: Maybe and Either for TypeScript
 *
 * Two algebraic data types with functor and monad-style combinators:
 * - Maybe<A>: `Just(value)` or `Nothing()`
 * - Either<E, A>: `Left(error)` or `Right(value)`, plus `wrapError` for
 *   turning expected exceptions into Left values
 *
 * @example
 * ```typescript
 * import { Just, Nothing, Left, Right, wrapError } from "@adt-prelude/prelude";
 *
 * Just(2).fmap((x) => x * 3);               // Just(6)
 * Nothing<number>().fmap((x) => x * 3);     // Nothing
 *
 * Right<string, number>(4)
 *   .bind((n) => (n > 0 ? Right(Math.sqrt(n)) : Left("negative")))
 *   .fromRight((e) => { throw new Error(e); }); // 2
 *
 * wrapError([SyntaxError], () => JSON.parse(input)); // Either<SyntaxError, unknown>
 * ```
 */

// ============================================================================
// HKT Foundation
// ============================================================================

export type { $, Kind, TypeFunction, MaybeF, EitherF } from "./hkt.js";

// ============================================================================
// Data Types
// ============================================================================

export {
  Just,
  Nothing,
  fromNullable,
  isJust,
  isNothing,
  maybeFunctor,
  maybeMonad,
  MaybeOps,
  Left,
  Right,
  wrapError,
  isLeft,
  isRight,
  eitherFunctor,
  eitherMonad,
  EitherOps,
  maybeToEither,
  eitherToMaybe,
} from "./data/index.js";
export type { Maybe, Either, ErrorKind } from "./data/index.js";

// ============================================================================
// Typeclasses - namespace export to avoid collisions
// ============================================================================

export * as TC from "./typeclasses/index.js";
export type { Functor, Monad, Eq, Show } from "./typeclasses/index.js";
export { eqStrict, eqNumber, eqString, eqBoolean } from "./typeclasses/eq.js";
export { showString, showNumber, showBoolean, showUnknown } from "./typeclasses/show.js";

// ============================================================================
// Typeclass Laws
// ============================================================================

export { functorLaws, monadLaws, verifyLaw, assertLaws } from "./laws/index.js";
export type { Law, LawVerificationResult, FunctorLaws, MonadLaws } from "./laws/index.js";

// ============================================================================
// Errors and Configuration
// ============================================================================

export { PreludeError, MissingCallbackError, WrongVariantError, LawViolationError } from "./errors.js";
export type { Channel } from "./errors.js";
export { config } from "./config.js";
export type { PreludeConfig, ResolvedPreludeConfig, ConfigPath } from "./config.js";
