/**
 * Either Data Type
 *
 * Either represents a value of one of two possible types (a disjoint union).
 * An Either<E, A> is either Left<E> (representing failure/error) or Right<A> (representing success).
 * By convention, Right is the "right" (correct/success) case.
 *
 * Operations over the success channel (`fmap`, `bind`) short-circuit on Left;
 * operations over the error channel (`lmap`) short-circuit on Right.
 */

import type { EitherF, Kind } from "../hkt.js";
import type { Eq } from "../typeclasses/eq.js";
import type { Functor } from "../typeclasses/functor.js";
import type { Monad } from "../typeclasses/monad.js";
import type { Show } from "../typeclasses/show.js";
import { showUnknown } from "../typeclasses/show.js";
import { requireCallback } from "../callback.js";
import { WrongVariantError } from "../errors.js";
import { debugLog } from "../debug.js";

// ============================================================================
// Either Type Definition
// ============================================================================

/**
 * Either data type - either Left (error) or Right (success)
 */
export type Either<E, A> = Left<E, A> | Right<E, A>;

/**
 * Operations shared by both variants.
 */
interface EitherOps<E, A> {
  isLeft(): boolean;
  isRight(): boolean;

  /** Map over the Right value */
  fmap<B>(f: (a: A) => B): Either<E, B>;

  /** Continue with `f` on a Right value; `f` returns an Either itself */
  bind<B>(f: (a: A) => Either<E, B>): Either<E, B>;

  /** Map over the Left value */
  lmap<F>(f: (e: E) => F): Either<F, A>;

  /** Branch on the variant; exactly one callback is invoked */
  either<R>(onLeft: (e: E) => R, onRight: (a: A) => R): R;

  /**
   * The Left value. On Right, `fallback(value)` when given.
   *
   * @throws {WrongVariantError} on Right without a fallback
   */
  fromLeft(fallback?: (a: A) => E): E;

  /**
   * The Right value. On Left, `fallback(value)` when given.
   *
   * @throws {WrongVariantError} on Left without a fallback
   */
  fromRight(fallback?: (e: E) => A): A;

  /** Swap Left and Right */
  swap(): Either<A, E>;

  /** Structural equality; payloads are compared with Object.is unless comparisons are given */
  equals(
    that: Either<E, A>,
    eqLeft?: (x: E, y: E) => boolean,
    eqRight?: (x: A, y: A) => boolean,
  ): boolean;

  toString(): string;
}

/**
 * Left variant - represents failure/error
 */
export interface Left<E, A = never> extends EitherOps<E, A> {
  readonly _tag: "Left";
  readonly value: E;
}

/**
 * Right variant - represents success
 */
export interface Right<E, A> extends EitherOps<E, A> {
  readonly _tag: "Right";
  readonly value: A;
}

// ============================================================================
// Variant Implementations
// ============================================================================

class LeftImpl<E> implements Left<E> {
  readonly _tag = "Left";

  constructor(readonly value: E) {}

  isLeft(): boolean {
    return true;
  }

  isRight(): boolean {
    return false;
  }

  fmap<B>(f: (a: never) => B): Either<E, B> {
    requireCallback(f, "Left", "fmap");
    return this;
  }

  bind<B>(f: (a: never) => Either<E, B>): Either<E, B> {
    requireCallback(f, "Left", "bind");
    return this;
  }

  lmap<F>(f: (e: E) => F): Either<F, never> {
    requireCallback(f, "Left", "lmap");
    return new LeftImpl(f(this.value));
  }

  either<R>(onLeft: (e: E) => R, onRight: (a: never) => R): R {
    requireCallback(onLeft, "Left", "either");
    requireCallback(onRight, "Left", "either");
    return onLeft(this.value);
  }

  fromLeft(): E {
    return this.value;
  }

  fromRight(fallback?: (e: E) => never): never {
    if (typeof fallback !== "function") {
      throw new WrongVariantError("right", this.toString());
    }
    return fallback(this.value);
  }

  swap(): Either<never, E> {
    return new RightImpl(this.value);
  }

  equals(that: Either<E, never>, eqLeft: (x: E, y: E) => boolean = Object.is): boolean {
    return that._tag === "Left" && eqLeft(this.value, that.value);
  }

  toString(): string {
    return `Left(${showUnknown.show(this.value)})`;
  }
}

class RightImpl<A> implements Right<never, A> {
  readonly _tag = "Right";

  constructor(readonly value: A) {}

  isLeft(): boolean {
    return false;
  }

  isRight(): boolean {
    return true;
  }

  fmap<B>(f: (a: A) => B): Either<never, B> {
    requireCallback(f, "Right", "fmap");
    return new RightImpl(f(this.value));
  }

  bind<B>(f: (a: A) => Either<never, B>): Either<never, B> {
    requireCallback(f, "Right", "bind");
    return f(this.value);
  }

  lmap<F>(f: (e: never) => F): Either<F, A> {
    requireCallback(f, "Right", "lmap");
    return this;
  }

  either<R>(onLeft: (e: never) => R, onRight: (a: A) => R): R {
    requireCallback(onLeft, "Right", "either");
    requireCallback(onRight, "Right", "either");
    return onRight(this.value);
  }

  fromLeft(fallback?: (a: A) => never): never {
    if (typeof fallback !== "function") {
      throw new WrongVariantError("left", this.toString());
    }
    return fallback(this.value);
  }

  fromRight(): A {
    return this.value;
  }

  swap(): Either<A, never> {
    return new LeftImpl(this.value);
  }

  equals(
    that: Either<never, A>,
    _eqLeft?: (x: never, y: never) => boolean,
    eqRight: (x: A, y: A) => boolean = Object.is,
  ): boolean {
    return that._tag === "Right" && eqRight(this.value, that.value);
  }

  toString(): string {
    return `Right(${showUnknown.show(this.value)})`;
  }
}

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a Left value
 */
export function Left<E, A = never>(value: E): Either<E, A> {
  return new LeftImpl(value);
}

/**
 * Create a Right value
 */
export function Right<E = never, A = unknown>(value: A): Either<E, A> {
  return new RightImpl(value);
}

/**
 * A class whose instances `wrapError` may catch.
 */
export type ErrorKind = abstract new (...args: never[]) => unknown;

function isInstanceOfAny<K extends ErrorKind>(
  thrown: unknown,
  kinds: readonly K[],
): thrown is InstanceType<K> {
  return kinds.some((kind) => thrown instanceof kind);
}

function describeThrown(thrown: unknown): string {
  return thrown instanceof Error ? thrown.name : typeof thrown;
}

/**
 * Run `body` and capture the errors it is expected to throw.
 *
 * Returns `Right(result)` when `body` completes and `Left(error)` when it
 * throws an instance of one of `kinds` (subclasses included). Anything else
 * is rethrown untouched.
 *
 * @example
 * ```typescript
 * wrapError([RangeError], () => 1n / 0n);  // Left(RangeError("Division by zero"))
 * wrapError([RangeError], () => 42);       // Right(42)
 * wrapError([RangeError], () => JSON.parse("{")); // throws SyntaxError
 * ```
 */
export function wrapError<K extends ErrorKind, A>(
  kinds: readonly K[],
  body: () => A,
): Either<InstanceType<K>, A> {
  requireCallback(body, "Either", "wrapError");

  let result: A;
  try {
    result = body();
  } catch (thrown) {
    if (isInstanceOfAny(thrown, kinds)) {
      debugLog("wrapError", `caught ${describeThrown(thrown)} as Left`);
      return Left(thrown);
    }
    debugLog("wrapError", `rethrowing unclassified ${describeThrown(thrown)}`);
    throw thrown;
  }
  return Right(result);
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if Either is Left
 */
export function isLeft<E, A>(either: Either<E, A>): either is Left<E, A> {
  return either._tag === "Left";
}

/**
 * Check if Either is Right
 */
export function isRight<E, A>(either: Either<E, A>): either is Right<E, A> {
  return either._tag === "Right";
}

// ============================================================================
// Typeclass Instances
// ============================================================================

/**
 * Eq instance for Either
 */
export function getEq<E, A>(EE: Eq<E>, EA: Eq<A>): Eq<Either<E, A>> {
  return {
    eqv: (x, y) => x.equals(y, EE.eqv, EA.eqv),
  };
}

/**
 * Show instance for Either
 */
export function getShow<E, A>(SE: Show<E>, SA: Show<A>): Show<Either<E, A>> {
  return {
    show: (either) =>
      either._tag === "Right" ? `Right(${SA.show(either.value)})` : `Left(${SE.show(either.value)})`,
  };
}

/**
 * Functor instance for Either, mapping over Right
 */
export function eitherFunctor<E>(): Functor<EitherF<E>> {
  return {
    fmap: <A, B>(fa: Kind<EitherF<E>, A>, f: (a: A) => B) => fa.fmap(f),
  };
}

/**
 * Monad instance for Either, short-circuiting on the first Left
 */
export function eitherMonad<E>(): Monad<EitherF<E>> {
  return {
    ...eitherFunctor<E>(),
    pure: <A>(a: A) => Right<E, A>(a),
    bind: <A, B>(fa: Kind<EitherF<E>, A>, f: (a: A) => Kind<EitherF<E>, B>) => fa.bind(f),
  };
}
