/**
 * Maybe Data Type
 *
 * Maybe represents a value that may be absent: every Maybe<A> is either
 * Just<A>, carrying exactly one value, or Nothing. It is a safer alternative to
 * null/undefined that forces callers to handle both cases through combinators.
 *
 * ## Runtime Representation
 *
 * ```typescript
 * Just(42)    // { _tag: "Just", value: 42 }
 * Nothing()   // { _tag: "Nothing" } - one shared instance
 * ```
 *
 * Unlike a null-based Option, `Just(null)` and `Nothing()` stay distinct.
 */

import type { Kind } from "../hkt.js";
import type { MaybeF } from "../hkt.js";
import type { Eq } from "../typeclasses/eq.js";
import type { Functor } from "../typeclasses/functor.js";
import type { Monad } from "../typeclasses/monad.js";
import type { Show } from "../typeclasses/show.js";
import { showUnknown } from "../typeclasses/show.js";
import { requireCallback } from "../callback.js";

// ============================================================================
// Maybe Type Definition
// ============================================================================

/**
 * Maybe data type - either Just (value present) or Nothing (absent)
 */
export type Maybe<A> = Just<A> | Nothing<A>;

/**
 * Operations shared by both variants.
 *
 * Every callback-taking operation throws MissingCallbackError when called
 * without its callback, even on Nothing, which never invokes it.
 */
interface MaybeOps<A> {
  isJust(): boolean;
  isNothing(): boolean;

  /** Apply `f` to the value, keeping the result wrapped */
  fmap<B>(f: (a: A) => B): Maybe<B>;

  /** Apply `f`, which already returns a Maybe, without double wrapping */
  bind<B>(f: (a: A) => Maybe<B>): Maybe<B>;

  /** Branch on the variant; exactly one callback is invoked */
  fold<B>(onNothing: () => B, onJust: (a: A) => B): B;

  /** The value, or `fallback()` for Nothing */
  getOrElse(fallback: () => A): A;

  /** Structural equality; payloads are compared with Object.is unless `eq` is given */
  equals(that: Maybe<A>, eq?: (x: A, y: A) => boolean): boolean;

  toString(): string;
}

/**
 * Just variant - a present value
 */
export interface Just<A> extends MaybeOps<A> {
  readonly _tag: "Just";
  readonly value: A;
}

/**
 * Nothing variant - an absent value
 */
export interface Nothing<A = never> extends MaybeOps<A> {
  readonly _tag: "Nothing";
}

// ============================================================================
// Variant Implementations
// ============================================================================

class JustImpl<A> implements Just<A> {
  readonly _tag = "Just";

  constructor(readonly value: A) {}

  isJust(): boolean {
    return true;
  }

  isNothing(): boolean {
    return false;
  }

  fmap<B>(f: (a: A) => B): Maybe<B> {
    requireCallback(f, "Just", "fmap");
    return new JustImpl(f(this.value));
  }

  bind<B>(f: (a: A) => Maybe<B>): Maybe<B> {
    requireCallback(f, "Just", "bind");
    return f(this.value);
  }

  fold<B>(onNothing: () => B, onJust: (a: A) => B): B {
    requireCallback(onNothing, "Just", "fold");
    requireCallback(onJust, "Just", "fold");
    return onJust(this.value);
  }

  getOrElse(fallback: () => A): A {
    requireCallback(fallback, "Just", "getOrElse");
    return this.value;
  }

  equals(that: Maybe<A>, eq: (x: A, y: A) => boolean = Object.is): boolean {
    return that._tag === "Just" && eq(this.value, that.value);
  }

  toString(): string {
    return `Just(${showUnknown.show(this.value)})`;
  }
}

class NothingImpl implements Nothing {
  readonly _tag = "Nothing";

  isJust(): boolean {
    return false;
  }

  isNothing(): boolean {
    return true;
  }

  fmap<B>(f: (a: never) => B): Maybe<B> {
    requireCallback(f, "Nothing", "fmap");
    return this;
  }

  bind<B>(f: (a: never) => Maybe<B>): Maybe<B> {
    requireCallback(f, "Nothing", "bind");
    return this;
  }

  fold<B>(onNothing: () => B, onJust: (a: never) => B): B {
    requireCallback(onNothing, "Nothing", "fold");
    requireCallback(onJust, "Nothing", "fold");
    return onNothing();
  }

  getOrElse(fallback: () => never): never {
    requireCallback(fallback, "Nothing", "getOrElse");
    return fallback();
  }

  equals(that: Maybe<never>): boolean {
    return that._tag === "Nothing";
  }

  toString(): string {
    return "Nothing";
  }
}

const NOTHING: Nothing = new NothingImpl();

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a Just value
 */
export function Just<A>(value: A): Maybe<A> {
  return new JustImpl(value);
}

/**
 * The Nothing value. Every call returns the same instance.
 */
export function Nothing<A = never>(): Maybe<A> {
  return NOTHING;
}

/**
 * Create a Maybe from a nullable value
 */
export function fromNullable<A>(value: A | null | undefined): Maybe<A> {
  return value === null || value === undefined ? NOTHING : Just(value);
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if Maybe is Just
 */
export function isJust<A>(maybe: Maybe<A>): maybe is Just<A> {
  return maybe._tag === "Just";
}

/**
 * Check if Maybe is Nothing
 */
export function isNothing<A>(maybe: Maybe<A>): maybe is Nothing<A> {
  return maybe._tag === "Nothing";
}

// ============================================================================
// Typeclass Instances
// ============================================================================

/**
 * Eq instance for Maybe.
 *
 * @example
 * ```typescript
 * const eqMaybeNum = getEq(eqNumber);
 * eqMaybeNum.eqv(Just(1), Just(1)); // true
 * eqMaybeNum.eqv(Just(1), Nothing()); // false
 * ```
 */
export function getEq<A>(E: Eq<A>): Eq<Maybe<A>> {
  return {
    eqv: (x, y) => x.equals(y, E.eqv),
  };
}

/**
 * Show instance for Maybe
 */
export function getShow<A>(S: Show<A>): Show<Maybe<A>> {
  return {
    show: (maybe) => (maybe._tag === "Just" ? `Just(${S.show(maybe.value)})` : "Nothing"),
  };
}

/**
 * Functor instance for Maybe
 */
export const maybeFunctor: Functor<MaybeF> = {
  fmap: <A, B>(fa: Kind<MaybeF, A>, f: (a: A) => B) => fa.fmap(f),
};

/**
 * Monad instance for Maybe
 */
export const maybeMonad: Monad<MaybeF> = {
  ...maybeFunctor,
  pure: Just,
  bind: <A, B>(fa: Kind<MaybeF, A>, f: (a: A) => Kind<MaybeF, B>) => fa.bind(f),
};
