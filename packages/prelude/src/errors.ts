/**
 * Prelude Error Types
 *
 * Errors raised by the data types when a caller breaks an operation's
 * contract. Both are programmer mistakes: they are thrown synchronously at the
 * call site and never wrapped a second time.
 */

/**
 * The two variants that carry a payload a caller can ask for by name.
 */
export type Channel = "left" | "right";

/**
 * Base class for all errors thrown by the prelude.
 */
export class PreludeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PreludeError";
  }
}

/**
 * Thrown when a combinator is called without its callback.
 *
 * Raised even by variants that would never invoke the callback, so that a
 * call such as `maybe.fmap()` fails the same way whether `maybe` holds a
 * value or not.
 */
export class MissingCallbackError extends PreludeError {
  constructor(
    readonly variant: string,
    readonly operation: string,
  ) {
    super(`${variant}.${operation} requires a callback`);
    this.name = "MissingCallbackError";
  }
}

/**
 * Thrown by `fromLeft` / `fromRight` when the Either holds the other variant
 * and no fallback was supplied.
 */
export class WrongVariantError extends PreludeError {
  constructor(
    readonly expected: Channel,
    readonly actual: string,
  ) {
    super(`Expected ${expected} value, got ${actual}`);
    this.name = "WrongVariantError";
  }
}

/**
 * Thrown by `assertLaws` when a law does not hold for one of its cases.
 */
export class LawViolationError extends PreludeError {
  constructor(
    readonly law: string,
    readonly counterexample: string,
  ) {
    super(`Law "${law}" failed for ${counterexample}`);
    this.name = "LawViolationError";
  }
}
