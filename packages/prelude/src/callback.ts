import { MissingCallbackError } from "./errors.js";

/**
 * Throw unless a callback was supplied.
 *
 * Every combinator calls this before deciding whether to invoke its callback,
 * so omitting one fails the same way on every variant.
 *
 * @throws {MissingCallbackError} if `callback` is not a function
 */
export function requireCallback(callback: unknown, variant: string, operation: string): void {
  if (typeof callback !== "function") {
    throw new MissingCallbackError(variant, operation);
  }
}
