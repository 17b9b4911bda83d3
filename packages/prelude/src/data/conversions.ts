/**
 * Conversions between Maybe and Either
 */

import type { Maybe } from "./maybe.js";
import { Just, Nothing } from "./maybe.js";
import type { Either } from "./either.js";
import { Left, Right } from "./either.js";
import { requireCallback } from "../callback.js";

/**
 * Convert Maybe to Either, producing the Left value for Nothing
 */
export function maybeToEither<E, A>(maybe: Maybe<A>, onNothing: () => E): Either<E, A> {
  requireCallback(onNothing, "Maybe", "maybeToEither");
  return maybe.fold<Either<E, A>>(
    () => Left(onNothing()),
    (a) => Right(a),
  );
}

/**
 * Convert Either to Maybe (discards the error)
 */
export function eitherToMaybe<E, A>(either: Either<E, A>): Maybe<A> {
  return either.either<Maybe<A>>(
    () => Nothing(),
    (a) => Just(a),
  );
}
