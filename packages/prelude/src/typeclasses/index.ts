/**
 * Typeclasses: Functor, Monad, Eq and Show
 *
 * Each typeclass module is exported as a namespace to avoid name collisions,
 * with the interfaces also exported directly for convenience.
 */

export * as FunctorOps from "./functor.js";
export type { Functor } from "./functor.js";

export * as MonadOps from "./monad.js";
export type { Monad } from "./monad.js";

export * as EqOps from "./eq.js";
export type { Eq } from "./eq.js";

export * as ShowOps from "./show.js";
export type { Show } from "./show.js";
