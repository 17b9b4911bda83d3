/**
 * Maybe Tests
 */
import { describe, it, expect, vi } from "vitest";
import {
  Just,
  Nothing,
  fromNullable,
  isJust,
  isNothing,
  getEq,
  getShow,
  maybeFunctor,
  maybeMonad,
  type Maybe,
} from "./maybe.js";
import { MissingCallbackError } from "../errors.js";
import { eqNumber } from "../typeclasses/eq.js";
import { showNumber } from "../typeclasses/show.js";

type Operation = "fmap" | "bind" | "fold" | "getOrElse";

// Simulates an untyped caller that forgets the callback
function callWithoutCallback(maybe: Maybe<number>, operation: Operation): unknown {
  return Reflect.apply(maybe[operation], maybe, []);
}

describe("Maybe", () => {
  describe("constructors", () => {
    it("Just should wrap a value", () => {
      const maybe = Just(42);
      expect(maybe._tag).toBe("Just");
      expect(isJust(maybe) ? maybe.value : undefined).toBe(42);
    });

    it("Just(null) should stay distinct from Nothing", () => {
      const maybe = Just(null);
      expect(maybe.isJust()).toBe(true);
      expect(maybe).not.toBe(Nothing());
    });

    it("Nothing should be a single shared instance", () => {
      expect(Nothing()).toBe(Nothing());
      expect(Nothing<number>()).toBe(Nothing<string>());
      expect(Nothing()._tag).toBe("Nothing");
    });

    it("fromNullable should convert null and undefined to Nothing", () => {
      expect(fromNullable(null)).toBe(Nothing());
      expect(fromNullable(undefined)).toBe(Nothing());
    });

    it("fromNullable should convert other values to Just", () => {
      expect(fromNullable(0)).toEqual(Just(0));
      expect(fromNullable("")).toEqual(Just(""));
    });
  });

  describe("type guards", () => {
    it("isJust should identify Just", () => {
      expect(isJust(Just(1))).toBe(true);
      expect(isJust(Nothing())).toBe(false);
      expect(Just(1).isJust()).toBe(true);
      expect(Nothing().isJust()).toBe(false);
    });

    it("isNothing should identify Nothing", () => {
      expect(isNothing(Nothing())).toBe(true);
      expect(isNothing(Just(1))).toBe(false);
      expect(Nothing().isNothing()).toBe(true);
      expect(Just(1).isNothing()).toBe(false);
    });
  });

  describe("fmap", () => {
    it("should apply the function to a Just value exactly once", () => {
      const f = vi.fn((n: number) => n + 1);
      const result = Just(1).fmap(f);

      expect(result).toEqual(Just(2));
      expect(f).toHaveBeenCalledTimes(1);
      expect(f).toHaveBeenCalledWith(1);
    });

    it("should return Nothing without invoking the function", () => {
      const f = vi.fn((n: number) => n + 1);
      const result = Nothing<number>().fmap(f);

      expect(result).toBe(Nothing());
      expect(f).not.toHaveBeenCalled();
    });

    it("should change the payload type", () => {
      expect(Just(7).fmap((n) => `#${n}`)).toEqual(Just("#7"));
    });

    it("should require a callback on Just", () => {
      expect(() => callWithoutCallback(Just(1), "fmap")).toThrow(MissingCallbackError);
      expect(() => callWithoutCallback(Just(1), "fmap")).toThrow("Just.fmap requires a callback");
    });

    it("should require a callback on Nothing even though it is never invoked", () => {
      expect(() => callWithoutCallback(Nothing(), "fmap")).toThrow(
        "Nothing.fmap requires a callback",
      );
    });
  });

  describe("bind", () => {
    const half = (n: number): Maybe<number> => (n % 2 === 0 ? Just(n / 2) : Nothing());

    it("should return the function's result without double wrapping", () => {
      expect(Just(8).bind(half)).toEqual(Just(4));
    });

    it("should propagate a Nothing returned by the function", () => {
      expect(Just(3).bind(half)).toBe(Nothing());
    });

    it("should chain", () => {
      expect(Just(8).bind(half).bind(half).bind(half)).toEqual(Just(1));
      expect(Just(8).bind(half).bind(half).bind(half).bind(half)).toBe(Nothing());
    });

    it("should return Nothing without invoking the function", () => {
      const f = vi.fn(half);
      expect(Nothing<number>().bind(f)).toBe(Nothing());
      expect(f).not.toHaveBeenCalled();
    });

    it("should require a callback on both variants", () => {
      expect(() => callWithoutCallback(Just(1), "bind")).toThrow("Just.bind requires a callback");
      expect(() => callWithoutCallback(Nothing(), "bind")).toThrow(
        "Nothing.bind requires a callback",
      );
    });

    it("should report the variant and operation on the error", () => {
      let caught: unknown;
      try {
        callWithoutCallback(Nothing(), "bind");
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(MissingCallbackError);
      expect(caught).toMatchObject({ variant: "Nothing", operation: "bind" });
    });
  });

  describe("fold", () => {
    it("should invoke only onJust for Just", () => {
      const onNothing = vi.fn(() => 0);
      const onJust = vi.fn((n: number) => n * 10);

      expect(Just(2).fold(onNothing, onJust)).toBe(20);
      expect(onJust).toHaveBeenCalledTimes(1);
      expect(onNothing).not.toHaveBeenCalled();
    });

    it("should invoke only onNothing for Nothing", () => {
      const onNothing = vi.fn(() => 0);
      const onJust = vi.fn((n: number) => n * 10);

      expect(Nothing<number>().fold(onNothing, onJust)).toBe(0);
      expect(onNothing).toHaveBeenCalledTimes(1);
      expect(onJust).not.toHaveBeenCalled();
    });

    it("should require its callbacks", () => {
      expect(() => callWithoutCallback(Nothing(), "fold")).toThrow(
        "Nothing.fold requires a callback",
      );
    });
  });

  describe("getOrElse", () => {
    it("should return the Just value without calling the fallback", () => {
      const fallback = vi.fn(() => 0);
      expect(Just(5).getOrElse(fallback)).toBe(5);
      expect(fallback).not.toHaveBeenCalled();
    });

    it("should return the fallback result for Nothing", () => {
      expect(Nothing<number>().getOrElse(() => 7)).toBe(7);
    });

    it("should require a fallback on Just", () => {
      expect(() => callWithoutCallback(Just(5), "getOrElse")).toThrow(
        "Just.getOrElse requires a callback",
      );
    });
  });

  describe("equals", () => {
    it("should compare payloads of Just values", () => {
      expect(Just(1).equals(Just(1))).toBe(true);
      expect(Just(1).equals(Just(2))).toBe(false);
    });

    it("should distinguish the variants", () => {
      expect(Just(1).equals(Nothing())).toBe(false);
      expect(Nothing<number>().equals(Just(1))).toBe(false);
      expect(Nothing().equals(Nothing())).toBe(true);
    });

    it("should use a supplied comparison", () => {
      const a = Just({ id: 1 });
      const b = Just({ id: 1 });

      expect(a.equals(b)).toBe(false);
      expect(a.equals(b, (x, y) => x.id === y.id)).toBe(true);
    });
  });

  describe("toString", () => {
    it("should show the payload", () => {
      expect(Just(42).toString()).toBe("Just(42)");
      expect(Just("hi").toString()).toBe('Just("hi")');
      expect(Nothing().toString()).toBe("Nothing");
    });

    it("should show nested values", () => {
      expect(Just(Just(1)).toString()).toBe("Just(Just(1))");
      expect(Just(Nothing()).toString()).toBe("Just(Nothing)");
    });
  });

  describe("typeclass instances", () => {
    it("getEq should compare with the payload Eq", () => {
      const eq = getEq(eqNumber);
      expect(eq.eqv(Just(1), Just(1))).toBe(true);
      expect(eq.eqv(Just(NaN), Just(NaN))).toBe(true);
      expect(eq.eqv(Just(1), Nothing())).toBe(false);
      expect(eq.eqv(Nothing(), Nothing())).toBe(true);
    });

    it("getShow should use the payload Show", () => {
      const show = getShow(showNumber);
      expect(show.show(Just(3))).toBe("Just(3)");
      expect(show.show(Nothing())).toBe("Nothing");
    });

    it("maybeFunctor should delegate to fmap", () => {
      expect(maybeFunctor.fmap(Just(2), (n: number) => n * 2)).toEqual(Just(4));
      expect(maybeFunctor.fmap(Nothing<number>(), (n: number) => n * 2)).toBe(Nothing());
    });

    it("maybeMonad should lift with pure and sequence with bind", () => {
      expect(maybeMonad.pure(1)).toEqual(Just(1));
      expect(maybeMonad.bind(Just(2), (n: number) => Just(n + 1))).toEqual(Just(3));
      expect(maybeMonad.bind(Nothing<number>(), (n: number) => Just(n + 1))).toBe(Nothing());
    });
  });
});
