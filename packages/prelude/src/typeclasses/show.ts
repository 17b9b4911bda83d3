/**
 * Show Typeclass
 *
 * A type class for converting values to their string representation.
 * Unlike toString(), Show is intended to produce a "programmer-friendly"
 * representation, often valid code that could recreate the value.
 */

import { config } from "../config.js";

// ============================================================================
// Show
// ============================================================================

/**
 * Show typeclass
 */
export interface Show<A> {
  readonly show: (a: A) => string;
}

// ============================================================================
// Common Instances
// ============================================================================

/**
 * Show for strings (with quotes)
 */
export const showString: Show<string> = {
  show: (s) => JSON.stringify(s),
};

/**
 * Show for numbers
 */
export const showNumber: Show<number> = {
  show: (n) => String(n),
};

/**
 * Show for booleans
 */
export const showBoolean: Show<boolean> = {
  show: (b) => String(b),
};

// ============================================================================
// Combinators
// ============================================================================

/**
 * Show for readonly arrays
 */
export function showArray<A>(S: Show<A>): Show<readonly A[]> {
  return {
    show: (arr) => `[${arr.map(S.show).join(", ")}]`,
  };
}

/**
 * Show using a custom function
 */
export function makeShow<A>(show: (a: A) => string): Show<A> {
  return { show };
}

// ============================================================================
// Untyped Values
// ============================================================================

const MAX_DEPTH = 3;

function hasOwnToString(value: object): boolean {
  return typeof value.toString === "function" && value.toString !== Object.prototype.toString;
}

const UNRENDERABLE = "[unrenderable]";

function render(value: unknown, depth: number): string {
  switch (typeof value) {
    case "string":
      return JSON.stringify(value);
    case "number":
    case "boolean":
    case "undefined":
      return String(value);
    case "bigint":
      return `${value}n`;
    case "symbol":
      return value.toString();
    case "function":
      return value.name ? `[Function ${value.name}]` : "[Function]";
  }

  if (value === null) return "null";
  if (typeof value !== "object") return String(value);

  // A throwing toString or getter renders as a placeholder
  try {
    return renderObject(value, depth);
  } catch {
    return UNRENDERABLE;
  }
}

function renderObject(value: object, depth: number): string {
  if (value instanceof Error) return `${value.name}(${JSON.stringify(value.message)})`;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "Date(Invalid)" : `Date(${value.toISOString()})`;
  }
  if (depth >= MAX_DEPTH) return Array.isArray(value) ? "[Array]" : "[Object]";
  if (Array.isArray(value)) {
    return `[${value.map((item: unknown) => render(item, depth + 1)).join(", ")}]`;
  }
  if (value instanceof Map) {
    const entries = [...value.entries()]
      .map(([k, v]) => `${render(k, depth + 1)} -> ${render(v, depth + 1)}`)
      .join(", ");
    return `Map(${entries})`;
  }
  if (value instanceof Set) {
    return `Set(${[...value].map((item) => render(item, depth + 1)).join(", ")})`;
  }
  if (hasOwnToString(value)) return String(value);

  const entries = Object.entries(value).map(([k, v]) => `${k}: ${render(v, depth + 1)}`);
  return entries.length === 0 ? "{}" : `{ ${entries.join(", ")} }`;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Cut a rendering down to `show.maxLength` characters, ending it with `…`.
 */
export function truncate(rendered: string): string {
  const maxLength = config.get("show.maxLength");
  if (maxLength <= 0 || rendered.length <= maxLength) return rendered;
  let end = Math.max(maxLength - 1, 0);
  // Never split a surrogate pair
  if (end > 0 && isHighSurrogate(rendered.charCodeAt(end - 1))) end -= 1;
  return `${rendered.slice(0, end)}…`;
}

/**
 * Show for values of unknown type.
 *
 * Used for the payloads of Maybe and Either in `toString()` and error
 * messages. Values that define their own `toString` (including Maybe and
 * Either themselves) are rendered through it.
 *
 * @example
 * ```typescript
 * showUnknown.show({ id: 7, tags: ["a"] }); // '{ id: 7, tags: ["a"] }'
 * showUnknown.show(new RangeError("Division by zero")); // 'RangeError("Division by zero")'
 * ```
 */
export const showUnknown: Show<unknown> = {
  show: (value) => truncate(render(value, 0)),
};
