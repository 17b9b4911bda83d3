import { config } from "./config.js";

/**
 * Write a trace line when debug mode is on.
 *
 * Output goes through console.debug as `[adt-prelude:<area>] <message>`.
 */
export function debugLog(area: string, message: string): void {
  if (!config.get("debug")) return;
  console.debug(`[adt-prelude:${area}] ${message}`);
}
