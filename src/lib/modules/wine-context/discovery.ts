import { InvalidPathError } from "../../errors.js";
import { logger } from "../../logger.js";
import { WineContext } from "./context.js";
import { detectDistributions } from "./distribution.js";
import { detectPrefixes } from "./prefix.js";
import type { ContextOverrides, DiscoveryOptions } from "./types.js";

const log = logger.child({ module: "discovery" });

/**
 * Builds a context from the first usable distribution and the first existing
 * prefix found on this machine, or returns null when either is missing.
 * The result is not registered.
 */
export function discoverContext(
  options: DiscoveryOptions = {},
  overrides?: ContextOverrides
): WineContext | null {
  const [prefix] = detectPrefixes(options);
  if (!prefix) {
    log.debug("No Wine prefix found");
    return null;
  }

  for (const dist of detectDistributions(options)) {
    try {
      return WineContext.create(dist.path, prefix, overrides);
    } catch (err) {
      if (!(err instanceof InvalidPathError)) throw err;
      log.debug({ distribution: dist.path, err }, "Skipping unusable distribution");
    }
  }

  log.debug({ prefix }, "No Wine distribution found");
  return null;
}
