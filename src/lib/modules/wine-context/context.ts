import { delimiter } from "path";
import { logger } from "../../logger.js";
import { WinePathTranslator } from "../path-translator/translator.js";
import { Distribution } from "./distribution.js";
import {
  applyOverrides,
  applySyncHooks,
  inheritEnv,
  normalizeOverrides,
  prependSearchPath,
} from "./env-builder.js";
import { Prefix } from "./prefix.js";
import type { ContextOverrides } from "./types.js";

const log = logger.child({ module: "wine-context" });

/** WINEDEBUG value used when neither the caller nor the context sets one. */
const DEFAULT_WINEDEBUG = "-all";

/**
 * Everything needed to run a Windows program under Wine: which build, which
 * prefix, and the environment overrides to apply on top of the ambient
 * environment.
 *
 * Contexts are frozen after creation and may be shared by any number of
 * EProcess instances at once.
 */
export class WineContext {
  /** Serialized overrides in input order; null removes the variable */
  readonly overrides: ReadonlyMap<string, string | null>;

  private constructor(
    readonly distribution: Distribution,
    readonly prefix: Prefix,
    overrides: Map<string, string | null>
  ) {
    this.overrides = overrides;
    Object.freeze(this);
  }

  /**
   * Resolves both paths and validates the overrides.
   *
   * Throws:
   *   - InvalidPathError     — distribution or prefix cannot be used
   *   - InvalidOverrideError — an override targets a derived variable
   */
  static create(
    distribution: string | Distribution,
    prefix: string | Prefix,
    overrides?: ContextOverrides
  ): WineContext {
    const dist = typeof distribution === "string" ? Distribution.open(distribution) : distribution;
    const pfx = typeof prefix === "string" ? Prefix.open(prefix) : prefix;
    const context = new WineContext(dist, pfx, normalizeOverrides(overrides));

    log.debug(
      { distribution: dist.root, prefix: pfx.pfx, proton: dist.isProton, overrides: context.overrides.size },
      "Created Wine context"
    );
    return context;
  }

  get isProton(): boolean {
    return this.distribution.isProton;
  }

  /**
   * Builds the child environment for this context.
   *
   * Precedence (highest wins):
   *   context overrides  >  variables derived from the paths  >  ambient
   *
   * Derived variables:
   *   WINEPREFIX, WINELOADER, WINESERVER, WINEDLLPATH,
   *   PATH and LD_LIBRARY_PATH with the distribution dirs prepended,
   *   WINEDEBUG=-all unless the ambient environment sets it.
   */
  environment(ambient: NodeJS.ProcessEnv = process.env): Record<string, string> {
    const dist = this.distribution;
    const env = inheritEnv(ambient);

    env["WINEPREFIX"] = this.prefix.pfx;
    const loader = dist.loader;
    if (loader) env["WINELOADER"] = loader;
    env["WINESERVER"] = dist.server;
    env["WINEDLLPATH"] = dist.dllDirs.join(delimiter);
    env["PATH"] = prependSearchPath([dist.bin], ambient["PATH"]);
    env["LD_LIBRARY_PATH"] = prependSearchPath(dist.libDirs, ambient["LD_LIBRARY_PATH"]);
    if (!("WINEDEBUG" in env)) env["WINEDEBUG"] = DEFAULT_WINEDEBUG;

    applyOverrides(env, this.overrides);
    return applySyncHooks(env, this.overrides, this.isProton);
  }

  /** Path translator for this prefix's current drive table. */
  translator(): WinePathTranslator {
    return new WinePathTranslator(this.prefix.driveMappings());
  }

  toJSON(): Record<string, unknown> {
    return {
      distribution: this.distribution.root,
      prefix: this.prefix.root,
      proton: this.isProton,
      overrides: Object.fromEntries(this.overrides),
    };
  }
}

/** Functional alias of WineContext.create. */
export function createContext(
  distribution: string | Distribution,
  prefix: string | Prefix,
  overrides?: ContextOverrides
): WineContext {
  return WineContext.create(distribution, prefix, overrides);
}
