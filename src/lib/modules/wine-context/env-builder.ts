import { delimiter } from "path";
import { InvalidOverrideError } from "../../errors.js";
import type { ContextOverrides, DllOverride, EnvListItem, EnvValue } from "./types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Variables derived from the distribution/prefix paths; overrides may not set them. */
export const PROTECTED_VARIABLES: ReadonlySet<string> = new Set([
  "WINEPREFIX",
  "WINELOADER",
  "WINESERVER",
  "WINEDIST",
]);

export const DLL_OVERRIDES_VAR = "WINEDLLOVERRIDES";

/**
 * Shorthand switches expanded into the variables Wine and Proton read.
 * Proton inverts the sync switches (PROTON_NO_ESYNC=1 disables esync).
 */
const SYNC_HOOKS: ReadonlyArray<{
  key: string;
  wine: string;
  proton: string;
  invertForProton: boolean;
}> = [
  { key: "ESYNC", wine: "WINEESYNC", proton: "PROTON_NO_ESYNC", invertForProton: true },
  { key: "FSYNC", wine: "WINEFSYNC", proton: "PROTON_NO_FSYNC", invertForProton: true },
  {
    key: "LARGE_ADDRESS_AWARE",
    wine: "WINE_LARGE_ADDRESS_AWARE",
    proton: "PROTON_FORCE_LARGE_ADDRESS_AWARE",
    invertForProton: false,
  },
];

const FALSY_FLAGS: ReadonlySet<string> = new Set(["", "0", "false", "no", "off"]);

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

function isDllOverride(item: EnvListItem): item is DllOverride {
  return typeof item === "object";
}

/**
 * Returns [key, rule] for one WINEDLLOVERRIDES entry. The key is the
 * lower-cased DLL list so that a later rule for the same DLLs replaces
 * the earlier one.
 *
 * @example
 *   dllRule({ dlls: ["d3d9", "d3d11"], mode: "n,b" }) → ["d3d9,d3d11", "d3d9,d3d11=n,b"]
 *   dllRule("dxgi=b")                                → ["dxgi", "dxgi=b"]
 */
function dllRule(item: EnvListItem): [string, string] {
  if (isDllOverride(item)) {
    const dlls = typeof item.dlls === "string" ? item.dlls : item.dlls.join(",");
    return [dlls.toLowerCase(), `${dlls}=${item.mode}`];
  }
  const rule = String(item);
  const eq = rule.indexOf("=");
  return [(eq === -1 ? rule : rule.slice(0, eq)).toLowerCase(), rule];
}

/**
 * Serializes DLL override rules to Wine's `dll[,dll]=mode;...` syntax.
 * Input order is kept; a duplicate DLL key keeps its first position and
 * takes the last value.
 */
export function serializeDllOverrides(items: readonly EnvListItem[]): string {
  const rules = new Map<string, string>();
  for (const item of items) {
    const [key, rule] = dllRule(item);
    rules.set(key, rule);
  }
  return Array.from(rules.values()).join(";");
}

/**
 * Converts one override value to its environment string.
 * Returns null when the variable must be removed from the environment.
 */
export function serializeEnvValue(key: string, value: EnvValue): string | null {
  if (value === null) return null;
  if (typeof value === "boolean") return value ? "1" : "0";
  if (typeof value === "number") return String(value);
  if (typeof value === "string") return value;

  if (key === DLL_OVERRIDES_VAR) {
    return value.length > 0 ? serializeDllOverrides(value) : null;
  }
  return value
    .map((item) => (isDllOverride(item) ? dllRule(item)[1] : String(item)))
    .join(delimiter);
}

function isEntryIterable(
  overrides: ContextOverrides
): overrides is Iterable<readonly [string, EnvValue]> {
  return Symbol.iterator in overrides;
}

/**
 * Normalizes caller-supplied overrides into an ordered map of serialized
 * values. A key given twice keeps the last value.
 *
 * Throws InvalidOverrideError for variables the context derives itself.
 */
export function normalizeOverrides(overrides?: ContextOverrides): Map<string, string | null> {
  const normalized = new Map<string, string | null>();
  if (!overrides) return normalized;

  const entries: Iterable<readonly [string, EnvValue]> =
    isEntryIterable(overrides) ? overrides : Object.entries(overrides);

  for (const [key, value] of entries) {
    if (PROTECTED_VARIABLES.has(key)) {
      throw new InvalidOverrideError(
        `"${key}" is derived from the context paths and cannot be overridden`,
        key
      );
    }
    normalized.set(key, serializeEnvValue(key, value));
  }
  return normalized;
}

// ---------------------------------------------------------------------------
// Composition helpers
// ---------------------------------------------------------------------------

/**
 * Copies `ambient`, dropping undefined entries. The result is safe to pass
 * as `env` to child_process.spawn.
 */
export function inheritEnv(ambient: NodeJS.ProcessEnv): Record<string, string> {
  const inherited: Record<string, string> = {};
  for (const [key, value] of Object.entries(ambient)) {
    if (value !== undefined) inherited[key] = value;
  }
  return inherited;
}

/** Prepends `dirs` to a delimiter-separated search path. */
export function prependSearchPath(dirs: readonly string[], current?: string): string {
  return [...dirs, ...(current ? [current] : [])].join(delimiter);
}

/**
 * Applies `overrides` on top of `env` in place: a string sets the variable,
 * null removes it.
 */
export function applyOverrides(
  env: Record<string, string>,
  overrides: ReadonlyMap<string, string | null>
): Record<string, string> {
  for (const [key, value] of overrides) {
    if (value === null) delete env[key];
    else env[key] = value;
  }
  return env;
}

/**
 * Expands the ESYNC / FSYNC / LARGE_ADDRESS_AWARE shorthands found in
 * `overrides` into the variables Wine (and, for Proton builds, Proton)
 * reads. The shorthand itself stays in the environment, and a derived
 * variable the overrides set explicitly is left alone.
 */
export function applySyncHooks(
  env: Record<string, string>,
  overrides: ReadonlyMap<string, string | null>,
  isProton: boolean
): Record<string, string> {
  for (const hook of SYNC_HOOKS) {
    const value = overrides.get(hook.key);
    if (value === undefined || value === null) continue;

    const enabled = !FALSY_FLAGS.has(value.trim().toLowerCase());
    if (!overrides.has(hook.wine)) env[hook.wine] = enabled ? "1" : "0";
    if (isProton && !overrides.has(hook.proton)) {
      const protonEnabled = hook.invertForProton ? !enabled : enabled;
      env[hook.proton] = protonEnabled ? "1" : "0";
    }
  }
  return env;
}

// ---------------------------------------------------------------------------
// Proton
// ---------------------------------------------------------------------------

export interface ProtonEnvConfig {
  /** Directory Proton uses as STEAM_COMPAT_DATA_PATH (it keeps `pfx/` inside) */
  compatDataPath: string;
  /** Steam app ID — used for compatibility databases. Defaults to "0" for non-Steam programs */
  steamAppId?: string;
  /** Wine loader Proton should hand to its own scripts */
  wineLoader: string;
}

/**
 * Builds the variables `proton run` / `proton runinprefix` needs on top of
 * the Wine context environment.
 *
 * Required Proton variables:
 *   STEAM_COMPAT_DATA_PATH   — directory that contains (or will contain) pfx/
 *   STEAM_COMPAT_APP_ID      — Steam app ID; "0" for non-Steam programs
 *   SteamAppId, SteamGameId  — the same ID, read by the Steam client and games
 *
 * Optional:
 *   STEAM_COMPAT_CLIENT_INSTALL_PATH — Steam root; helps Proton find runtime libs
 *
 * Proton appends "64" to WINELOADER itself, so it must point at `bin/wine`.
 */
export function buildProtonEnv(
  config: ProtonEnvConfig,
  steamRoot: string | null
): Record<string, string> {
  const appId = config.steamAppId ?? "0";
  const protonVars: Record<string, string> = {
    STEAM_COMPAT_DATA_PATH: config.compatDataPath,
    STEAM_COMPAT_APP_ID: appId,
    SteamAppId: appId,
    SteamGameId: appId,
    WINELOADER: config.wineLoader,
  };

  if (steamRoot) {
    protonVars["STEAM_COMPAT_CLIENT_INSTALL_PATH"] = steamRoot;
  }

  return protonVars;
}
