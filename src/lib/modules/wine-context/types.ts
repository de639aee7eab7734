/**
 * Shared types for the wine-context module.
 * Imported by distribution, prefix, env-builder, context and registry — never
 * from index.ts — so there are no circular dependencies between the sub-modules.
 */

/** Wine's per-DLL load order: native, builtin, either order, or disabled (""). */
export type DllOverrideMode = "n" | "b" | "n,b" | "b,n" | "";

export interface DllOverride {
  /** One DLL name or several sharing the same mode, e.g. ["d3d9", "d3d11"] */
  dlls: string | readonly string[];
  mode: DllOverrideMode;
}

export type EnvListItem = string | number | DllOverride;

/**
 * Value accepted for an environment override.
 * `null` removes the variable from the child environment.
 */
export type EnvValue = string | number | boolean | null | readonly EnvListItem[];

export type ContextOverrides =
  | Readonly<Record<string, EnvValue>>
  | Iterable<readonly [string, EnvValue]>;

/** Maps one Windows drive letter to the host directory it exposes. */
export interface DriveMapping {
  /** Upper-case letter without the colon, e.g. "C" */
  letter: string;
  /** Absolute host path */
  root: string;
}

export interface DistributionInfo {
  /** URL-safe slug derived from the directory name, e.g. "ge-proton9-20", "wine-staging" */
  id: string;
  /** Absolute path to the distribution root */
  path: string;
  /** Human-readable label, usually the directory name */
  label: string;
  kind: "wine" | "proton";
}

export interface DiscoveryOptions {
  /** Home directory used for ~/.wine, Steam roots, ~/.local/bin. Defaults to os.homedir() */
  home?: string;
  /** Environment searched for PATH and WINEPREFIX. Defaults to process.env */
  env?: NodeJS.ProcessEnv;
}
