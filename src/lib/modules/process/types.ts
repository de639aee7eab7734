/**
 * Shared types for the process module.
 */
import type { HostPath } from "../path-translator/host-path.js";
import type { ExecutionMode, PathTranslator } from "../path-translator/translator.js";
import type { ContextRegistry } from "../wine-context/registry.js";
import type { WineContext } from "../wine-context/context.js";
import type { Decoder } from "./decode.js";
import type { Spawner } from "./spawner.js";

/** HostPath and file: URL values are translated; everything else is stringified. */
export type ArgValue = string | number | boolean | bigint | HostPath | URL;

/** A positional token, or a flag followed by its value (always two tokens). */
export type ArgumentGroup = readonly [ArgValue] | readonly [ArgValue, ArgValue];

export type ProcessState = "not-started" | "running" | "finished";

export type LauncherKind = "wine" | "proton";

/** `proton runinprefix` skips Steam's setup steps; `proton run` performs them. */
export type ProtonVerb = "runinprefix" | "run";

/** Environment additions; null removes the variable. */
export type EnvPatch = Readonly<Record<string, string | null>>;

export interface EProcessOptions {
  /** Context (or registry name) used under Wine when run() names none */
  context?: WineContext | string;
  /** Registry consulted for names and the default context. Defaults to the process-wide one */
  registry?: ContextRegistry;
  /** Host platform; decides between native and Wine execution. Defaults to process.platform */
  platform?: NodeJS.Platform;
  /** Environment the child inherits from. Defaults to process.env */
  ambientEnv?: NodeJS.ProcessEnv;
  /** Extra variables for every run of this process */
  env?: EnvPatch;
  spawner?: Spawner;
  decoder?: Decoder;
  /** Declared encoding of the child's output, passed to the decoder as a hint */
  encoding?: string;
  /** "proton" launches through the Proton script; ignored for plain Wine builds */
  launcher?: LauncherKind;
  protonVerb?: ProtonVerb;
  /** Steam app ID, exported as STEAM_COMPAT_APP_ID, SteamAppId and SteamGameId. Defaults to "0" under Proton */
  steamAppId?: string;
  /** Start the program through the prefix's steam.exe. Only applies to the Wine loader */
  useSteam?: boolean;
  /** Tokens placed before everything else, e.g. ["gamemoderun"] */
  prependCommand?: readonly string[];
  /** Delay between SIGTERM and SIGKILL after a timeout. Default 2000 ms */
  killGraceMs?: number;
  /** How long to wait for the pipes to close after the child exited. Default 1000 ms */
  drainMs?: number;
}

export interface RunOptions {
  context?: WineContext | string;
  /** Working directory; defaults to the executable's directory */
  cwd?: string | HostPath;
  /** Milliseconds before the child is terminated and run() rejects with TimeoutError */
  timeout?: number;
  env?: EnvPatch;
}

export interface LaunchPlan {
  mode: ExecutionMode;
  /** argv, launcher first */
  command: string[];
  env: Record<string, string>;
  cwd: string | undefined;
  context: WineContext | null;
  translator: PathTranslator;
  /** Wine loader or Proton script placed before the executable; null natively */
  launcher: string | null;
  launcherKind: LauncherKind | null;
}
