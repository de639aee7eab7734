import { join, win32 } from "path";
import { logger } from "../../logger.js";
import {
  isWindowsDrivePath,
  NativePathTranslator,
  type ExecutionMode,
  type PathTranslator,
} from "../path-translator/translator.js";
import type { WineContext } from "../wine-context/context.js";
import { detectSteamRoot } from "../wine-context/distribution.js";
import { buildProtonEnv, inheritEnv } from "../wine-context/env-builder.js";
import type { LauncherKind, ProtonVerb } from "./types.js";

const log = logger.child({ module: "strategy" });

/** Steam client inside the prefix, placed before the program when useSteam is set. */
export const STEAM_EXE = "c:\\windows\\system32\\steam.exe";

// ---------------------------------------------------------------------------
// Windows program detection
// ---------------------------------------------------------------------------

const WINDOWS_EXTENSIONS: ReadonlySet<string> = new Set([
  ".exe", ".com", ".bat", ".cmd", ".msi", ".msc", ".vbs", ".vbe", ".wsf", ".wsh",
]);

/** Programs every Wine build ships that are usually invoked without an extension. */
const WINE_BUILTINS: ReadonlySet<string> = new Set([
  "winecfg", "uninstaller", "regedit", "wineconsole", "notepad", "winefile",
  "taskmgr", "control", "msiexec", "wineboot", "cmd", "explorer", "winemine",
]);

/**
 * True when `executable` is a Windows program: a known Windows extension
 * (case-insensitive), or a Wine builtin named bare or by a Windows path.
 * A host path without a Windows extension is always native, whatever its
 * basename.
 */
export function isWindowsProgram(executable: string): boolean {
  const ext = win32.extname(executable).toLowerCase();
  if (ext) return WINDOWS_EXTENSIONS.has(ext);
  if (/[\\/]/.test(executable) && !isWindowsDrivePath(executable)) return false;
  return WINE_BUILTINS.has(win32.basename(executable).toLowerCase());
}

// ---------------------------------------------------------------------------
// Strategies
// ---------------------------------------------------------------------------

/**
 * How one run reaches the OS: which translator applies to path arguments,
 * which binary is launched in front of the executable, and which
 * environment the child gets.
 */
export interface ExecutionStrategy {
  readonly mode: ExecutionMode;
  readonly context: WineContext | null;
  readonly translator: PathTranslator;
  /** Binary that must exist before launch (wine loader, proton script), or null */
  readonly launcher: string | null;
  readonly launcherKind: LauncherKind | null;
  command(executable: string, args: readonly string[]): string[];
  environment(ambient: NodeJS.ProcessEnv): Record<string, string>;
}

export class NativeStrategy implements ExecutionStrategy {
  readonly mode: ExecutionMode = "native";
  readonly context = null;
  readonly launcher = null;
  readonly launcherKind = null;
  readonly translator: PathTranslator;

  constructor(platform: NodeJS.Platform) {
    this.translator = new NativePathTranslator(platform);
  }

  command(executable: string, args: readonly string[]): string[] {
    return [executable, ...args];
  }

  environment(ambient: NodeJS.ProcessEnv): Record<string, string> {
    return inheritEnv(ambient);
  }
}

export interface WineStrategyOptions {
  /** Requested launcher; "proton" on a plain Wine build falls back to the loader */
  launcher?: LauncherKind;
  protonVerb?: ProtonVerb;
  steamAppId?: string;
  /** Start the program through the prefix's steam.exe (Wine loader only) */
  useSteam?: boolean;
}

export class WineStrategy implements ExecutionStrategy {
  readonly mode: ExecutionMode = "wine";
  readonly translator: PathTranslator;
  readonly launcher: string;
  readonly launcherKind: LauncherKind;

  constructor(
    readonly context: WineContext,
    private readonly options: WineStrategyOptions = {}
  ) {
    const dist = context.distribution;
    this.translator = context.translator();

    const protonScript = options.launcher === "proton" ? dist.protonScript : null;
    if (protonScript !== null) {
      this.launcherKind = "proton";
      this.launcher = protonScript;
    } else {
      if (options.launcher === "proton") {
        log.debug({ distribution: dist.root }, "Not a Proton build, launching through the Wine loader");
      }
      this.launcherKind = "wine";
      this.launcher = dist.loader ?? join(dist.bin, "wine");
    }
  }

  command(executable: string, args: readonly string[]): string[] {
    if (this.launcherKind === "proton") {
      return [this.launcher, this.options.protonVerb ?? "runinprefix", executable, ...args];
    }
    const steam = this.options.useSteam ? [STEAM_EXE] : [];
    return [this.launcher, ...steam, executable, ...args];
  }

  environment(ambient: NodeJS.ProcessEnv): Record<string, string> {
    const env = this.context.environment(ambient);
    if (this.launcherKind !== "proton") {
      if (this.options.useSteam && this.options.steamAppId !== undefined) {
        this.setUnlessOverridden(env, {
          SteamAppId: this.options.steamAppId,
          SteamGameId: this.options.steamAppId,
        });
      }
      return env;
    }

    const protonVars = buildProtonEnv(
      {
        compatDataPath: this.context.prefix.root,
        steamAppId: this.options.steamAppId,
        wineLoader: join(this.context.distribution.bin, "wine"),
      },
      detectSteamRoot()
    );
    this.setUnlessOverridden(env, protonVars);
    return env;
  }

  // Context overrides keep the final say
  private setUnlessOverridden(env: Record<string, string>, vars: Record<string, string>): void {
    for (const [key, value] of Object.entries(vars)) {
      if (!this.context.overrides.has(key)) env[key] = value;
    }
  }
}
