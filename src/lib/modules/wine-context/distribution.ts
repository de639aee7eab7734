import { readdirSync, realpathSync } from "fs";
import { basename, delimiter, dirname, join } from "path";
import { homedir } from "os";
import { InvalidPathError } from "../../errors.js";
import { isDirectory, isExecutableFile, resolvePath } from "../../fs-util.js";
import type { DiscoveryOptions, DistributionInfo } from "./types.js";

// ---------------------------------------------------------------------------
// Known locations
// ---------------------------------------------------------------------------

/** Directories searched for a system `wine` on top of $PATH. */
const SYSTEM_BIN_DIRS: ReadonlyArray<string> = ["/usr/bin", "/usr/local/bin", "/opt/bin"];

/** Sub-directories of a Proton build that hold its Wine tree, newest layout first. */
const PROTON_WINE_DIRS: ReadonlyArray<string> = ["files", "dist"];

/** Loader binaries, in order of preference. */
const LOADER_NAMES: ReadonlyArray<string> = ["wine", "wine64"];

function steamRoots(home: string): string[] {
  return [
    join(home, ".steam", "steam"),
    join(home, ".local", "share", "Steam"),
    join(home, ".var", "app", "com.valvesoftware.Steam", ".local", "share", "Steam"),
  ];
}

// ---------------------------------------------------------------------------
// Distribution
// ---------------------------------------------------------------------------

/**
 * A Wine build on disk: either a plain Wine tree (`bin/wine`, `lib/`, ...)
 * or a Proton build whose Wine tree lives in `files/` (or `dist/` on old
 * releases) next to the `proton` launch script.
 */
export class Distribution {
  private constructor(
    /** Absolute root directory as given by the caller */
    readonly root: string,
    /** Directory holding bin/, lib/, lib64/ */
    readonly winedist: string,
    readonly isProton: boolean
  ) {}

  /**
   * Opens the distribution rooted at `root` (`~` is expanded).
   * Throws InvalidPathError when `root` is not a directory, or when it is a
   * Proton build without a Wine tree.
   */
  static open(root: string): Distribution {
    const abs = resolvePath(root);
    if (!isDirectory(abs)) {
      throw new InvalidPathError(`Wine distribution "${abs}" is not a directory`, abs);
    }

    if (isProtonDirectory(abs)) {
      const winedist = PROTON_WINE_DIRS.map((d) => join(abs, d)).find(isDirectory);
      if (!winedist) {
        throw new InvalidPathError(
          `Proton build at "${abs}" has neither a files/ nor a dist/ directory`,
          abs
        );
      }
      return new Distribution(abs, winedist, true);
    }

    return new Distribution(abs, abs, false);
  }

  get bin(): string {
    return join(this.winedist, "bin");
  }

  /** First executable loader found in bin/, or null when the build has none. */
  get loader(): string | null {
    for (const name of LOADER_NAMES) {
      const candidate = join(this.bin, name);
      if (isExecutableFile(candidate)) return candidate;
    }
    return null;
  }

  get server(): string {
    return join(this.bin, "wineserver");
  }

  /** `<root>/proton` for Proton builds, null otherwise. */
  get protonScript(): string | null {
    return this.isProton ? join(this.root, "proton") : null;
  }

  get libDirs(): string[] {
    return [join(this.winedist, "lib64"), join(this.winedist, "lib")];
  }

  get dllDirs(): string[] {
    return this.libDirs.map((dir) => join(dir, "wine"));
  }
}

// ---------------------------------------------------------------------------
// Pure helpers (exported for unit testing)
// ---------------------------------------------------------------------------

/**
 * Converts a distribution directory name into a URL-safe slug used as its ID.
 *
 * Examples:
 *   "Proton 9.0"            → "proton-9-0"
 *   "GE-Proton9-20"         → "ge-proton9-20"
 *   "wine-staging-9.2"      → "wine-staging-9-2"
 *   "Proton - Experimental" → "proton-experimental"
 */
export function distributionId(dirName: string): string {
  return dirName
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/**
 * Extracts a numeric sort key from a directory name so newer builds sort
 * first. Falls back to 0 for names with no recognisable version numbers.
 *
 * Examples:
 *   "Proton 9.0"    → 9000
 *   "Proton 8.0-5"  → 8000
 *   "GE-Proton9-20" → 9020
 */
export function distributionSortKey(dirName: string): number {
  const match = dirName.match(/(\d+)[.\-](\d+)/);
  if (!match) {
    const single = dirName.match(/(\d+)/);
    return single ? parseInt(single[1], 10) * 1000 : 0;
  }
  return parseInt(match[1], 10) * 1000 + parseInt(match[2], 10);
}

/** A Proton build is recognised by its executable `proton` launch script. */
export function isProtonDirectory(dirPath: string): boolean {
  return isExecutableFile(join(dirPath, "proton"));
}

/** A plain Wine tree has an executable loader in bin/. */
export function isWineDistribution(dirPath: string): boolean {
  return LOADER_NAMES.some((name) => isExecutableFile(join(dirPath, "bin", name)));
}

// ---------------------------------------------------------------------------
// FS-dependent detection
// ---------------------------------------------------------------------------

/**
 * Lists Proton builds directly under `parent`. When `nameFilter` is set, only
 * entries whose name contains it (case-insensitive) are considered — used for
 * steamapps/common, which also holds games.
 */
function scanProtonDir(parent: string, nameFilter?: string): DistributionInfo[] {
  let entries: string[];
  try {
    entries = readdirSync(parent);
  } catch {
    return [];
  }

  const found: DistributionInfo[] = [];
  for (const entry of entries) {
    if (nameFilter && !entry.toLowerCase().includes(nameFilter)) continue;

    const fullPath = join(parent, entry);
    if (!isDirectory(fullPath) || !isProtonDirectory(fullPath)) continue;

    found.push({
      id: distributionId(entry),
      path: fullPath,
      label: entry,
      kind: "proton",
    });
  }
  return found;
}

function scanSystemWine(binDirs: string[]): DistributionInfo[] {
  const found: DistributionInfo[] = [];
  for (const dir of binDirs) {
    const wine = join(dir, "wine");
    if (!isExecutableFile(wine)) continue;

    let root: string;
    try {
      root = dirname(dirname(realpathSync(wine)));
    } catch {
      continue;
    }

    const name = basename(root) || "root";
    found.push({ id: distributionId(name), path: root, label: `Wine (${root})`, kind: "wine" });
  }
  return found;
}

/**
 * Detects installed Wine builds: the `wine` found on $PATH or in the usual
 * bin directories first, then Proton builds from every Steam root, newest
 * first. Results are deduplicated by absolute path.
 */
export function detectDistributions(options: DiscoveryOptions = {}): DistributionInfo[] {
  const home = options.home ?? homedir();
  const env = options.env ?? process.env;

  const binDirs = [
    ...(env["PATH"] ?? "").split(delimiter).filter(Boolean),
    ...SYSTEM_BIN_DIRS,
    join(home, ".local", "bin"),
  ];

  const protons: DistributionInfo[] = [];
  for (const steamRoot of steamRoots(home)) {
    protons.push(...scanProtonDir(join(steamRoot, "compatibilitytools.d")));
    protons.push(...scanProtonDir(join(steamRoot, "steamapps", "common"), "proton"));
  }
  protons.sort((a, b) => distributionSortKey(b.label) - distributionSortKey(a.label));

  const seen = new Set<string>();
  const result: DistributionInfo[] = [];
  for (const info of [...scanSystemWine(binDirs), ...protons]) {
    if (seen.has(info.path)) continue;
    seen.add(info.path);
    result.push(info);
  }
  return result;
}

/**
 * Returns the Steam installation root, or null if none of the known
 * locations exist. Used as STEAM_COMPAT_CLIENT_INSTALL_PATH for Proton.
 */
export function detectSteamRoot(home: string = homedir()): string | null {
  return steamRoots(home).find(isDirectory) ?? null;
}

/**
 * Finds a detected distribution by its ID slug.
 * Scans on every call — not cached, so always reflects the filesystem.
 */
export function findDistribution(
  id: string,
  options: DiscoveryOptions = {}
): DistributionInfo | undefined {
  return detectDistributions(options).find((d) => d.id === id);
}
