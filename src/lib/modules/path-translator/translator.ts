import { posix } from "path";
import { homedir } from "os";
import { expandHome } from "../../fs-util.js";
import type { DriveMapping } from "../wine-context/types.js";

export type ExecutionMode = "native" | "wine";

export interface Translation {
  path: string;
  /**
   * False when the path was passed through untouched because no mapping
   * applies (UNC paths, paths outside every drive root).
   */
  exact: boolean;
}

/**
 * Converts paths between the host and the platform the child process sees.
 * One implementation per execution mode.
 */
export interface PathTranslator {
  readonly mode: ExecutionMode;
  translate(path: string): Translation;
  /** Host path → path the child expects */
  toTarget(path: string): string;
  /** Path printed by the child → host path; unknown forms come back unchanged */
  fromTarget(path: string): string;
}

// ---------------------------------------------------------------------------
// Path-shape helpers
// ---------------------------------------------------------------------------

const DRIVE_PATH = /^([A-Za-z]):(?:[\\/](.*))?$/s;

/** `C:\...`, `c:/...` or a bare `C:` */
export function isWindowsDrivePath(path: string): boolean {
  return DRIVE_PATH.test(path);
}

/** `\\host\share` or `//host/share` */
export function isUncPath(path: string): boolean {
  return /^(?:\\\\|\/\/)[^\\/]/.test(path);
}

function toBackslashes(path: string): string {
  return path.replace(/\//g, "\\");
}

function stripTrailingSlash(path: string): string {
  return path.length > 1 && path.endsWith("/") ? path.slice(0, -1) : path;
}

function isUnder(root: string, path: string): boolean {
  if (root === "/") return path.startsWith("/");
  return path === root || path.startsWith(`${root}/`);
}

// ---------------------------------------------------------------------------
// Native
// ---------------------------------------------------------------------------

/**
 * Identity translator for programs that run directly on the host. On a
 * Windows host forward slashes are turned into backslashes.
 */
export class NativePathTranslator implements PathTranslator {
  readonly mode: ExecutionMode = "native";

  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  translate(path: string): Translation {
    return { path: this.platform === "win32" ? toBackslashes(path) : path, exact: true };
  }

  toTarget(path: string): string {
    return this.translate(path).path;
  }

  fromTarget(path: string): string {
    return path;
  }
}

// ---------------------------------------------------------------------------
// Wine
// ---------------------------------------------------------------------------

/**
 * Maps POSIX paths onto the drive letters of a Wine prefix and back.
 *
 * The longest drive root containing a path wins, so a file under
 * `<prefix>/drive_c` becomes `C:\...` rather than `Z:\<prefix>\drive_c\...`.
 */
export class WinePathTranslator implements PathTranslator {
  readonly mode: ExecutionMode = "wine";
  readonly drives: readonly DriveMapping[];

  constructor(mappings: readonly DriveMapping[], private readonly home: string = homedir()) {
    this.drives = mappings.map((m) => ({
      letter: m.letter.toUpperCase(),
      root: stripTrailingSlash(posix.normalize(m.root)),
    }));
  }

  translate(path: string): Translation {
    if (isUncPath(path)) return { path, exact: false };
    if (isWindowsDrivePath(path)) return { path: toBackslashes(path), exact: true };

    const expanded = expandHome(path, this.home);
    if (!posix.isAbsolute(expanded)) return { path: toBackslashes(expanded), exact: true };

    const normalized = stripTrailingSlash(posix.normalize(expanded));
    const drive = this.driveFor(normalized);
    if (!drive) return { path, exact: false };

    const rest = drive.root === "/"
      ? normalized.slice(1)
      : normalized.slice(drive.root.length + 1);
    return { path: `${drive.letter}:\\${toBackslashes(rest)}`, exact: true };
  }

  toTarget(path: string): string {
    return this.translate(path).path;
  }

  fromTarget(path: string): string {
    const match = DRIVE_PATH.exec(path);
    if (!match) return path;

    const letter = match[1].toUpperCase();
    const drive = this.drives.find((d) => d.letter === letter);
    if (!drive) return path;

    const rest = (match[2] ?? "").replace(/\\/g, "/").replace(/^\/+/, "");
    return rest ? posix.join(drive.root, rest) : drive.root;
  }

  private driveFor(path: string): DriveMapping | undefined {
    let best: DriveMapping | undefined;
    for (const drive of this.drives) {
      if (!isUnder(drive.root, path)) continue;
      if (!best || drive.root.length > best.root.length) best = drive;
    }
    return best;
  }
}
