import { existsSync, lstatSync, readdirSync, readlinkSync } from "fs";
import { dirname, join, resolve } from "path";
import { homedir } from "os";
import { InvalidPathError } from "../../errors.js";
import { isDirectory, isFile, resolvePath } from "../../fs-util.js";
import { logger } from "../../logger.js";
import type { DiscoveryOptions, DriveMapping } from "./types.js";

const log = logger.child({ module: "prefix" });

/** Files Wine writes when it initialises a prefix (wineboot). */
const PREFIX_MARKERS: ReadonlyArray<string> = ["system.reg", "user.reg"];

/**
 * A Wine prefix — the "virtual Windows install" holding drive_c, the
 * registry hives and the dosdevices drive table.
 *
 * Proton keeps the actual prefix in `<root>/pfx`; `pfx` points there when
 * that directory exists, and at `root` otherwise.
 */
export class Prefix {
  private constructor(
    readonly root: string,
    readonly pfx: string,
    /** Whether the directory existed when the prefix was opened */
    readonly exists: boolean
  ) {}

  /**
   * Opens the prefix at `root` (`~` is expanded).
   *
   * A missing prefix is accepted as long as its parent directory exists —
   * Wine creates it on first launch. Anything else that is not a directory
   * throws InvalidPathError.
   */
  static open(root: string): Prefix {
    const abs = resolvePath(root);

    if (isDirectory(abs)) {
      const protonPfx = join(abs, "pfx");
      return new Prefix(abs, isDirectory(protonPfx) ? protonPfx : abs, true);
    }

    if (existsSync(abs)) {
      throw new InvalidPathError(`Wine prefix "${abs}" exists but is not a directory`, abs);
    }
    if (!isDirectory(dirname(abs))) {
      throw new InvalidPathError(
        `Wine prefix "${abs}" does not exist and its parent directory is missing`,
        abs
      );
    }

    log.warn({ path: abs }, "Wine prefix does not exist yet — Wine will create it on first launch");
    return new Prefix(abs, abs, false);
  }

  get dosdevices(): string {
    return join(this.pfx, "dosdevices");
  }

  get driveC(): string {
    return join(this.pfx, "drive_c");
  }

  /** True once wineboot has populated the prefix. */
  isInitialized(): boolean {
    return (
      isDirectory(this.dosdevices) &&
      isDirectory(this.driveC) &&
      PREFIX_MARKERS.every((file) => isFile(join(this.pfx, file)))
    );
  }

  /**
   * Reads the drive table from dosdevices/. Falls back to Wine's defaults
   * (C: → drive_c, Z: → /) when the prefix has no drive links yet.
   */
  driveMappings(): DriveMapping[] {
    const mappings = readDriveMappings(this.dosdevices);
    if (mappings.length > 0) return mappings;
    return [
      { letter: "C", root: this.driveC },
      { letter: "Z", root: "/" },
    ];
  }
}

// ---------------------------------------------------------------------------
// Drive table
// ---------------------------------------------------------------------------

/**
 * Lists the `x:` symlinks of a dosdevices directory, sorted by letter.
 * Relative link targets (c: → ../drive_c) are resolved against the
 * dosdevices directory itself. Raw device entries (`d::`) are skipped.
 */
export function readDriveMappings(dosdevices: string): DriveMapping[] {
  let entries: string[];
  try {
    entries = readdirSync(dosdevices);
  } catch {
    return [];
  }

  const mappings: DriveMapping[] = [];
  for (const entry of entries) {
    if (!/^[a-z]:$/i.test(entry)) continue;

    const link = join(dosdevices, entry);
    try {
      if (!lstatSync(link).isSymbolicLink()) continue;
      mappings.push({
        letter: entry[0].toUpperCase(),
        root: resolve(dosdevices, readlinkSync(link)),
      });
    } catch (err) {
      log.debug({ link, err }, "Skipping unreadable drive link");
    }
  }

  return mappings.sort((a, b) => a.letter.localeCompare(b.letter));
}

// ---------------------------------------------------------------------------
// Detection
// ---------------------------------------------------------------------------

/**
 * Returns the existing prefix directories among $WINEPREFIX, ~/.wine and
 * ~/.wine64, in that order, without duplicates.
 */
export function detectPrefixes(options: DiscoveryOptions = {}): string[] {
  const home = options.home ?? homedir();
  const env = options.env ?? process.env;

  const candidates = [env["WINEPREFIX"], join(home, ".wine"), join(home, ".wine64")];
  const found: string[] = [];
  for (const candidate of candidates) {
    if (!candidate) continue;
    const abs = resolve(candidate);
    if (isDirectory(abs) && !found.includes(abs)) found.push(abs);
  }
  return found;
}
