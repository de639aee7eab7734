import { accessSync, constants, statSync } from "fs";
import { homedir } from "os";
import { join, resolve } from "path";

/**
 * Expands a leading `~` (alone or followed by a separator) to `home`.
 * `~user` forms are left untouched.
 */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === "~") return home;
  if (path.startsWith("~/")) return join(home, path.slice(2));
  return path;
}

/** Expands `~` and resolves against the current working directory. */
export function resolvePath(path: string): string {
  return resolve(expandHome(path));
}

export function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

export function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/** True for a regular file the current user may execute. */
export function isExecutableFile(path: string): boolean {
  if (!isFile(path)) return false;
  try {
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
