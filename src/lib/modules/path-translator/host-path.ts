import { join } from "path";
import { fileURLToPath } from "url";

/**
 * Marks a value as a host filesystem path. Arguments wrapped this way are
 * always translated for the target platform; plain strings never are.
 */
export class HostPath {
  constructor(readonly path: string) {}

  toString(): string {
    return this.path;
  }
}

/** Joins `segments` into a HostPath. */
export function hostPath(...segments: string[]): HostPath {
  return new HostPath(join(...segments));
}

/** HostPath instances and `file:` URLs count as paths. */
export function isPathValue(value: unknown): value is HostPath | URL {
  return value instanceof HostPath || (value instanceof URL && value.protocol === "file:");
}

export function pathValueToString(value: HostPath | URL): string {
  return value instanceof URL ? fileURLToPath(value) : value.path;
}
