import { existsSync, readFileSync } from "fs";
import { join, resolve } from "path";
import { z } from "zod";
import { UnknownContextError } from "../../errors.js";
import { logger } from "../../logger.js";
import { WineContext } from "../wine-context/context.js";
import type { ContextRegistry } from "../wine-context/registry.js";

const log = logger.child({ module: "settings" });

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

/**
 * Validates a distribution or prefix path: must be non-empty and either
 * absolute or relative to the home directory (`~`).
 */
export const AbsoluteOrHomePath = z
  .string()
  .min(1, "Path must not be empty")
  .refine((p) => p.startsWith("/") || p === "~" || p.startsWith("~/"), {
    message: "Path must be absolute (starting with /) or start with ~",
  });

export const DllOverrideSchema = z.object({
  dlls: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]),
  mode: z.enum(["n", "b", "n,b", "b,n", ""]),
});

const EnvListItemSchema = z.union([z.string(), z.number(), DllOverrideSchema]);

export const EnvValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
  z.array(EnvListItemSchema),
]);

export const ContextConfigSchema = z.object({
  distribution: AbsoluteOrHomePath,
  prefix: AbsoluteOrHomePath,
  env: z.record(EnvValueSchema).default({}),
});

export const SettingsSchema = z.object({
  /** Contexts keyed by the name they are registered under. */
  contexts: z.record(ContextConfigSchema).default({}),
  defaultContext: z.string().min(1).optional(),
});

export type ContextConfig = z.infer<typeof ContextConfigSchema>;
export type Settings = z.infer<typeof SettingsSchema>;

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

/** $WINEBRIDGE_CONFIG, else config/winebridge.json under the working directory. */
export function defaultSettingsPath(env: NodeJS.ProcessEnv = process.env): string {
  return env["WINEBRIDGE_CONFIG"]
    ? resolve(env["WINEBRIDGE_CONFIG"])
    : join(process.cwd(), "config", "winebridge.json");
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Reads and validates the settings file. A missing file yields the defaults
 * (no contexts); malformed JSON or a schema violation throws.
 */
export function loadSettings(path: string = defaultSettingsPath()): Settings {
  if (!existsSync(path)) {
    log.debug({ path }, "No settings file, using defaults");
    return SettingsSchema.parse({});
  }

  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return SettingsSchema.parse(raw);
}

/**
 * Creates a context for every entry and registers it under its key, then
 * marks `defaultContext` as the default. Returns the registered names.
 *
 * Nothing is registered when an entry fails: every context is created
 * before the first registration.
 */
export function applySettings(settings: Settings, registry: ContextRegistry): string[] {
  const { contexts, defaultContext } = settings;
  if (defaultContext !== undefined && !(defaultContext in contexts)) {
    throw new UnknownContextError(
      `defaultContext "${defaultContext}" does not name a configured context`,
      defaultContext
    );
  }

  const created = Object.entries(contexts).map(
    ([name, config]) => [name, WineContext.create(config.distribution, config.prefix, config.env)] as const
  );

  for (const [name, context] of created) {
    registry.register(context, { name, default: name === defaultContext });
  }

  log.info({ contexts: created.length, default: registry.defaultName }, "Applied settings");
  return created.map(([name]) => name);
}
