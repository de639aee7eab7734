/**
 * winebridge — run Windows programs natively or through Wine/Proton.
 *
 * ```ts
 * import { createContext, registerContext, EProcess } from "winebridge";
 *
 * registerContext(createContext("/opt/wine-staging", "~/.wine64", { ESYNC: "0" }));
 * const proc = await new EProcess("notepad.exe").setArguments(["-info"]).run();
 * ```
 */

export {
  ERROR_CODES,
  WineBridgeError,
  InvalidPathError,
  InvalidOverrideError,
  UnknownContextError,
  MissingContextError,
  LaunchError,
  TimeoutError,
  ProcessStateError,
  getErrorMessage,
  type ErrorCode,
} from "./errors.js";
export { logger } from "./logger.js";

export * from "./modules/wine-context/index.js";
export * from "./modules/path-translator/index.js";
export * from "./modules/process/index.js";
export {
  AbsoluteOrHomePath,
  ContextConfigSchema,
  SettingsSchema,
  applySettings,
  defaultSettingsPath,
  loadSettings,
  type ContextConfig,
  type Settings,
} from "./modules/settings/index.js";
