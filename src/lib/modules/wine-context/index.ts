// Re-export all types
export type {
  DllOverride,
  DllOverrideMode,
  EnvListItem,
  EnvValue,
  ContextOverrides,
  DriveMapping,
  DistributionInfo,
  DiscoveryOptions,
} from "./types.js";

// Re-export distribution
export {
  Distribution,
  distributionId,
  distributionSortKey,
  isProtonDirectory,
  isWineDistribution,
  detectDistributions,
  detectSteamRoot,
  findDistribution,
} from "./distribution.js";

// Re-export prefix
export { Prefix, readDriveMappings, detectPrefixes } from "./prefix.js";

// Re-export env-builder
export {
  PROTECTED_VARIABLES,
  serializeDllOverrides,
  serializeEnvValue,
  normalizeOverrides,
  buildProtonEnv,
  type ProtonEnvConfig,
} from "./env-builder.js";

// Re-export context and registry
export { WineContext, createContext } from "./context.js";
export {
  ContextRegistry,
  defaultRegistry,
  registerContext,
  resolveContext,
  type RegisterOptions,
} from "./registry.js";
export { discoverContext } from "./discovery.js";
