export { EProcess } from "./eprocess.js";
export { decodeOutput, splitLines, type DecodedOutput, type Decoder } from "./decode.js";
export { nodeSpawner, type ChildHandle, type SpawnRequest, type Spawner } from "./spawner.js";
export {
  isWindowsProgram,
  NativeStrategy,
  STEAM_EXE,
  WineStrategy,
  type ExecutionStrategy,
  type WineStrategyOptions,
} from "./strategy.js";
export type {
  ArgumentGroup,
  ArgValue,
  EnvPatch,
  EProcessOptions,
  LaunchPlan,
  LauncherKind,
  ProcessState,
  ProtonVerb,
  RunOptions,
} from "./types.js";
