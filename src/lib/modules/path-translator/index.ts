export {
  NativePathTranslator,
  WinePathTranslator,
  isWindowsDrivePath,
  isUncPath,
  type ExecutionMode,
  type PathTranslator,
  type Translation,
} from "./translator.js";
export { HostPath, hostPath, isPathValue, pathValueToString } from "./host-path.js";
