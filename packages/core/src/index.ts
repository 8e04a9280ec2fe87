export { logger, clearLoggerCache, type Logger } from "./logger.js";
export { exitWithError, runProgram } from "./fatal.js";
export {
  SidecarError,
  DependencyNotReadyError,
  errorMessage,
  systemErrorCode,
  type SidecarErrorCode,
} from "./errors.js";
export { AGENT_LIBRARY_NAME, agentPaths } from "./paths.js";
export {
  loadInjectorConfig,
  loadLauncherConfig,
  type InjectorConfig,
  type LauncherConfig,
} from "./config.js";
