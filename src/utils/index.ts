/**
 * Utility exports
 */

// Path/filename utilities
export { filenameToTitle } from "./filename-to-title";
export { outputFilename } from "./output-filename";

// Filesystem utilities
export { fileExists } from "./file-exists";
export { validatePaths } from "./validate-paths";

// Ordering utilities
export {
  byBirthtime,
  byMtime,
  compareDocuments,
  getOrderingStrategy,
} from "./ordering";
export type { OrderingStrategy, OrderingInput } from "./ordering";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  getUserConfigPath,
} from "./load-config";

// Errors
export { BuildError } from "./build-error";
export type { BuildErrorReason } from "./build-error";

// Classes
export { Logger } from "./logger";
export { Tracker } from "./tracker";
