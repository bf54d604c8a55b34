/**
 * Pipeline modules export
 */

export { loadStyle } from "./styles";
export { scan } from "./scanner";
export { process, processDocument } from "./processor";
export { indexer } from "./indexer";
export { stats } from "./stats";
