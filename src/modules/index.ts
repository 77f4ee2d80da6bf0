/**
 * Pipeline modules export
 */

export { scan } from "./scanner";
export { process } from "./processor";
export { copy } from "./copier";
export { indexer } from "./indexer";
export { stats } from "./stats";
