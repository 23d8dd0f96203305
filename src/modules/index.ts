/**
 * Pipeline modules export
 */

export { locate } from "./locator";
export { indexer } from "./indexer";
export { plan } from "./planner";
export { download } from "./downloader";
export { verify } from "./verifier";
export { stats } from "./stats";
