/**
 * Utility exports
 */

// URL utilities
export {
  joinUrl,
  makeYearFolder,
  makeDateFolder,
  getFolderUrl,
  getFileUrl,
} from "./archive-url";

// Index parsing
export { extractFilenames, FILENAME_PATTERNS } from "./extract-filenames";
export { getFrameNumberFromFilename } from "./frame-number";
export {
  buildFrameTable,
  parseFrameTable,
  serializeFrameTable,
  loadFrameTable,
  saveFrameTable,
} from "./index-table";

// Filesystem utilities
export { fileExists, nonEmptyFileExists } from "./file-exists";
export { expandHome } from "./expand-home";
export { hasImageExtension, isValidImage } from "./image-validation";

// Network utilities
export { ArchiveClient } from "./archive-client";
export type { HttpClient, ArchiveClientOptions } from "./archive-client";
export { Netrc } from "./netrc";
export type { NetrcCredentials } from "./netrc";
export { CookieJar } from "./cookie-jar";
export type { Cookie } from "./cookie-jar";
export {
  assertCredentials,
  createArchiveClient,
  BULK_DOWNLOAD_INSTRUCTIONS,
} from "./credentials";

// Config utilities
export { loadConfig, getUserConfigPath, loadDefaultConfig } from "./load-config";

// Classes
export { Logger } from "./logger";
export { Tracker } from "./tracker";
